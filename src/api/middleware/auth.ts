import * as jose from 'jose';
import { timingSafeEqual } from 'node:crypto';
import type { Context, Next } from 'hono';
import { config } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { UnauthenticatedError } from '../../utils/errors.js';
import type { AppEnv } from '../types.js';

const logger = createLogger('auth');

function getSecretKey(): Uint8Array {
  return new TextEncoder().encode(config.admin.jwtSecret);
}

const DEFAULT_EXPIRY_SECONDS = 7 * 24 * 60 * 60;
const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 60 * 60, d: 24 * 60 * 60 };

/** `30m`, `24h`, `7d`; anything else means seven days. */
export function parseExpiry(expiry: string): number {
  const match = /^(\d+)([smhd])$/.exec(expiry);
  const unit = match ? UNIT_SECONDS[match[2]] : undefined;
  return match && unit ? Number(match[1]) * unit : DEFAULT_EXPIRY_SECONDS;
}

export interface TokenPayload {
  sub: string;
  role: string;
  iat?: number;
  exp?: number;
}

export async function generateToken(username: string, role: string = 'admin'): Promise<string> {
  const token = await new jose.SignJWT({ role })
    .setProtectedHeader({ alg: 'HS256' })
    .setSubject(username)
    .setIssuedAt()
    .setExpirationTime(`${parseExpiry(config.admin.jwtExpiresIn)}s`)
    .sign(getSecretKey());

  logger.debug('Token generated', { username, role, expiresIn: config.admin.jwtExpiresIn });
  return token;
}

export async function verifyToken(token: string): Promise<TokenPayload> {
  try {
    const { payload } = await jose.jwtVerify(token, getSecretKey(), { algorithms: ['HS256'] });
    return {
      sub: payload.sub ?? '',
      role: typeof payload.role === 'string' ? payload.role : 'admin',
      iat: payload.iat,
      exp: payload.exp,
    };
  } catch (error) {
    if (error instanceof jose.errors.JWTExpired) {
      throw new UnauthenticatedError('Token has expired');
    }
    if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
      throw new UnauthenticatedError('Invalid token signature');
    }
    throw new UnauthenticatedError('Invalid token');
  }
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

export function checkAdminCredentials(username: string, password: string): boolean {
  // evaluate both so timing doesn't reveal which one matched
  const userOk = safeEqual(username, config.admin.username);
  const passOk = safeEqual(password, config.admin.password);
  return userOk && passOk;
}

async function readBearer(c: Context<AppEnv>): Promise<TokenPayload | null> {
  const header = c.req.header('Authorization');
  if (!header) return null;

  const match = /^Bearer (\S+)$/.exec(header);
  if (!match) {
    throw new UnauthenticatedError('Authorization header must be: Bearer <token>');
  }
  return verifyToken(match[1]);
}

/**
 * Requires an admin JWT when ADMIN_AUTH_REQUIRED is on; otherwise a no-op.
 * Pass `required: true` to enforce regardless of the setting.
 */
export function adminAuth(options: { required?: boolean } = {}) {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const required = options.required ?? config.admin.authRequired;
    if (!required) {
      await next();
      return;
    }

    const payload = await readBearer(c);
    if (!payload) {
      logger.warn('Missing credentials', { path: c.req.path });
      throw new UnauthenticatedError('Authorization header required');
    }

    c.set('admin', payload);
    logger.debug('Request authenticated', { username: payload.sub, role: payload.role });
    await next();
  };
}

/** Attaches the admin payload when a valid token is present; never rejects. */
export async function optionalAdmin(c: Context<AppEnv>, next: Next): Promise<void> {
  try {
    const payload = await readBearer(c);
    if (payload) c.set('admin', payload);
  } catch (error) {
    logger.debug('Ignoring invalid token on public route', {
      path: c.req.path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  await next();
}
