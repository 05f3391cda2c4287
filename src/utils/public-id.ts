/**
 * Reversible encoding of numeric post ids into opaque, URL-safe tokens for
 * share links. AES-256-CBC keyed by SHA-256 of the configured secret with a
 * random IV, so the same id encodes differently each time. Presentation
 * only: decoding a token grants nothing beyond knowing the numeric id.
 */

import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto';

const ALGORITHM = 'aes-256-cbc';
const IV_LENGTH = 16;

function deriveKey(secret: string): Buffer {
  return createHash('sha256').update(secret).digest();
}

export function encodePublicId(id: number, secret: string): string {
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new RangeError(`Cannot encode post id ${id}`);
  }
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, deriveKey(secret), iv);
  const encrypted = Buffer.concat([cipher.update(String(id), 'utf8'), cipher.final()]);
  return Buffer.concat([iv, encrypted]).toString('base64url');
}

/** Returns null for anything that isn't a token produced with `secret`. */
export function decodePublicId(token: string, secret: string): number | null {
  if (!/^[A-Za-z0-9_-]+$/.test(token)) return null;

  const raw = Buffer.from(token, 'base64url');
  if (raw.length <= IV_LENGTH || (raw.length - IV_LENGTH) % 16 !== 0) return null;

  let plain: string;
  try {
    const decipher = createDecipheriv(ALGORITHM, deriveKey(secret), raw.subarray(0, IV_LENGTH));
    plain = Buffer.concat([decipher.update(raw.subarray(IV_LENGTH)), decipher.final()]).toString('utf8');
  } catch {
    // bad padding: wrong secret or tampered token
    return null;
  }

  if (!/^[1-9]\d*$/.test(plain)) return null;
  const id = Number(plain);
  return Number.isSafeInteger(id) ? id : null;
}

/** Accepts either a plain numeric id or a public token. */
export function resolvePostIdentifier(value: string, secret: string): number | null {
  if (/^\d+$/.test(value)) {
    const id = Number(value);
    return Number.isSafeInteger(id) && id > 0 ? id : null;
  }
  return decodePublicId(value, secret);
}
