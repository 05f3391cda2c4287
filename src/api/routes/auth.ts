import { Hono } from 'hono';
import { config } from '../../config.js';
import { createLogger } from '../../utils/logger.js';
import { UnauthenticatedError } from '../../utils/errors.js';
import { checkAdminCredentials, generateToken } from '../middleware/auth.js';
import { TokenRequestSchema, validateBody } from '../validation.js';
import { clientIp } from '../middleware/rate-limit.js';
import type { TokenResponse } from '../../types/api.js';
import type { AppEnv } from '../types.js';

const logger = createLogger('api:auth');

const app = new Hono<AppEnv>();

app.post('/auth/token', async (c) => {
  const { username, password } = await validateBody(c, TokenRequestSchema);

  if (!checkAdminCredentials(username, password)) {
    logger.warn('Rejected admin login', { username, ip: clientIp(c) });
    throw new UnauthenticatedError('Invalid credentials');
  }

  const body: TokenResponse = {
    token: await generateToken(username),
    expires_in: config.admin.jwtExpiresIn,
  };
  return c.json(body);
});

export default app;
