import type { Context, Next } from 'hono';
import { generateId } from '../../utils/hash.js';
import type { AppEnv } from '../types.js';

export const REQUEST_ID_HEADER = 'X-Request-ID';

const VALID_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

/** Reuses a well-formed incoming X-Request-ID or mints one, and echoes it back. */
export async function requestId(c: Context<AppEnv>, next: Next): Promise<void> {
  const incoming = c.req.header(REQUEST_ID_HEADER);
  const id = incoming && VALID_REQUEST_ID.test(incoming) ? incoming : generateId();
  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
}
