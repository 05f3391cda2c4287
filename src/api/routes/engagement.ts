import { Hono } from 'hono';
import { recordAction } from '../../services/engagement.js';
import { EngageRequestSchema, validateBody } from '../validation.js';
import { serializeEngageResult } from '../serializers.js';
import { postIdFromParam } from './posts.js';
import type { AppEnv } from '../types.js';

const app = new Hono<AppEnv>();

// POST /api/engage: like/dislike toggle for an anonymous session
app.post('/engage', async (c) => {
  const body = await validateBody(c, EngageRequestSchema);
  const postId = typeof body.blog_id === 'number' ? body.blog_id : postIdFromParam(body.blog_id);
  const result = recordAction(postId, body.session_id, body.action);
  return c.json(serializeEngageResult(result));
});

export default app;
