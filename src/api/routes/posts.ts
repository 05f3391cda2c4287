// Blog post listing, detail, deletion and per-post engagement

import { Hono } from 'hono';
import { config } from '../../config.js';
import { PostNotFoundError } from '../../utils/errors.js';
import { resolvePostIdentifier } from '../../utils/public-id.js';
import { deletePost, getPost, getPostDetail, listPosts, recordView } from '../../services/posts.js';
import { getEngagementSummary } from '../../services/engagement.js';
import { EngagementQuerySchema, ListPostsQuerySchema, validateQuery } from '../validation.js';
import { serializeEngagementSummary, serializePostDetail, serializePostListItem } from '../serializers.js';
import { adminAuth, optionalAdmin } from '../middleware/auth.js';
import type { PostListDto } from '../../types/api.js';
import type { AppEnv } from '../types.js';

/** Accepts a numeric id or a share token. */
export function postIdFromParam(value: string): number {
  const postId = resolvePostIdentifier(value, config.publicIds.secret);
  if (postId === null) {
    throw new PostNotFoundError(value);
  }
  return postId;
}

const app = new Hono<AppEnv>();

app.get('/posts', optionalAdmin, async (c) => {
  const query = validateQuery(c, ListPostsQuerySchema);
  const anonymous = config.admin.authRequired && !c.get('admin');

  const { count, results } = await listPosts({
    status: anonymous ? 'completed' : query.status,
    personaSlug: query.persona,
    limit: query.limit,
    offset: query.offset,
  });

  const body: PostListDto = {
    count,
    results: results.map(({ post, persona }) => serializePostListItem(post, persona)),
  };
  return c.json(body);
});

app.get('/posts/:id', async (c) => {
  const postId = postIdFromParam(c.req.param('id'));
  await getPost(postId);
  recordView(postId);
  const { post, persona, metrics } = await getPostDetail(postId);
  return c.json(serializePostDetail(post, persona, metrics));
});

app.delete('/posts/:id', adminAuth(), (c) => {
  deletePost(postIdFromParam(c.req.param('id')));
  return c.body(null, 204);
});

app.get('/posts/:id/engagement', async (c) => {
  const postId = postIdFromParam(c.req.param('id'));
  const { session_id: sessionId } = validateQuery(c, EngagementQuerySchema);
  const summary = await getEngagementSummary(postId, sessionId);
  return c.json(serializeEngagementSummary(summary));
});

export default app;
