import { Hono } from 'hono';
import { getAnalytics } from '../../services/analytics.js';
import { AnalyticsQuerySchema, validateQuery } from '../validation.js';
import { serializeAnalytics } from '../serializers.js';
import { adminAuth } from '../middleware/auth.js';
import type { AppEnv } from '../types.js';

const app = new Hono<AppEnv>();

app.get('/analytics', adminAuth(), (c) => {
  const query = validateQuery(c, AnalyticsQuerySchema);
  return c.json(serializeAnalytics(getAnalytics(query)));
});

export default app;
