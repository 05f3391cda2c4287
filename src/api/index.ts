import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger as honoLogger } from 'hono/logger';
import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { requestId } from './middleware/request-id.js';
import { rateLimit } from './middleware/rate-limit.js';
import { errorBody, handleError, handleNotFound } from './middleware/error-handler.js';
import generateRoutes from './routes/generate.js';
import personaRoutes from './routes/personas.js';
import postRoutes from './routes/posts.js';
import engagementRoutes from './routes/engagement.js';
import analyticsRoutes from './routes/analytics.js';
import authRoutes from './routes/auth.js';
import healthRoutes from './routes/health.js';
import type { AppEnv } from './types.js';

const httpLogger = createLogger('http');

export function createApi() {
  const app = new Hono<AppEnv>();

  app.use('*', cors());
  app.use('*', requestId);
  app.use('*', honoLogger((message, ...rest) => httpLogger.debug([message, ...rest].join(' '))));
  app.use('*', bodyLimit({
    maxSize: 1024 * 1024,
    onError: (c) => c.json(errorBody('PAYLOAD_TOO_LARGE', 'Request body exceeds 1MB'), 413),
  }));

  app.route('/health', healthRoutes);

  app.post('/api/generate', rateLimit(config.rateLimit.generatePerMinute, 60_000));
  app.post('/api/engage', rateLimit(config.rateLimit.engagePerMinute, 60_000));
  app.post('/api/auth/token', rateLimit(10, 60_000));

  app.route('/api', generateRoutes);
  app.route('/api', personaRoutes);
  app.route('/api', postRoutes);
  app.route('/api', engagementRoutes);
  app.route('/api', analyticsRoutes);
  app.route('/api', authRoutes);

  app.onError(handleError);
  app.notFound(handleNotFound);

  return app;
}
