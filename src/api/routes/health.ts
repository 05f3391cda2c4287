import { Hono } from 'hono';
import { pingDatabase } from '../../db/index.js';
import { getWorkerStats } from '../../jobs/generate.js';
import { usageTracker } from '../../services/ai/clients.js';
import type { AppEnv } from '../types.js';

const app = new Hono<AppEnv>();

app.get('/live', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }));

app.get('/ready', (c) => {
  const database = pingDatabase();
  const worker = getWorkerStats();
  const llm = usageTracker.getStats();
  const status = database ? 'ok' : 'unavailable';
  return c.json({
    status,
    checks: {
      database: database ? 'ok' : 'unavailable',
      worker: worker.accepting ? 'ok' : 'stopped',
      running_jobs: worker.running,
      pending_jobs: worker.pending,
      llm_requests: llm.requestCount,
      llm_errors: llm.errorCount,
    },
  }, database ? 200 : 503);
});

export default app;
