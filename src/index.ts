import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApi } from './api/index.js';
import { closeDatabase, initializeDatabase } from './db/index.js';
import { config, validateConfig } from './config.js';
import { createLogger } from './utils/logger.js';
import { failInterruptedJobs } from './services/generation/jobs.js';
import { runGenerationProcessor, startGenerationWorker, stopGenerationWorker } from './jobs/generate.js';
import { startScheduler, stopScheduler } from './jobs/scheduler.js';

const logger = createLogger('server');

async function main() {
  logger.info('Starting Persona Press', { env: config.server.nodeEnv, provider: config.ai.provider });

  validateConfig();
  await initializeDatabase();

  const interrupted = failInterruptedJobs();
  if (interrupted > 0) {
    logger.warn(`Marked ${interrupted} interrupted jobs as failed`);
  }

  startGenerationWorker();
  if (config.generation.mode === 'queue') {
    await runGenerationProcessor();
    startScheduler();
  }

  const app = createApi();

  const server = serve({
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  });

  logger.info(`Server running on http://${config.server.host}:${config.server.port}`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);

    stopScheduler();
    server.close();
    await stopGenerationWorker();
    closeDatabase();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error });
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
