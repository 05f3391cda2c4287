import cron from 'node-cron';
import { config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { runGenerationProcessor } from './generate.js';

const logger = createLogger('scheduler');

interface ScheduledTask {
  name: string;
  task: cron.ScheduledTask;
  cronExpression: string;
}

const scheduledTasks: ScheduledTask[] = [];

export function startScheduler(cronExpression: string = config.generation.sweepCron): void {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid GENERATION_SWEEP_CRON expression: ${cronExpression}`);
  }

  const sweepTask = cron.schedule(cronExpression, async () => {
    try {
      await runGenerationProcessor();
    } catch (error) {
      logger.error('Scheduled generation sweep failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }, { scheduled: true, timezone: 'UTC' });
  scheduledTasks.push({ name: 'generation-sweep', task: sweepTask, cronExpression });

  logger.info('Scheduler started', { jobs: scheduledTasks.map((t) => ({ name: t.name, cron: t.cronExpression })) });
}

export function stopScheduler(): void {
  for (const task of scheduledTasks) {
    task.task.stop();
  }
  scheduledTasks.length = 0;
  logger.info('Scheduler stopped');
}
