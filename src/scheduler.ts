/**
 * Scheduler
 *
 * Runs the crawl on a cron schedule
 */

import cron, { type ScheduledTask } from 'node-cron';
import { runFromConfigFile } from './pipeline.js';
import { config } from './config/index.js';
import { logger } from './utils/logger.js';

let scheduledTask: ScheduledTask | null = null;
let isRunning = false;

/**
 * Execute the crawl with a lock to prevent overlapping runs
 */
export async function executeScheduledRun(): Promise<void> {
  if (isRunning) {
    logger.warn('Crawl already running, skipping this execution');
    return;
  }

  isRunning = true;
  const startTime = new Date();

  logger.info({ startTime: startTime.toISOString() }, 'Scheduled crawl starting');

  try {
    const result = await runFromConfigFile();

    logger.info(
      {
        startTime: startTime.toISOString(),
        endTime: new Date().toISOString(),
        totalNewItems: result?.totalNewItems ?? 0,
        reportPath: result?.reportPath ?? null,
      },
      'Scheduled crawl completed'
    );
  } catch (error) {
    logger.error({ err: error }, 'Scheduled crawl failed');
  } finally {
    isRunning = false;
  }
}

/**
 * Start the scheduler
 */
export function startScheduler(): void {
  const cronExpression = config.scheduler.cronExpression;

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression: ${cronExpression}`);
  }

  logger.info({ cronExpression, timezone: config.scheduler.timezone }, 'Starting scheduler');

  scheduledTask = cron.schedule(
    cronExpression,
    () => {
      executeScheduledRun().catch((error: unknown) => {
        logger.error({ err: error }, 'Crawl execution failed');
      });
    },
    {
      timezone: config.scheduler.timezone,
    }
  );

  logger.info('Scheduler started');
}

/**
 * Stop the scheduler
 */
export function stopScheduler(): void {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
    logger.info('Scheduler stopped');
  }
}

/**
 * Service mode: one run now, then on schedule until a signal arrives
 */
export async function runService(): Promise<void> {
  logger.info(
    { cron: config.scheduler.cronExpression, timezone: config.scheduler.timezone },
    'Notice crawler service'
  );

  logger.info('Running initial crawl...');
  await executeScheduledRun();

  startScheduler();
  logger.info('Scheduler running. Press Ctrl+C to stop.');

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down...');
    stopScheduler();
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
