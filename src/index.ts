#!/usr/bin/env node

/**
 * CLI entry point: runs the brief once, or stays up on a cron schedule
 * with --schedule.
 */

import { createDailyBriefService } from './app';
import { loadConfig } from './config';
import { createLogger, setLogLevel } from './utils/logger';
import { isOperationalError } from './utils/errors';

const logger = createLogger('Main');

async function main(argv: string[]): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const service = await createDailyBriefService(config);

  if (!argv.includes('--schedule')) {
    const result = await service.runOnce();
    if (result.delivery && !result.delivery.success) {
      process.exitCode = 1;
    }
    return;
  }

  const task = service.schedule(config.schedule);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, stopping schedule`);
    task.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main(process.argv.slice(2)).catch((error) => {
  if (isOperationalError(error)) {
    logger.error(error.message, { code: error.code });
  } else {
    logger.error('Daily brief failed', { error });
  }
  process.exit(1);
});
