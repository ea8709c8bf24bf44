#!/usr/bin/env node
/**
* Console entry point: runs every demonstration in order and narrates the
* results. Exit code 0 when all pass, 1 on the first failure (or when the
* configuration is invalid).
*/

/* eslint-disable no-console */

import { loadSettings, Settings } from './config';
import { DEMONSTRATIONS } from './demonstrations';
import { getMessages } from './i18n';
import { runDemonstrations } from './runner';
import * as logger from './utils/logger';

export function main(env: NodeJS.ProcessEnv = process.env): number {
  let settings: Settings;
  try {
    settings = loadSettings(env);
  } catch (err) {
    logger.error('Invalid configuration', { err });
    return 1;
  }

  logger.setLogLevel(settings.logLevel);

  const report = runDemonstrations(DEMONSTRATIONS, {
    messages: getMessages(settings.locale),
    narrate: (line) => console.log(line),
    fail: (line) => console.error(line),
  });

  logger.info('Run finished', {
    completed: report.completed.length,
    total: DEMONSTRATIONS.length,
    ...(report.failure ? { failed: report.failure.id } : {}),
  });

  return report.failure ? 1 : 0;
}

if (require.main === module) {
  process.exitCode = main();
}
