#!/usr/bin/env node
import { program } from './cli.js';
import { createLogger } from './ui/logger.js';
import { GroupsFailedError } from './utils/errors.js';

const logger = createLogger();

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof GroupsFailedError) {
    for (const failure of error.failures) {
      logger.error(`${failure.kind} plans failed: ${failure.error.message}`);
    }
  } else {
    logger.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
});
