// src/cli/commands/report-error.ts

import { ErrorFactory } from '../../utils/error-factory.js';
import { Logger } from '../../utils/logger.js';
import { c } from '../theme.js';

/**
 * Print a failed command's error (with a suggestion when one applies) and
 * mark the process as failed.
 */
export function reportCommandError(error: unknown): void {
  const details = ErrorFactory.describe(error);
  Logger.error(details.message);
  if (details.suggestion) {
    console.error(c.muted(`   ${details.suggestion}`));
  }
  if (process.env.DEBUG && details.stack) {
    console.error(c.dim(details.stack));
  }
  process.exitCode = 1;
}
