import { BuildError } from './errors.js';
import type { Logger } from './logger.js';

export function errorHandler(err: unknown, logger: Logger): number {
  if (err instanceof BuildError) {
    console.error(`Error: ${err.message}`);
    logger.debug(`${err.name} (exit code ${err.exitCode})`);
    return err.exitCode;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  console.error(`Error: ${error.message}`);
  logger.debug('Unexpected error:', { stack: error.stack });
  return 1;
}
