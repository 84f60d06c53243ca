import { promises as fs } from 'fs';
import type { Logger } from '../../utils/logger.js';

export function warningLine(pattern: string): string {
  return `Text pattern '${pattern}' found in compiler outputs.\n`;
}

/**
 * Appends one line to the warning log when `pattern` occurs in the captured
 * compiler output. Returns whether a line was written.
 */
export async function checkWarning(
  pattern: string | undefined,
  compileLogPath: string,
  warnFile: string | undefined,
  logger: Logger
): Promise<boolean> {
  if (warnFile === undefined) {
    logger.debug('variable WARN_FILE is not defined.');
    return false;
  }
  logger.debug(`WARN_FILE='${warnFile}'`);

  if (!pattern) {
    logger.debug('No warning text pattern is defined for this language.');
    return false;
  }

  const outputs = await fs.readFile(compileLogPath, 'utf-8');
  if (!outputs.includes(pattern)) {
    logger.debug(`Text pattern '${pattern}' not found in compiler outputs.`);
    return false;
  }

  logger.debug(`Text pattern '${pattern}' found in compiler outputs.`);
  await fs.appendFile(warnFile, warningLine(pattern));
  return true;
}
