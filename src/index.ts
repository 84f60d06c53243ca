#!/usr/bin/env node
import dotenv from 'dotenv';

import { parseCliArgs, toBuildRequest, USAGE } from './cli/args.js';
import { loadConfig } from './config/env.js';
import { SolutionBuilder } from './services/build/index.js';
import { ArgumentError } from './utils/errors.js';
import { errorHandler } from './utils/errorHandler.js';
import { createLogger, levelFor } from './utils/logger.js';

dotenv.config();

export async function main(argv: string[]): Promise<number> {
  let logger = createLogger('INFO');
  try {
    const args = parseCliArgs(argv);
    if (args.kind === 'help') {
      console.error(USAGE);
      return 0;
    }

    const config = await loadConfig(process.env);
    const request = toBuildRequest(args, config.defaults);
    logger = createLogger(levelFor(request.verbose, config.logLevel));
    await new SolutionBuilder(config, { logger }).build(request);
    console.log('OK');
    return 0;
  } catch (err) {
    const code = errorHandler(err, logger);
    if (err instanceof ArgumentError) {
      console.error(USAGE);
    }
    return code;
  }
}

main(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
