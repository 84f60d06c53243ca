/*
 * C++ build: the grader is compiled on its own into an object file, its source is
 * removed, and the solution is linked against the object.
 */

import type { Artifact } from '../../../types/build.js';
import { capture, type BuildContext, type BuildStrategy } from './context.js';

const WINDOWS_DIALOG_DISABLER = 'win_rte_dialog_disabler.cpp';
const GRADER_SOURCE = 'grader.cpp';
const GRADER_OBJECT = 'grader.o';

export const cppStrategy: BuildStrategy = {
  async build(ctx: BuildContext): Promise<Artifact> {
    const { config, sandbox, grader, logger } = ctx;
    const { problemName } = config.task;
    const opts = [...config.compilers.cppOpts];
    logger.debug(`CPP_OPTS='${opts.join(' ')}'`);

    const colorFlag = config.colorDiagnostics ? '-fdiagnostics-color=always' : '-fdiagnostics-color=never';
    const filesToCompile = [ctx.sourceFile];

    if (config.platform === 'win32') {
      logger.debug('It is Windows. Needed disabling runtime error dialog.');
      await sandbox.copyIn(config.paths.internals, [WINDOWS_DIALOG_DISABLER]);
      filesToCompile.push(WINDOWS_DIALOG_DISABLER);
    }

    if (grader.required) {
      const header = `${problemName}.h`;
      logger.debug(`Copying '${header}' and '${GRADER_SOURCE}' to sandbox...`);
      await sandbox.copyIn(grader.languageDir, [header, GRADER_SOURCE]);

      logger.debug('Compiling grader...');
      await capture(ctx, 'g++', [...opts, '-c', GRADER_SOURCE, '-o', GRADER_OBJECT, colorFlag]);

      logger.debug('Removing grader source...');
      await sandbox.remove([GRADER_SOURCE]);
      filesToCompile.push(GRADER_OBJECT);
    }

    const executable = `${problemName}.exe`;
    logger.debug(`files_to_compile: ${filesToCompile.join(' ')}`);
    logger.debug('Compiling and linking...');
    await capture(ctx, 'g++', [...opts, ...filesToCompile, '-o', executable, colorFlag]);

    return { kind: 'native', executable };
  }
};
