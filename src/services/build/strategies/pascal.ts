import path from 'path';
import type { Artifact } from '../../../types/build.js';
import { ArtifactNotProducedError } from '../../../utils/errors.js';
import { pathExists } from '../sandbox.js';
import { capture, type BuildContext, type BuildStrategy } from './context.js';

const GRADER_SOURCE = 'grader.pas';
const GRADER_LIBRARY = 'graderlib.pas';

export const pascalStrategy: BuildStrategy = {
  async build(ctx: BuildContext): Promise<Artifact> {
    const { config, sandbox, grader, logger } = ctx;
    const opts = [...config.compilers.pasOpts];
    logger.debug(`PAS_OPTS='${opts.join(' ')}'`);

    let mainSource = ctx.sourceFile;
    if (grader.required) {
      logger.debug(`Copying '${GRADER_SOURCE}' to sandbox...`);
      await sandbox.copyIn(grader.languageDir, [GRADER_SOURCE]);
      if (await pathExists(path.join(grader.languageDir, GRADER_LIBRARY))) {
        logger.debug(`Copying '${GRADER_LIBRARY}' to sandbox...`);
        await sandbox.copyIn(grader.languageDir, [GRADER_LIBRARY]);
      }
      mainSource = GRADER_SOURCE;
    }

    const executable = `${config.task.problemName}.exe`;
    logger.debug('Compiling and linking...');
    await capture(ctx, 'fpc', [...opts, mainSource, `-o${executable}`]);

    if (!(await sandbox.isExecutable(executable))) {
      throw new ArtifactNotProducedError(
        `Executable ${executable} is not created by the compiler.\n` +
          'The source file was probably a UNIT instead of a PROGRAM.'
      );
    }

    return { kind: 'native', executable };
  }
};
