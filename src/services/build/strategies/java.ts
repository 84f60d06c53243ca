import type { Artifact } from '../../../types/build.js';
import { capture, type BuildContext, type BuildStrategy } from './context.js';

const GRADER_SOURCE = 'grader.java';
const GRADER_CLASS = 'grader';

const isClassFile = (name: string): boolean => name.endsWith('.class');

export const javaStrategy: BuildStrategy = {
  async build(ctx: BuildContext): Promise<Artifact> {
    const { config, sandbox, grader, logger } = ctx;
    const { problemName } = config.task;
    const opts = [...config.compilers.javacOpts];
    logger.debug(`JAVAC_OPTS='${opts.join(' ')}'`);

    const filesToCompile = [ctx.sourceFile];
    let entryPoint = problemName;
    if (grader.required) {
      logger.debug(`Copying '${GRADER_SOURCE}' to sandbox...`);
      await sandbox.copyIn(grader.languageDir, [GRADER_SOURCE]);
      filesToCompile.push(GRADER_SOURCE);
      entryPoint = GRADER_CLASS;
    }

    logger.debug(`files_to_compile: ${filesToCompile.join(' ')}`);
    logger.debug('Compiling java sources...');
    await capture(ctx, 'javac', [...opts, ...filesToCompile]);

    const archive = `${problemName}.jar`;
    const classes = await sandbox.list(isClassFile);
    logger.debug('Creating the jar file...');
    await capture(ctx, 'jar', ['cfe', archive, entryPoint, ...classes]);

    logger.debug('Removing *.class files...');
    await sandbox.remove(await sandbox.list(isClassFile));

    return { kind: 'archive', archive, entryPoint };
  }
};
