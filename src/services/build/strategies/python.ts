/*
 * Python build. There is nothing to link: the sources are syntax-checked with
 * py_compile and left in the sandbox as they are.
 */

import type { Artifact, Language } from '../../../types/build.js';
import { IllegalStateError, InterpreterNotFoundError } from '../../../utils/errors.js';
import { capture, type BuildContext, type BuildStrategy } from './context.js';

const GRADER_SOURCE = 'grader.py';
const GRADER_MODULE = 'grader';
const GENERIC_PYTHON = 'python';

function versionedPython(language: Language): string {
  switch (language) {
    case 'py':
      return 'python3';
    case 'py2':
      return 'python2';
    default:
      throw new IllegalStateError(`unhandled python language: ${language}`);
  }
}

export async function resolveInterpreter(ctx: BuildContext): Promise<string> {
  const { runner, logger } = ctx;
  const override = ctx.config.compilers.python;

  if (override !== undefined) {
    logger.debug(`Environment variable PYTHON is set to '${override}'.`);
    if (!(await runner.commandExists(override))) {
      throw new InterpreterNotFoundError(`Python command '${override}' does not exist.`);
    }
    return override;
  }

  const versioned = versionedPython(ctx.language);
  for (const candidate of [versioned, GENERIC_PYTHON]) {
    if (await runner.commandExists(candidate)) {
      logger.debug(`Python command '${candidate}' exists and is being used.`);
      return candidate;
    }
    logger.debug(`Python command '${candidate}' does not exist.`);
  }
  throw new InterpreterNotFoundError(
    `Neither of python commands '${versioned}' nor '${GENERIC_PYTHON}' exists.`
  );
}

export const pythonStrategy: BuildStrategy = {
  async build(ctx: BuildContext): Promise<Artifact> {
    const { config, sandbox, grader, logger } = ctx;
    const interpreter = await resolveInterpreter(ctx);

    let mainFile = config.task.problemName;
    if (grader.required) {
      logger.debug(`Copying '${GRADER_SOURCE}' to sandbox...`);
      await sandbox.copyIn(grader.languageDir, [GRADER_SOURCE]);
      mainFile = GRADER_MODULE;
    }

    logger.debug('Compiling python sources...');
    await capture(ctx, interpreter, ['-m', 'py_compile', `${mainFile}.py`]);

    return { kind: 'source', mainFile, interpreter };
  }
};
