import type { Artifact, BuildConfig, CommandRunner, GraderSpec, Language, RunResult } from '../../../types/build.js';
import { CompileError } from '../../../utils/errors.js';
import type { Logger } from '../../../utils/logger.js';
import type { Sandbox } from '../sandbox.js';

export const COMPILE_OUTPUTS = 'compile.outputs';

export interface BuildContext {
  config: BuildConfig;
  language: Language;
  sandbox: Sandbox;
  grader: GraderSpec;
  runner: CommandRunner;
  logger: Logger;
  sourceFile: string;
  onOutput: (chunk: string) => void;
}

export interface BuildStrategy {
  build(ctx: BuildContext): Promise<Artifact>;
}

/**
 * Runs a tool inside the sandbox, streaming its output to the caller and
 * appending it to the compile log. A non-zero exit aborts the build.
 */
export async function capture(ctx: BuildContext, command: string, args: string[]): Promise<RunResult> {
  ctx.logger.debug(`RUN: ${[command, ...args].join(' ')}`);
  const result = await ctx.runner.run(command, args, {
    cwd: ctx.sandbox.dir,
    onOutput: ctx.onOutput
  });
  await ctx.sandbox.appendFile(COMPILE_OUTPUTS, result.output);

  if (result.exitCode !== 0) {
    throw new CompileError(command, result.exitCode, result.output);
  }
  return result;
}
