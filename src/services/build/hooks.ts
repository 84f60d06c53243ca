import type { CommandRunner } from '../../types/build.js';
import { HookError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { pathExists } from './sandbox.js';

export type HookStage = 'pre' | 'post';

export interface HookRunner {
  run(stage: HookStage, cwd: string, env: Record<string, string>): Promise<void>;
}

const STAGE_NAMES: Record<HookStage, string> = {
  pre: 'Pre-compilation',
  post: 'Post-compilation'
};

/**
 * Runs the task's pre/post compile scripts with bash when they exist. Their
 * contents are opaque; only the exit code matters.
 */
export class ScriptHookRunner implements HookRunner {
  private scripts: Record<HookStage, string>;
  private runner: CommandRunner;
  private logger: Logger;
  private onOutput: (chunk: string) => void;

  constructor(
    scripts: Record<HookStage, string>,
    runner: CommandRunner,
    logger: Logger,
    onOutput: (chunk: string) => void
  ) {
    this.scripts = scripts;
    this.runner = runner;
    this.logger = logger;
    this.onOutput = onOutput;
  }

  async run(stage: HookStage, cwd: string, env: Record<string, string>): Promise<void> {
    const script = this.scripts[stage];
    if (!(await pathExists(script))) {
      this.logger.debug(`${STAGE_NAMES[stage]} hook file '${script}' is not present. Nothing to do.`);
      return;
    }

    this.logger.debug(`Running ${STAGE_NAMES[stage].toLowerCase()} hook file ${script}...`);
    this.logger.debug(`RUN: bash ${script}`);
    const result = await this.runner.run('bash', [script], { cwd, env, onOutput: this.onOutput });
    if (result.exitCode !== 0) {
      throw new HookError(script, result.exitCode);
    }
  }
}
