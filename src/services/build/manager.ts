/*
 * Builds the interactive manager with the Makefile in the manager directory
 * and copies manager.exe into the sandbox.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { CommandRunner } from '../../types/build.js';
import { ManagerBuildError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { Sandbox } from './sandbox.js';

export const MANAGER_EXECUTABLE = 'manager.exe';
export const COMPILE_OUTPUTS_LIST_TARGET = 'compile_outputs_list';

export interface ManagerBuildOptions {
  managerDir: string;
  sandbox: Sandbox;
  runner: CommandRunner;
  logger: Logger;
  onOutput: (chunk: string) => void;
}

async function compileOutputsList(options: ManagerBuildOptions): Promise<string[] | null> {
  const { managerDir, runner, logger } = options;
  const args = ['-s', '--no-print-directory', '-C', managerDir, COMPILE_OUTPUTS_LIST_TARGET];
  logger.debug(`RUN: make ${args.join(' ')}`);
  const result = await runner.run(
    'make',
    args,
    { cwd: managerDir }
  );
  if (result.exitCode !== 0) {
    return null;
  }
  return result.output.split(/\s+/).filter((name) => name.length > 0);
}

export async function buildManager(options: ManagerBuildOptions): Promise<string> {
  const { managerDir, sandbox, runner, logger, onOutput } = options;

  logger.debug(`RUN: make -C ${managerDir}`);
  const build = await runner.run('make', ['-C', managerDir], { cwd: managerDir, onOutput });
  if (build.exitCode !== 0) {
    throw new ManagerBuildError(`Building manager in '${managerDir}' failed.`, build.exitCode);
  }

  const outputs = await compileOutputsList(options);
  if (outputs === null) {
    logger.debug(`Makefile in '${managerDir}' does not have target '${COMPILE_OUTPUTS_LIST_TARGET}'.`);
  } else {
    for (const name of outputs) {
      logger.debug(`Content of '${path.join(managerDir, name)}':`);
      try {
        onOutput(await fs.readFile(path.join(managerDir, name), 'utf-8'));
      } catch (err) {
        logger.warn(`Cannot read compile output '${name}': ${(err as Error).message}`);
      }
    }
  }

  logger.debug('Copying manager executable binary to sandbox...');
  const source = path.join(managerDir, MANAGER_EXECUTABLE);
  try {
    await fs.copyFile(source, sandbox.path(MANAGER_EXECUTABLE));
  } catch (err) {
    throw new ManagerBuildError(`Cannot copy '${source}': ${(err as Error).message}`);
  }
  return sandbox.path(MANAGER_EXECUTABLE);
}
