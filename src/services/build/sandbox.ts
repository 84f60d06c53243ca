/*
 * Ephemeral build directory.
 * Recreated at the start of every build and handed over, populated, to the judging runtime.
 */

import { promises as fs, constants } from 'fs';
import path from 'path';
import { SandboxIOError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export async function pathExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

export class Sandbox {
  readonly dir: string;
  private logger: Logger;

  private constructor(dir: string, logger: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  static async recreate(dir: string, logger: Logger): Promise<Sandbox> {
    logger.debug('Cleaning the sandbox...');
    logger.debug(`RUN: recreate_dir ${dir}`);
    try {
      await fs.rm(dir, { recursive: true, force: true });
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      throw new SandboxIOError(`Cannot recreate sandbox '${dir}': ${(err as Error).message}`);
    }
    return new Sandbox(dir, logger);
  }

  path(name: string): string {
    return path.join(this.dir, name);
  }

  async placeSolution(solutionPath: string, canonicalName: string): Promise<string> {
    this.logger.debug(`Copying solution '${solutionPath}' to sandbox as '${canonicalName}'...`);
    await this.copyFile(solutionPath, this.path(canonicalName));
    return canonicalName;
  }

  async copyIn(sourceDir: string, names: string[]): Promise<void> {
    for (const name of names) {
      await this.copyFile(path.join(sourceDir, name), this.path(name));
    }
  }

  async remove(names: string[]): Promise<void> {
    if (names.length === 0) {
      return;
    }
    this.logger.debug(`RUN: rm ${names.join(' ')}`);
    try {
      await Promise.all(names.map((name) => fs.rm(this.path(name))));
    } catch (err) {
      throw new SandboxIOError(`Cannot remove from sandbox: ${(err as Error).message}`);
    }
  }

  async list(predicate: (name: string) => boolean): Promise<string[]> {
    const entries = await fs.readdir(this.dir);
    return entries.filter(predicate).sort();
  }

  async exists(name: string): Promise<boolean> {
    return pathExists(this.path(name));
  }

  async isExecutable(name: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.path(name));
      await fs.access(this.path(name), constants.X_OK);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async writeFile(name: string, content: string, mode?: number): Promise<void> {
    await fs.writeFile(this.path(name), content);
    if (mode !== undefined) {
      await fs.chmod(this.path(name), mode);
    }
  }

  async appendFile(name: string, content: string): Promise<void> {
    await fs.appendFile(this.path(name), content);
  }

  async readFile(name: string): Promise<string> {
    return fs.readFile(this.path(name), 'utf-8');
  }

  /**
   * Runs `fn` with the sandbox as the working context for every command and file
   * operation it performs. The caller's working directory is never touched, so
   * leaving the scope is a no-op on every exit path.
   */
  async scoped<T>(fn: (sandbox: Sandbox) => Promise<T>): Promise<T> {
    this.logger.debug('Entering the sandbox.');
    try {
      return await fn(this);
    } finally {
      this.logger.debug('Exiting the sandbox.');
    }
  }

  private async copyFile(from: string, to: string): Promise<void> {
    this.logger.debug(`RUN: cp ${from} ${to}`);
    try {
      await fs.copyFile(from, to);
    } catch (err) {
      throw new SandboxIOError(`Cannot copy '${from}': ${(err as Error).message}`);
    }
  }
}
