/*
 * Child process runner.
 * Spawns compilers and helper tools, merging stdout and stderr into one captured stream.
 */

import { spawn } from 'child_process';
import { promises as fs, constants } from 'fs';
import os from 'os';
import path from 'path';
import type { CommandRunner, RunOptions, RunResult } from '../types/build.js';

export class SpawnRunner implements CommandRunner {
  async run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe']
      });

      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');

      let output = '';
      const collect = (chunk: string): void => {
        output += chunk;
        options.onOutput?.(chunk);
      };

      proc.stdout.on('data', collect);
      proc.stderr.on('data', collect);

      proc.on('close', (exitCode, signal) => {
        resolve({
          exitCode: exitCode ?? (signal ? 128 + os.constants.signals[signal] : 1),
          output
        });
      });

      proc.on('error', (err) => {
        const message = `${command}: ${err.message}\n`;
        options.onOutput?.(message);
        resolve({ exitCode: 127, output: output + message });
      });
    });
  }

  async commandExists(command: string): Promise<boolean> {
    if (command.includes(path.sep)) {
      return isExecutable(command);
    }

    const dirs = (process.env.PATH ?? '').split(path.delimiter).filter(Boolean);
    const names = process.platform === 'win32' ? [command, `${command}.exe`] : [command];
    for (const dir of dirs) {
      for (const name of names) {
        if (await isExecutable(path.join(dir, name))) {
          return true;
        }
      }
    }
    return false;
  }
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
