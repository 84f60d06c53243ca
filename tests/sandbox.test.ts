import { describe, it, expect } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { Sandbox } from '../src/services/build/sandbox.js';
import { SandboxIOError } from '../src/utils/errors.js';
import { createLogger } from '../src/utils/logger.js';
import { makeTempDir, writeFiles } from './helpers/task.js';

const quiet = createLogger('ERROR');

describe('Sandbox', () => {
  it('recreates the directory empty', async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, { 'sandbox/old/nested.txt': 'x' });

    const sandbox = await Sandbox.recreate(path.join(dir, 'sandbox'), quiet);

    expect(await fs.readdir(sandbox.dir)).toEqual([]);
  });

  it('fails with SandboxIOError when the directory cannot be created', async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, { blocker: 'a file, not a directory' });

    await expect(Sandbox.recreate(path.join(dir, 'blocker', 'sandbox'), quiet)).rejects.toBeInstanceOf(SandboxIOError);
  });

  it('places the solution under its canonical name', async () => {
    const dir = await makeTempDir();
    await writeFiles(dir, { 'my_solution.cc': 'int main() {}\n' });
    const sandbox = await Sandbox.recreate(path.join(dir, 'sandbox'), quiet);

    const name = await sandbox.placeSolution(path.join(dir, 'my_solution.cc'), 'aplusb.cpp');

    expect(name).toBe('aplusb.cpp');
    expect(await sandbox.readFile('aplusb.cpp')).toBe('int main() {}\n');
  });

  it('reports a missing source file as SandboxIOError', async () => {
    const dir = await makeTempDir();
    const sandbox = await Sandbox.recreate(path.join(dir, 'sandbox'), quiet);

    await expect(sandbox.copyIn(dir, ['grader.cpp'])).rejects.toBeInstanceOf(SandboxIOError);
  });

  it('lists, removes and checks files', async () => {
    const dir = await makeTempDir();
    const sandbox = await Sandbox.recreate(path.join(dir, 'sandbox'), quiet);
    await sandbox.writeFile('b.class', '');
    await sandbox.writeFile('a.class', '');
    await sandbox.writeFile('run', '', 0o755);

    expect(await sandbox.list((name) => name.endsWith('.class'))).toEqual(['a.class', 'b.class']);
    expect(await sandbox.isExecutable('run')).toBe(true);
    expect(await sandbox.isExecutable('a.class')).toBe(false);

    await sandbox.remove(['a.class', 'b.class']);
    expect(await sandbox.exists('a.class')).toBe(false);
    expect(await sandbox.exists('run')).toBe(true);
  });

  it('leaves the scope on success and on failure', async () => {
    const dir = await makeTempDir();
    const sandbox = await Sandbox.recreate(path.join(dir, 'sandbox'), quiet);
    const cwd = process.cwd();

    expect(await sandbox.scoped(async (scope) => scope.dir)).toBe(sandbox.dir);
    await expect(
      sandbox.scoped(async () => {
        throw new Error('compile failed');
      })
    ).rejects.toThrow('compile failed');
    expect(process.cwd()).toBe(cwd);
  });
});
