import { describe, it, expect } from 'vitest';
import path from 'path';
import { loadConfig, splitFlags } from '../src/config/env.js';
import { ConfigurationError } from '../src/utils/errors.js';
import { makeTempDir, writeFiles } from './helpers/task.js';

const options = { platform: 'linux' as const, stderrIsTTY: false };

describe('loadConfig', () => {
  it('derives every path from BASE_DIR and applies compiler defaults', async () => {
    const base = await makeTempDir();

    const config = await loadConfig({ BASE_DIR: base, PROBLEM_NAME: 'aplusb' }, options);

    expect(config.paths).toMatchObject({
      workDir: process.cwd(),
      baseDir: base,
      sandbox: path.join(base, 'sandbox'),
      templates: path.join(base, 'scripts', 'templates'),
      graderDir: path.join(base, 'grader'),
      publicDir: path.join(base, 'public'),
      managerDir: path.join(base, 'grader'),
      preCompileHook: path.join(base, 'scripts', 'templates', 'pre_compile.sh'),
      postCompileHook: path.join(base, 'scripts', 'templates', 'post_compile.sh')
    });
    expect(config.task).toEqual({ problemName: 'aplusb', problemType: 'Batch', hasGrader: false, hasManager: false });
    expect(config.compilers).toEqual({
      cppOpts: ['-DEVAL', '--std=gnu++14', '-Wall', '-Wextra', '-Wshadow', '-O2'],
      pasOpts: ['-dEVAL', '-XS', '-O2'],
      javacOpts: ['-Xlint:all'],
      python: undefined
    });
    expect(config.defaults).toEqual({ graderVariant: 'judge', verbose: false });
    expect(config.colorDiagnostics).toBe(false);
  });

  it('builds CPP_OPTS from the standard and warning options', async () => {
    const base = await makeTempDir();

    const config = await loadConfig(
      { BASE_DIR: base, PROBLEM_NAME: 'x', CPP_STD_OPT: '--std=c++17', CPP_WARNING_OPTS: '' },
      options
    );

    expect(config.compilers.cppOpts).toEqual(['-DEVAL', '--std=c++17', '-O2']);
  });

  it('keeps an empty JAVAC_OPTS empty', async () => {
    const base = await makeTempDir();

    const config = await loadConfig({ BASE_DIR: base, PROBLEM_NAME: 'x', JAVAC_OPTS: '' }, options);

    expect(config.compilers.javacOpts).toEqual([]);
  });

  it('reads task metadata from problem.json when the environment does not set it', async () => {
    const base = await makeTempDir();
    await writeFiles(base, {
      'problem.json': JSON.stringify({ name: 'cities', title: 'Cities', type: 'Communication', has_grader: true, has_manager: true })
    });

    const config = await loadConfig({ BASE_DIR: base, HAS_MANAGER: 'false' }, options);

    expect(config.task).toEqual({ problemName: 'cities', problemType: 'Communication', hasGrader: true, hasManager: false });
  });

  it('applies the python warning pattern to both python versions', async () => {
    const base = await makeTempDir();

    const config = await loadConfig(
      { BASE_DIR: base, PROBLEM_NAME: 'x', WARNING_TEXT_PATTERN_FOR_PY: 'Warning', WARN_FILE: 'logs/warn.txt' },
      options
    );

    expect(config.warnings).toEqual({
      file: path.join(base, 'logs', 'warn.txt'),
      patterns: { py: 'Warning', py2: 'Warning' }
    });
  });

  it('returns a frozen value', async () => {
    const base = await makeTempDir();

    const config = await loadConfig({ BASE_DIR: base, PROBLEM_NAME: 'x' }, options);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.paths)).toBe(true);
    expect(Object.isFrozen(config.compilers.cppOpts)).toBe(true);
  });

  it('requires a problem name', async () => {
    const base = await makeTempDir();

    await expect(loadConfig({ BASE_DIR: base }, options)).rejects.toThrow(
      new ConfigurationError('PROBLEM_NAME is not set and problem.json does not define "name"')
    );
  });

  it('rejects malformed flags', async () => {
    const base = await makeTempDir();

    await expect(loadConfig({ BASE_DIR: base, PROBLEM_NAME: 'x', HAS_GRADER: 'yes' }, options)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(loadConfig({ BASE_DIR: base, PROBLEM_NAME: 'x', GRADER_TYPE: 'private' }, options)).rejects.toThrow(
      /GRADER_TYPE/
    );
  });

  it('keeps the invoking directory apart from a relative BASE_DIR', async () => {
    const cwd = await makeTempDir();
    await writeFiles(cwd, { 'task/problem.json': '{ "name": "aplusb" }' });

    const config = await loadConfig({ BASE_DIR: 'task' }, { ...options, cwd });

    expect(config.paths.workDir).toBe(cwd);
    expect(config.paths.baseDir).toBe(path.join(cwd, 'task'));
  });

  it('takes GRADER_TYPE only for a task with a grader', async () => {
    const base = await makeTempDir();

    const withGrader = await loadConfig(
      { BASE_DIR: base, PROBLEM_NAME: 'x', HAS_GRADER: 'true', GRADER_TYPE: 'public' },
      options
    );
    const withoutGrader = await loadConfig(
      { BASE_DIR: base, PROBLEM_NAME: 'x', HAS_GRADER: 'false', GRADER_TYPE: 'public' },
      options
    );

    expect(withGrader.defaults.graderVariant).toBe('public');
    expect(withoutGrader.defaults.graderVariant).toBe('judge');
  });

  it('rejects an invalid problem.json', async () => {
    const base = await makeTempDir();
    await writeFiles(base, { 'problem.json': '{ "name": ' });

    await expect(loadConfig({ BASE_DIR: base }, options)).rejects.toThrow(
      `${path.join(base, 'problem.json')} is not valid JSON`
    );
  });
});

describe('splitFlags', () => {
  it('splits on any whitespace and drops empty words', () => {
    expect(splitFlags('  -O2\t-DEVAL \n -g ')).toEqual(['-O2', '-DEVAL', '-g']);
    expect(splitFlags('')).toEqual([]);
  });
});
