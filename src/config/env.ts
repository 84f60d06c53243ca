/*
 * Build configuration.
 * Reads the environment (and the task's problem.json) once, validates it with zod
 * and freezes the result; every component receives this value explicitly.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { BuildConfig, Language } from '../types/build.js';
import { ConfigurationError } from '../utils/errors.js';

const BUNDLED_INTERNALS = fileURLToPath(new URL('../../internal', import.meta.url));

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');
const dirPath = z.string().min(1);

const EnvSchema = z.object({
  BASE_DIR: dirPath.optional(),
  SANDBOX: dirPath.optional(),
  TEMPLATES: dirPath.optional(),
  INTERNALS: dirPath.optional(),
  GRADER_DIR: dirPath.optional(),
  PUBLIC_DIR: dirPath.optional(),
  MANAGER_DIR: dirPath.optional(),
  PRE_COMPILE: dirPath.optional(),
  POST_COMPILE: dirPath.optional(),
  PROBLEM_NAME: z.string().regex(/^[A-Za-z0-9_-]+$/, 'must be a plain file-name stem').optional(),
  PROBLEM_TYPE: z.string().optional(),
  HAS_GRADER: booleanFlag.optional(),
  HAS_MANAGER: booleanFlag.optional(),
  GRADER_TYPE: z.enum(['judge', 'public']).optional(),
  VERBOSE: booleanFlag.optional(),
  LOG_LEVEL: z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG']).optional(),
  CPP_STD_OPT: z.string().optional(),
  CPP_WARNING_OPTS: z.string().optional(),
  CPP_OPTS: z.string().optional(),
  PAS_OPTS: z.string().optional(),
  JAVAC_WARNING_OPTS: z.string().optional(),
  JAVAC_OPTS: z.string().optional(),
  PYTHON: z.string().min(1).optional(),
  WARNING_TEXT_PATTERN_FOR_CPP: z.string().optional(),
  WARNING_TEXT_PATTERN_FOR_PAS: z.string().optional(),
  WARNING_TEXT_PATTERN_FOR_JAVA: z.string().optional(),
  WARNING_TEXT_PATTERN_FOR_PY: z.string().optional(),
  WARN_FILE: z.string().min(1).optional()
});

const ProblemJsonSchema = z.object({
  name: z.string().optional(),
  type: z.string().optional(),
  has_grader: z.boolean().optional(),
  has_manager: z.boolean().optional()
});

type ProblemJson = z.infer<typeof ProblemJsonSchema>;

export const DEFAULT_CPP_STD_OPT = '--std=gnu++14';
export const DEFAULT_CPP_WARNING_OPTS = '-Wall -Wextra -Wshadow';
export const DEFAULT_PAS_OPTS = '-dEVAL -XS -O2';
export const DEFAULT_JAVAC_WARNING_OPTS = '-Xlint:all';

export interface LoadConfigOptions {
  cwd?: string;
  platform?: NodeJS.Platform;
  stderrIsTTY?: boolean;
}

export function splitFlags(value: string): string[] {
  return value.split(/\s+/).filter((flag) => flag.length > 0);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readProblemJson(baseDir: string): Promise<ProblemJson> {
  const file = path.join(baseDir, 'problem.json');
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return {};
    }
    throw new ConfigurationError(`Cannot read ${file}: ${(err as Error).message}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    throw new ConfigurationError(`${file} is not valid JSON`);
  }

  const parsed = ProblemJsonSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${file}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export async function loadConfig(
  env: NodeJS.ProcessEnv,
  options: LoadConfigOptions = {}
): Promise<BuildConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const workDir = path.resolve(options.cwd ?? process.cwd());
  const baseDir = path.resolve(workDir, vars.BASE_DIR ?? '.');
  const problem = await readProblemJson(baseDir);

  const problemName = vars.PROBLEM_NAME ?? problem.name;
  if (!problemName) {
    throw new ConfigurationError('PROBLEM_NAME is not set and problem.json does not define "name"');
  }
  if (!/^[A-Za-z0-9_-]+$/.test(problemName)) {
    throw new ConfigurationError(`Invalid problem name: ${problemName}`);
  }

  const resolve = (value: string | undefined, fallback: string): string =>
    value ? path.resolve(baseDir, value) : fallback;

  const templates = resolve(vars.TEMPLATES, path.join(baseDir, 'scripts', 'templates'));
  const graderDir = resolve(vars.GRADER_DIR, path.join(baseDir, 'grader'));

  const hasGrader = vars.HAS_GRADER ?? problem.has_grader ?? false;

  const cppStd = vars.CPP_STD_OPT ?? DEFAULT_CPP_STD_OPT;
  const cppWarnings = vars.CPP_WARNING_OPTS ?? DEFAULT_CPP_WARNING_OPTS;
  const javacWarnings = vars.JAVAC_WARNING_OPTS ?? DEFAULT_JAVAC_WARNING_OPTS;

  const patterns: Partial<Record<Language, string>> = {};
  if (vars.WARNING_TEXT_PATTERN_FOR_CPP !== undefined) patterns.cpp = vars.WARNING_TEXT_PATTERN_FOR_CPP;
  if (vars.WARNING_TEXT_PATTERN_FOR_PAS !== undefined) patterns.pas = vars.WARNING_TEXT_PATTERN_FOR_PAS;
  if (vars.WARNING_TEXT_PATTERN_FOR_JAVA !== undefined) patterns.java = vars.WARNING_TEXT_PATTERN_FOR_JAVA;
  if (vars.WARNING_TEXT_PATTERN_FOR_PY !== undefined) {
    patterns.py = vars.WARNING_TEXT_PATTERN_FOR_PY;
    patterns.py2 = vars.WARNING_TEXT_PATTERN_FOR_PY;
  }

  const config: BuildConfig = {
    paths: {
      workDir,
      baseDir,
      sandbox: resolve(vars.SANDBOX, path.join(baseDir, 'sandbox')),
      templates,
      internals: resolve(vars.INTERNALS, BUNDLED_INTERNALS),
      graderDir,
      publicDir: resolve(vars.PUBLIC_DIR, path.join(baseDir, 'public')),
      managerDir: resolve(vars.MANAGER_DIR, graderDir),
      preCompileHook: resolve(vars.PRE_COMPILE, path.join(templates, 'pre_compile.sh')),
      postCompileHook: resolve(vars.POST_COMPILE, path.join(templates, 'post_compile.sh'))
    },
    task: {
      problemName,
      problemType: vars.PROBLEM_TYPE ?? problem.type ?? 'Batch',
      hasGrader,
      hasManager: vars.HAS_MANAGER ?? problem.has_manager ?? false
    },
    compilers: {
      cppOpts: splitFlags(vars.CPP_OPTS ?? `-DEVAL ${cppStd} ${cppWarnings} -O2`),
      pasOpts: splitFlags(vars.PAS_OPTS ?? DEFAULT_PAS_OPTS),
      javacOpts: splitFlags(vars.JAVAC_OPTS ?? javacWarnings),
      python: vars.PYTHON
    },
    warnings: {
      file: vars.WARN_FILE ? path.resolve(baseDir, vars.WARN_FILE) : undefined,
      patterns
    },
    defaults: {
      // GRADER_TYPE only means something for a task with a grader
      graderVariant: hasGrader ? vars.GRADER_TYPE ?? 'judge' : 'judge',
      verbose: vars.VERBOSE ?? false
    },
    logLevel: vars.LOG_LEVEL,
    platform: options.platform ?? process.platform,
    colorDiagnostics: options.stderrIsTTY ?? Boolean(process.stderr.isTTY)
  };

  return deepFreeze(config);
}
