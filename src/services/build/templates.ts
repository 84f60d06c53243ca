/*
 * Generates exec.sh and run.sh in the sandbox from the task's script templates.
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { Artifact, GraderVariant, Language, RunnerKind } from '../../types/build.js';
import { TemplateNotFoundError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { Sandbox } from './sandbox.js';

export const EXEC_SCRIPT = 'exec.sh';
export const RUN_SCRIPT = 'run.sh';

const SCRIPT_MODE = 0o755;

export type TemplateTokens = Partial<Record<
  'PROBLEM_NAME_PLACE_HOLDER' | 'MAIN_FILE_NAME_PLACE_HOLDER' | 'PYTHON_CMD_PLACE_HOLDER',
  string
>>;

export function runnerKind(problemType: string): RunnerKind {
  switch (problemType) {
    case 'Batch':
    case 'OutputOnly':
      return 'batch';
    case 'Communication':
      return 'communication';
    case 'TwoSteps':
      return 'two-steps';
    default:
      return 'other';
  }
}

export function execTemplateName(language: Language): string {
  return `exec.${language}.sh`;
}

// Only judge grading distinguishes problem types.
export function runTemplateName(variant: GraderVariant, problemType: string): string {
  if (variant === 'judge') {
    return `run.judge.${runnerKind(problemType)}.sh`;
  }
  return 'run.public.sh';
}

export function tokensFor(problemName: string, artifact: Artifact): TemplateTokens {
  const tokens: TemplateTokens = { PROBLEM_NAME_PLACE_HOLDER: problemName };
  if (artifact.kind === 'source') {
    tokens.MAIN_FILE_NAME_PLACE_HOLDER = artifact.mainFile;
    tokens.PYTHON_CMD_PLACE_HOLDER = artifact.interpreter;
  }
  return tokens;
}

export function replaceTokens(body: string, tokens: TemplateTokens): string {
  let result = body;
  for (const [token, value] of Object.entries(tokens)) {
    if (value !== undefined) {
      result = result.split(token).join(value);
    }
  }
  return result;
}

export async function instantiateTemplate(
  templatePath: string,
  sandbox: Sandbox,
  outputName: string,
  tokens: TemplateTokens,
  logger: Logger
): Promise<string> {
  let body: string;
  try {
    body = await fs.readFile(templatePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new TemplateNotFoundError(templatePath);
    }
    throw err;
  }

  logger.debug(`Creating '${outputName}' in sandbox from '${path.basename(templatePath)}'...`);
  await sandbox.writeFile(outputName, replaceTokens(body, tokens), SCRIPT_MODE);
  return sandbox.path(outputName);
}
