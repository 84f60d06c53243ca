import { parseArgs } from 'util';
import type { BuildRequest, GraderVariant } from '../types/build.js';
import { ArgumentError } from '../utils/errors.js';

export const USAGE = [
  'Usage: compile-solution [options] <solution-path>',
  'Options:',
  '  -h, --help',
  '\tShows this help.',
  '  -v, --verbose',
  '\tPrints verbose details on values, decisions, and commands being executed.',
  '  -p, --public',
  '\tUses the public graders for compiling the solution.'
].join('\n');

const OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  verbose: { type: 'boolean', short: 'v' },
  public: { type: 'boolean', short: 'p' }
} as const;

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'build'; solutionPath: string; verbose?: boolean; public: boolean };

function parse(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, strict: true, options: OPTIONS });
  } catch (err) {
    throw new ArgumentError((err as Error).message);
  }
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const { values, positionals } = parse(argv);
  if (values.help) {
    return { kind: 'help' };
  }
  if (positionals.length === 0) {
    throw new ArgumentError('Solution is not specified.');
  }
  if (positionals.length > 1) {
    throw new ArgumentError(`meaningless argument: ${positionals[1]}`);
  }
  return {
    kind: 'build',
    solutionPath: positionals[0],
    verbose: values.verbose,
    public: values.public ?? false
  };
}

// Command-line flags win over GRADER_TYPE / VERBOSE from the environment.
export function toBuildRequest(
  args: Extract<ParsedArgs, { kind: 'build' }>,
  defaults: { graderVariant: GraderVariant; verbose: boolean }
): BuildRequest {
  return Object.freeze({
    solutionPath: args.solutionPath,
    verbose: args.verbose ?? defaults.verbose,
    graderVariant: args.public ? 'public' : defaults.graderVariant
  });
}
