import { describe, it, expect } from 'vitest';
import { parseCliArgs, toBuildRequest } from '../src/cli/args.js';
import { ArgumentError } from '../src/utils/errors.js';

const defaults = { graderVariant: 'judge' as const, verbose: false };

describe('parseCliArgs', () => {
  it('parses the solution and flags', () => {
    expect(parseCliArgs(['-v', '--public', 'sol.cpp'])).toEqual({
      kind: 'build',
      solutionPath: 'sol.cpp',
      verbose: true,
      public: true
    });
  });

  it('returns help before looking at positionals', () => {
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('requires exactly one solution', () => {
    expect(() => parseCliArgs([])).toThrow(new ArgumentError('Solution is not specified.'));
    expect(() => parseCliArgs(['a.cpp', 'b.cpp'])).toThrow('meaningless argument: b.cpp');
  });

  it('rejects unknown options as argument errors', () => {
    expect(() => parseCliArgs(['--fast', 'a.cpp'])).toThrow(ArgumentError);
  });
});

describe('toBuildRequest', () => {
  it('falls back to the environment defaults', () => {
    const args = parseCliArgs(['sol.py']);
    if (args.kind !== 'build') throw new Error('expected a build');

    expect(toBuildRequest(args, { graderVariant: 'public', verbose: true })).toEqual({
      solutionPath: 'sol.py',
      verbose: true,
      graderVariant: 'public'
    });
  });

  it('lets --public override the environment', () => {
    const args = parseCliArgs(['-p', 'sol.py']);
    if (args.kind !== 'build') throw new Error('expected a build');

    const request = toBuildRequest(args, defaults);

    expect(request.graderVariant).toBe('public');
    expect(Object.isFrozen(request)).toBe(true);
  });
});
