import { describe, it, expect } from 'vitest';
import { canonicalSourceName, extensionOf, resolveLanguage } from '../src/config/languages.js';
import { UnsupportedLanguageError } from '../src/utils/errors.js';

describe('resolveLanguage', () => {
  it.each([
    ['solutions/a_plus_b.cpp', 'cpp'],
    ['model.cc', 'cpp'],
    ['slow.pas', 'pas'],
    ['Main.java', 'java'],
    ['greedy.py', 'py'],
    ['legacy.py2', 'py2']
  ])('maps %s to %s', (file, language) => {
    expect(resolveLanguage(file)).toBe(language);
  });

  it('rejects unknown extensions', () => {
    expect(() => resolveLanguage('sol.rb')).toThrow(new UnsupportedLanguageError('rb'));
  });

  it('rejects files without an extension', () => {
    expect(() => resolveLanguage('Makefile')).toThrow('Unknown solution extension: ');
  });

  it('does not fold case', () => {
    expect(() => resolveLanguage('SOL.CPP')).toThrow(UnsupportedLanguageError);
  });
});

describe('canonicalSourceName', () => {
  it('names the sandbox copy after the problem', () => {
    expect(canonicalSourceName('aplusb', 'cpp')).toBe('aplusb.cpp');
    expect(canonicalSourceName('aplusb', 'java')).toBe('aplusb.java');
  });

  it('gives python2 sources an importable .py name', () => {
    expect(canonicalSourceName('aplusb', 'py2')).toBe('aplusb.py');
  });
});

describe('extensionOf', () => {
  it('returns the last extension without the dot', () => {
    expect(extensionOf('/tmp/x.tar.gz')).toBe('gz');
    expect(extensionOf('noext')).toBe('');
  });
});
