/*
 * Language table for the solution compiler.
 * Maps solution file extensions onto the closed set of supported languages.
 */

import path from 'path';
import type { Language, LanguageConfig } from '../types/build.js';
import { UnsupportedLanguageError } from '../utils/errors.js';

export const LANGUAGES: Record<Language, LanguageConfig> = {
  cpp: {
    label: 'C++',
    family: 'native-two-phase',
    extensions: ['cpp', 'cc'],
    sourceExtension: 'cpp'
  },
  pas: {
    label: 'Pascal',
    family: 'native-single-phase',
    extensions: ['pas'],
    sourceExtension: 'pas'
  },
  java: {
    label: 'Java',
    family: 'bytecode',
    extensions: ['java'],
    sourceExtension: 'java'
  },
  py: {
    label: 'Python3',
    family: 'interpreted',
    extensions: ['py'],
    sourceExtension: 'py'
  },
  py2: {
    label: 'Python2',
    family: 'interpreted',
    extensions: ['py2'],
    // the grader imports the solution as a module, so it needs a .py name
    sourceExtension: 'py'
  }
};

export const LANGUAGE_TAGS: readonly Language[] = ['cpp', 'pas', 'java', 'py', 'py2'];

const EXTENSION_TABLE = new Map<string, Language>(
  LANGUAGE_TAGS.flatMap((language) =>
    LANGUAGES[language].extensions.map((ext): [string, Language] => [ext, language])
  )
);

export function extensionOf(filePath: string): string {
  return path.extname(filePath).replace(/^\./, '');
}

export function resolveLanguage(filePath: string): Language {
  const ext = extensionOf(filePath);
  const language = EXTENSION_TABLE.get(ext);
  if (!language) {
    throw new UnsupportedLanguageError(ext);
  }
  return language;
}

export function canonicalSourceName(problemName: string, language: Language): string {
  return `${problemName}.${LANGUAGES[language].sourceExtension}`;
}
