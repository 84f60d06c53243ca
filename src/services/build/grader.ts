import path from 'path';
import type { GraderSpec, GraderVariant, Language, PathsConfig } from '../../types/build.js';
import { UnsupportedGraderError } from '../../utils/errors.js';

export function resolveGrader(
  hasGrader: boolean,
  variant: GraderVariant,
  language: Language,
  paths: PathsConfig
): GraderSpec {
  if (!hasGrader) {
    if (variant === 'public') {
      throw new UnsupportedGraderError();
    }
    // run.sh selection still uses the judge templates
    return { required: false, variant: 'judge' };
  }

  const baseDir = variant === 'judge' ? paths.graderDir : paths.publicDir;
  return {
    required: true,
    variant,
    baseDir,
    languageDir: path.join(baseDir, language)
  };
}
