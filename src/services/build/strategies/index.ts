import type { Language } from '../../../types/build.js';
import type { BuildStrategy } from './context.js';
import { cppStrategy } from './cpp.js';
import { javaStrategy } from './java.js';
import { pascalStrategy } from './pascal.js';
import { pythonStrategy } from './python.js';

export const STRATEGIES: Record<Language, BuildStrategy> = {
  cpp: cppStrategy,
  pas: pascalStrategy,
  java: javaStrategy,
  py: pythonStrategy,
  py2: pythonStrategy
};

export { COMPILE_OUTPUTS } from './context.js';
export type { BuildContext, BuildStrategy } from './context.js';
