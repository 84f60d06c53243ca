/*
 * Type definitions for the solution compiler.
 * Defines the build request, task configuration, grader and artifact shapes.
 */

export type Language = 'cpp' | 'pas' | 'java' | 'py' | 'py2';

export type LanguageFamily = 'native-two-phase' | 'native-single-phase' | 'bytecode' | 'interpreted';

export type GraderVariant = 'judge' | 'public';

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export type RunnerKind = 'batch' | 'communication' | 'two-steps' | 'other';

export interface LanguageConfig {
  label: string;
  family: LanguageFamily;
  extensions: string[];
  sourceExtension: string;
}

export interface BuildRequest {
  readonly solutionPath: string;
  readonly verbose: boolean;
  readonly graderVariant: GraderVariant;
}

export interface TaskConfig {
  readonly problemName: string;
  readonly problemType: string;
  readonly hasGrader: boolean;
  readonly hasManager: boolean;
}

export interface PathsConfig {
  /** Directory the command was invoked from. */
  readonly workDir: string;
  readonly baseDir: string;
  readonly sandbox: string;
  readonly templates: string;
  readonly internals: string;
  readonly graderDir: string;
  readonly publicDir: string;
  readonly managerDir: string;
  readonly preCompileHook: string;
  readonly postCompileHook: string;
}

export interface CompilerOptions {
  readonly cppOpts: readonly string[];
  readonly pasOpts: readonly string[];
  readonly javacOpts: readonly string[];
  readonly python?: string;
}

export interface WarningConfig {
  readonly file?: string;
  readonly patterns: Readonly<Partial<Record<Language, string>>>;
}

export interface BuildConfig {
  readonly paths: PathsConfig;
  readonly task: TaskConfig;
  readonly compilers: CompilerOptions;
  readonly warnings: WarningConfig;
  readonly defaults: { readonly graderVariant: GraderVariant; readonly verbose: boolean };
  readonly logLevel?: LogLevel;
  readonly platform: NodeJS.Platform;
  readonly colorDiagnostics: boolean;
}

export type GraderSpec =
  | { required: false; variant: 'judge' }
  | { required: true; variant: GraderVariant; baseDir: string; languageDir: string };

export type Artifact =
  | { kind: 'native'; executable: string }
  | { kind: 'archive'; archive: string; entryPoint: string }
  | { kind: 'source'; mainFile: string; interpreter: string };

export interface RunOptions {
  cwd: string;
  env?: Record<string, string>;
  onOutput?: (chunk: string) => void;
}

export interface RunResult {
  exitCode: number;
  output: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<RunResult>;
  commandExists(command: string): Promise<boolean>;
}

export interface BuildResult {
  language: Language;
  grader: GraderSpec;
  artifact: Artifact;
  sandbox: string;
  scripts: { exec: string; run: string };
}
