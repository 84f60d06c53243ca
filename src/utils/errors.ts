/*
 * Error taxonomy for a build attempt.
 * Every error carries the process exit code the CLI should terminate with.
 */

export class BuildError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ArgumentError extends BuildError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class ConfigurationError extends BuildError {}

export class UnsupportedLanguageError extends BuildError {
  readonly extension: string;

  constructor(extension: string) {
    super(`Unknown solution extension: ${extension}`);
    this.extension = extension;
  }
}

export class UnsupportedGraderError extends BuildError {
  constructor() {
    super('Grader is not supported.');
  }
}

export class InterpreterNotFoundError extends BuildError {}

export class TemplateNotFoundError extends BuildError {
  readonly templatePath: string;

  constructor(templatePath: string) {
    super(`Template '${templatePath}' does not exist.`);
    this.templatePath = templatePath;
  }
}

export class SandboxIOError extends BuildError {}

export class ArtifactNotProducedError extends BuildError {}

export class IllegalStateError extends BuildError {
  constructor(message: string) {
    super(`Illegal state; ${message}`, 5);
  }
}

function toolExitCode(code: number): number {
  return code > 0 ? code : 1;
}

export class CompileError extends BuildError {
  readonly output: string;

  constructor(command: string, exitCode: number, output: string) {
    super(`'${command}' failed with exit code ${exitCode}`, toolExitCode(exitCode));
    this.output = output;
  }
}

export class ManagerBuildError extends BuildError {
  constructor(message: string, exitCode = 1) {
    super(message, toolExitCode(exitCode));
  }
}

export class HookError extends BuildError {
  constructor(hook: string, exitCode: number) {
    super(`Hook '${hook}' failed with exit code ${exitCode}`, toolExitCode(exitCode));
  }
}
