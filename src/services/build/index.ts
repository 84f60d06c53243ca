/*
 * Solution build orchestrator.
 * Resolves language and grader, prepares the sandbox, runs the language's build
 * strategy and generates the scripts the judging runtime invokes.
 */

import path from 'path';
import type {
  Artifact,
  BuildConfig,
  BuildRequest,
  BuildResult,
  CommandRunner,
  GraderSpec,
  Language
} from '../../types/build.js';
import { LANGUAGES, canonicalSourceName, resolveLanguage } from '../../config/languages.js';
import { SpawnRunner } from '../process.js';
import { ArgumentError } from '../../utils/errors.js';
import { createLogger, levelFor, type Logger } from '../../utils/logger.js';
import { resolveGrader } from './grader.js';
import { ScriptHookRunner, type HookRunner } from './hooks.js';
import { buildManager } from './manager.js';
import { Sandbox, pathExists } from './sandbox.js';
import { STRATEGIES, COMPILE_OUTPUTS, type BuildContext } from './strategies/index.js';
import {
  EXEC_SCRIPT,
  RUN_SCRIPT,
  execTemplateName,
  instantiateTemplate,
  runTemplateName,
  tokensFor
} from './templates.js';
import { checkWarning } from './warnings.js';

export interface SolutionBuilderDeps {
  runner?: CommandRunner;
  hooks?: HookRunner;
  logger?: Logger;
  onOutput?: (chunk: string) => void;
}

export class SolutionBuilder {
  private config: BuildConfig;
  private runner: CommandRunner;
  private deps: SolutionBuilderDeps;
  private onOutput: (chunk: string) => void;

  constructor(config: BuildConfig, deps: SolutionBuilderDeps = {}) {
    this.config = config;
    this.deps = deps;
    this.runner = deps.runner ?? new SpawnRunner();
    this.onOutput = deps.onOutput ?? ((chunk) => { process.stderr.write(chunk); });
  }

  async build(request: BuildRequest): Promise<BuildResult> {
    const { config } = this;
    const { problemName, hasGrader, hasManager, problemType } = config.task;
    const logger = this.deps.logger ?? createLogger(levelFor(request.verbose, config.logLevel));
    const hooks = this.deps.hooks ?? new ScriptHookRunner(
      { pre: config.paths.preCompileHook, post: config.paths.postCompileHook },
      this.runner,
      logger,
      this.onOutput
    );

    const solutionPath = path.resolve(config.paths.workDir, request.solutionPath);
    if (!(await pathExists(solutionPath))) {
      throw new ArgumentError(`Solution file '${request.solutionPath}' does not exist.`);
    }
    logger.debug(`Compiling solution '${request.solutionPath}'.`);

    const language = resolveLanguage(solutionPath);
    logger.debug(`Detected language: ${LANGUAGES[language].label}`);

    const grader = resolveGrader(hasGrader, request.graderVariant, language, config.paths);
    this.logGrader(grader, logger);

    const sandbox = await Sandbox.recreate(config.paths.sandbox, logger);
    const sourceFile = await sandbox.placeSolution(solutionPath, canonicalSourceName(problemName, language));
    const hookEnv = this.hookEnv(solutionPath, grader);

    const artifact = await sandbox.scoped(async (scope) => {
      await scope.writeFile(COMPILE_OUTPUTS, '');
      await hooks.run('pre', scope.dir, hookEnv);

      const ctx: BuildContext = {
        config,
        language,
        sandbox: scope,
        grader,
        runner: this.runner,
        logger,
        sourceFile,
        onOutput: this.onOutput
      };
      const built = await STRATEGIES[language].build(ctx);

      await checkWarning(
        config.warnings.patterns[language],
        scope.path(COMPILE_OUTPUTS),
        config.warnings.file,
        logger
      );
      return built;
    });

    const scripts = await this.generateScripts(sandbox, language, grader, artifact, logger);

    logger.debug(`HAS_MANAGER=${hasManager}`);
    if (hasManager) {
      if (grader.variant === 'judge') {
        logger.debug(`Compiling manager as needed when grader type is ${grader.variant}...`);
        await buildManager({
          managerDir: config.paths.managerDir,
          sandbox,
          runner: this.runner,
          logger,
          onOutput: this.onOutput
        });
      } else {
        logger.debug(`Manager is not needed when grader type is ${grader.variant}.`);
      }
    }

    await hooks.run('post', config.paths.workDir, hookEnv);

    logger.debug(`Problem type '${problemType}' built into '${sandbox.dir}'.`);
    return { language, grader, artifact, sandbox: sandbox.dir, scripts };
  }

  private async generateScripts(
    sandbox: Sandbox,
    language: Language,
    grader: GraderSpec,
    artifact: Artifact,
    logger: Logger
  ): Promise<BuildResult['scripts']> {
    const { templates } = this.config.paths;
    const { problemName, problemType } = this.config.task;
    const tokens = tokensFor(problemName, artifact);

    const exec = await instantiateTemplate(
      path.join(templates, execTemplateName(language)),
      sandbox,
      EXEC_SCRIPT,
      tokens,
      logger
    );
    const run = await instantiateTemplate(
      path.join(templates, runTemplateName(grader.variant, problemType)),
      sandbox,
      RUN_SCRIPT,
      tokens,
      logger
    );
    return { exec, run };
  }

  private logGrader(grader: GraderSpec, logger: Logger): void {
    if (!grader.required) {
      logger.debug('The task does not have grader.');
      return;
    }
    logger.debug('The task has grader.');
    logger.debug(`GRADER_TYPE='${grader.variant}'`);
    logger.debug(`USED_GRADER_DIR='${grader.baseDir}'`);
    logger.debug(`GRADER_LANG_DIR='${grader.languageDir}'`);
  }

  private hookEnv(solutionPath: string, grader: GraderSpec): Record<string, string> {
    const env: Record<string, string> = {
      SOLUTION: solutionPath,
      SANDBOX: this.config.paths.sandbox,
      PROBLEM_NAME: this.config.task.problemName,
      GRADER_TYPE: grader.variant
    };
    if (grader.required) {
      env.USED_GRADER_DIR = grader.baseDir;
      env.GRADER_LANG_DIR = grader.languageDir;
    }
    return env;
  }
}
