/**
 * Scaffolder: the single entry point that turns answers into a project.
 *
 * Validates the configuration, picks the generator for the framework tag and
 * appends the cross-cutting steps (metadata, version control) to its pipeline.
 */
import { buildScaffoldConfig, getProjectDir } from './config/loader.js';
import type { ScaffoldConfig } from './config/schema.js';
import { DependencyResolver } from './deps/resolver.js';
import type { HttpClient } from './deps/network.js';
import type { SecretPrompt } from './deps/privilege.js';
import { getGenerator } from './generators/registry.js';
import type { GenerationContext, PipelineStep, StepReport } from './generators/types.js';
import { writeScaffoldMetadata, METADATA_FILE } from './metadata/writer.js';
import { ToolRunner, type CommandRunner } from './process/runner.js';
import { initRepository } from './vcs/git-init.js';
import { FilesystemError, toScaffolderError, type ScaffolderError } from '../utils/errors.js';
import { createRunLogger, type Logger } from '../utils/logger.js';

export interface CreateProjectOptions {
  /** Logger for this run; built from `logFile` when omitted */
  logger?: Logger;
  /** Log file for the default logger */
  logFile?: string;
  runner?: CommandRunner;
  http?: HttpClient;
  /** Asked for the sudo password when non-interactive sudo is unavailable */
  promptSecret?: SecretPrompt;
  /** Directory for temporary install files */
  tempRoot?: string;
}

export type CreateProjectResult =
  | { success: true; projectDir: string; steps: StepReport[]; warnings: string[] }
  | { success: false; error: ScaffolderError; failedStep: string; steps: StepReport[]; warnings: string[] };

const metadataStep: PipelineStep = {
  id: 'metadata',
  label: 'Writing scaffold metadata',
  criticality: 'best-effort',
  async run(ctx) {
    const written = await writeScaffoldMetadata(ctx.projectDir, ctx.config, ctx.logger);
    if (!written) {
      throw new FilesystemError(`Could not write ${METADATA_FILE}`);
    }
  },
};

const gitStep: PipelineStep = {
  id: 'git-init',
  label: 'Initializing Git repository',
  criticality: 'best-effort',
  async run(ctx) {
    // Every generated project is an npm package
    await initRepository(ctx.runner, ctx.projectDir, ctx.logger, 'node');
  },
};

function finalSteps(config: ScaffoldConfig): PipelineStep[] {
  return config.git ? [metadataStep, gitStep] : [metadataStep];
}

/**
 * Every step a run with this configuration would execute, in order.
 */
export function planSteps(config: ScaffoldConfig): PipelineStep[] {
  return [...getGenerator(config.framework).buildSteps(config), ...finalSteps(config)];
}

/**
 * Generate a project. Never throws: every failure is logged and returned.
 * An existing `<project_path>/<project_name>` directory is deleted first.
 */
export async function createProject(input: unknown, options: CreateProjectOptions = {}): Promise<CreateProjectResult> {
  const logger = options.logger ?? createRunLogger({ logFile: options.logFile });

  let config: ScaffoldConfig;
  try {
    config = await buildScaffoldConfig(input);
  } catch (thrown) {
    const error = toScaffolderError(thrown, 'Invalid configuration');
    logger.error(`Project creation failed: ${error.message}`);
    return { success: false, error, failedStep: 'config', steps: [], warnings: [] };
  }

  const projectDir = getProjectDir(config);
  logger.info(`Creating project: ${config.project_name} at ${config.project_path}`);

  const runner = options.runner ?? new ToolRunner(logger);
  const ctx: GenerationContext = {
    config,
    projectDir,
    runner,
    logger,
    resolver: new DependencyResolver({
      runner,
      logger,
      http: options.http,
      promptSecret: options.promptSecret,
      tempRoot: options.tempRoot,
    }),
  };

  const result = await getGenerator(config.framework).generate(ctx, finalSteps(config));

  if (!result.success) {
    logger.error(`Project creation failed: ${result.error.message}`);
    return result;
  }

  logger.success(`Project '${config.project_name}' created successfully`);
  return { success: true, projectDir, steps: result.steps, warnings: result.warnings };
}
