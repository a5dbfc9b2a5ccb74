/**
 * Framework generator base class.
 *
 * Step order: dependency check, directory reset, base scaffold, feature
 * installs (type system, linter, CSS framework, formatter, stylesheet linter,
 * test framework, env file), then whatever final steps the caller appends.
 */
import * as path from 'node:path';
import type { Framework, ScaffoldConfig } from '../config/schema.js';
import { DEFAULT_RUNTIME_RANGE, type FrameworkCli } from '../deps/types.js';
import type { VersionRange } from '../deps/version.js';
import { failureOutput, formatCommand } from '../process/runner.js';
import { DirectoryConflictError, ExternalCommandFailedError } from '../../utils/errors.js';
import { ensureDir, fileExists, removeDir } from '../../utils/file-system.js';
import type { TailwindProfile } from '../synth/tailwind.js';
import { runPipeline } from './pipeline.js';
import {
  envFileSteps,
  eslintSteps,
  jestSteps,
  prettierSteps,
  stylelintSteps,
  tailwindSteps,
  typescriptSteps,
  type EslintStepOptions,
} from './features.js';
import type { GenerationContext, PipelineResult, PipelineStep } from './types.js';

const BASE_SCAFFOLD_TIMEOUT_MS = 15 * 60 * 1000;

export interface ScaffoldCommand {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export abstract class FrameworkGenerator {
  abstract readonly framework: Framework;
  abstract readonly displayName: string;
  abstract readonly cli: FrameworkCli;
  readonly runtimeRange: VersionRange = DEFAULT_RUNTIME_RANGE;

  /** Paths (relative to the project) the framework CLI must have produced */
  protected abstract readonly expectedOutputs: readonly string[];
  protected abstract readonly tailwindProfile: TailwindProfile;

  /** The project-generation command, run in the parent directory */
  abstract scaffoldCommand(config: ScaffoldConfig, projectDir: string): ScaffoldCommand;

  protected abstract eslintOptions(config: ScaffoldConfig): EslintStepOptions;

  /** Whether the TypeScript feature step applies to this framework */
  protected supportsTypeScriptFeature(): boolean {
    return true;
  }

  /**
   * Steps for one run, in execution order.
   */
  buildSteps(config: ScaffoldConfig): PipelineStep[] {
    const { features } = config;
    const steps: PipelineStep[] = [this.dependencyStep(), this.directoryResetStep(), this.baseScaffoldStep()];

    if (features.typescript && this.supportsTypeScriptFeature()) steps.push(...typescriptSteps());
    if (features.eslint) steps.push(...eslintSteps(this.eslintOptions(config)));
    if (features.tailwind) steps.push(...tailwindSteps(this.tailwindProfile));
    if (features.prettier) steps.push(...prettierSteps());
    if (features.stylelint) steps.push(...stylelintSteps());
    if (features.tests) steps.push(...jestSteps());
    steps.push(...envFileSteps());

    return steps;
  }

  /**
   * Run the pipeline, followed by `finalSteps` (metadata, version control).
   */
  generate(ctx: GenerationContext, finalSteps: readonly PipelineStep[] = []): Promise<PipelineResult> {
    return runPipeline([...this.buildSteps(ctx.config), ...finalSteps], ctx);
  }

  private dependencyStep(): PipelineStep {
    return {
      id: 'dependency-check',
      label: `Checking ${this.displayName} toolchain`,
      criticality: 'required',
      run: (ctx) =>
        ctx.resolver.ensure({
          runtime: this.runtimeRange,
          packageManager: ctx.config.package_manager,
          frameworkCli: this.cli,
        }),
    };
  }

  /**
   * Remove an existing project directory and recreate it empty.
   * Destructive: callers confirm with the user before generating.
   */
  private directoryResetStep(): PipelineStep {
    return {
      id: 'directory-reset',
      label: 'Preparing project directory',
      criticality: 'required',
      async run(ctx) {
        const { projectDir } = ctx;
        if (path.dirname(projectDir) !== path.resolve(ctx.config.project_path)) {
          throw new DirectoryConflictError(`Refusing to reset ${projectDir}: not a direct child of the project path`);
        }
        if (await fileExists(projectDir)) {
          ctx.logger.warn(`Removing existing directory ${projectDir}`);
          try {
            await removeDir(projectDir);
          } catch (error) {
            throw new DirectoryConflictError(
              `Failed to remove existing project directory ${projectDir}: ${error instanceof Error ? error.message : String(error)}`,
              { projectDir }
            );
          }
        }
        await ensureDir(projectDir);
        ctx.logger.info(`Created project directory: ${projectDir}`);
      },
    };
  }

  private baseScaffoldStep(): PipelineStep {
    return {
      id: 'base-scaffold',
      label: `Creating ${this.displayName} project`,
      criticality: 'required',
      run: async (ctx) => {
        const { command, args, env } = this.scaffoldCommand(ctx.config, ctx.projectDir);
        const cwd = ctx.config.project_path;
        ctx.logger.info(`Running command: ${formatCommand(command, args)} in ${cwd}`);

        const result = await ctx.runner.run(command, args, { cwd, env, timeoutMs: BASE_SCAFFOLD_TIMEOUT_MS });
        if (!result.success) {
          throw new ExternalCommandFailedError(
            formatCommand(command, args),
            `${this.displayName} project creation failed: ${failureOutput(result)}`,
            { exitCode: result.exitCode }
          );
        }

        const missing: string[] = [];
        for (const expected of this.expectedOutputs) {
          if (!(await fileExists(path.join(ctx.projectDir, expected)))) {
            missing.push(expected);
          }
        }
        if (missing.length > 0) {
          throw new ExternalCommandFailedError(
            formatCommand(command, args),
            `${this.displayName} project creation reported success but ${missing.join(', ')} ` +
              `${missing.length === 1 ? 'is' : 'are'} missing from ${ctx.projectDir}`
          );
        }
        ctx.logger.info(`${this.displayName} project created`);
      },
    };
  }
}
