/**
 * Feature steps shared by the framework generators.
 *
 * Every feature changes package.json, so its install and config steps are
 * required: a half-installed feature aborts the run. Auto-fix and
 * interactive-initializer passes are best-effort.
 */
import { DEFAULT_PRETTIER_OPTIONS, EslintOptionsSchema, JestOptionsSchema, StylelintOptionsSchema } from '../config/schema.js';
import { installDevDependencies } from '../process/package-manager.js';
import { failureOutput } from '../process/runner.js';
import { ExternalCommandFailedError } from '../../utils/errors.js';
import {
  ensureEslintConfig,
  ensureTsConfig,
  eslintPackages,
  importStylesheet,
  injectTailwindDirectives,
  jestPackages,
  PRETTIER_PACKAGES,
  stylelintPackages,
  TAILWIND_PACKAGES,
  TYPESCRIPT_PACKAGES,
  writeEnvFile,
  writeJestConfig,
  writePrettierConfig,
  writeStylelintConfig,
  writeTailwindConfigs,
  type EslintSetup,
  type TailwindProfile,
} from '../synth/index.js';
import type { GenerationContext, PipelineStep } from './types.js';

const AUTOFIX_TIMEOUT_MS = 5 * 60 * 1000;

/** A command run inside the project directory. */
export interface ProjectCommand {
  command: string;
  args: string[];
  /** Answers fed on stdin */
  input?: string;
}

function eslintSetup(ctx: GenerationContext): EslintSetup {
  const options = ctx.config.eslint ?? EslintOptionsSchema.parse({});
  return {
    framework: ctx.config.framework,
    preset: options.preset,
    typescript: ctx.config.features.typescript,
    rules: options.rules,
  };
}

async function runProjectCommand(ctx: GenerationContext, label: string, cmd: ProjectCommand): Promise<void> {
  const result = await ctx.runner.run(cmd.command, cmd.args, {
    cwd: ctx.projectDir,
    input: cmd.input,
    timeoutMs: AUTOFIX_TIMEOUT_MS,
  });
  if (!result.success) {
    throw new ExternalCommandFailedError(cmd.command, `${label}: ${failureOutput(result)}`);
  }
}

export function typescriptSteps(): PipelineStep[] {
  return [
    {
      id: 'typescript',
      label: 'Installing TypeScript',
      criticality: 'required',
      async run(ctx) {
        await installDevDependencies(ctx.runner, ctx.config.package_manager, ctx.projectDir, TYPESCRIPT_PACKAGES);
        const { file, written } = await ensureTsConfig(ctx.projectDir);
        ctx.logger.info(written ? `Created ${file}` : `Kept existing ${file}`);
      },
    },
  ];
}

export interface EslintStepOptions {
  /** The linter's own initializer, answered on stdin (best-effort) */
  init?: ProjectCommand;
  /** Fix pass run once the config is written (best-effort) */
  autofix: ProjectCommand;
}

export function eslintSteps(options: EslintStepOptions): PipelineStep[] {
  const steps: PipelineStep[] = [
    {
      id: 'eslint',
      label: 'Installing ESLint',
      criticality: 'required',
      async run(ctx) {
        const setup = eslintSetup(ctx);
        ctx.logger.info(`Installing ESLint with config ${setup.preset}`);
        await installDevDependencies(ctx.runner, ctx.config.package_manager, ctx.projectDir, eslintPackages(setup));
      },
    },
  ];

  const init = options.init;
  if (init) {
    steps.push({
      id: 'eslint-init',
      label: 'Initializing ESLint',
      criticality: 'best-effort',
      run: (ctx) => runProjectCommand(ctx, 'ESLint initializer failed', init),
    });
  }

  steps.push(
    {
      id: 'eslint-config',
      label: 'Writing ESLint config',
      criticality: 'required',
      async run(ctx) {
        const file = await ensureEslintConfig(ctx.projectDir, eslintSetup(ctx));
        ctx.logger.info(`Applied ESLint rules to ${file}`);
      },
    },
    {
      id: 'eslint-autofix',
      label: 'Running ESLint auto-fix',
      criticality: 'best-effort',
      run: (ctx) => runProjectCommand(ctx, 'ESLint auto-fix failed', options.autofix),
    }
  );
  return steps;
}

export function tailwindSteps(profile: TailwindProfile): PipelineStep[] {
  return [
    {
      id: 'tailwind',
      label: 'Installing Tailwind CSS',
      criticality: 'required',
      async run(ctx) {
        await installDevDependencies(ctx.runner, ctx.config.package_manager, ctx.projectDir, TAILWIND_PACKAGES);
        const files = await writeTailwindConfigs(ctx.projectDir, profile, ctx.config.tailwind);
        for (const file of files) {
          ctx.logger.info(`Created ${file}`);
        }
        const injection = await injectTailwindDirectives(
          ctx.projectDir,
          profile,
          ctx.config.tailwind?.stylesheet_mode ?? 'append'
        );
        ctx.logger.info(`Tailwind directives ${injection.action}: ${injection.file}`);
        if (injection.action === 'created') {
          const entry = await importStylesheet(ctx.projectDir, profile, injection.file);
          if (entry) {
            ctx.logger.info(`Imported ${injection.file} from ${entry}`);
          }
        }
      },
    },
  ];
}

export function prettierSteps(): PipelineStep[] {
  return [
    {
      id: 'prettier',
      label: 'Installing Prettier',
      criticality: 'required',
      async run(ctx) {
        const options = ctx.config.prettier ?? DEFAULT_PRETTIER_OPTIONS;
        await installDevDependencies(ctx.runner, ctx.config.package_manager, ctx.projectDir, PRETTIER_PACKAGES);
        const file = await writePrettierConfig(ctx.projectDir, options);
        ctx.logger.info(`Applied Prettier config to ${file}`);
      },
    },
  ];
}

export function stylelintSteps(): PipelineStep[] {
  return [
    {
      id: 'stylelint',
      label: 'Installing Stylelint',
      criticality: 'required',
      async run(ctx) {
        const options = ctx.config.stylelint ?? StylelintOptionsSchema.parse({});
        await installDevDependencies(
          ctx.runner,
          ctx.config.package_manager,
          ctx.projectDir,
          stylelintPackages(options)
        );
        const file = await writeStylelintConfig(ctx.projectDir, options);
        ctx.logger.info(`Created ${file}`);
      },
    },
  ];
}

export function jestSteps(): PipelineStep[] {
  return [
    {
      id: 'jest',
      label: 'Installing Jest',
      criticality: 'required',
      async run(ctx) {
        const setup = {
          framework: ctx.config.framework,
          typescript: ctx.config.features.typescript,
          options: ctx.config.jest ?? JestOptionsSchema.parse({}),
        };
        await installDevDependencies(ctx.runner, ctx.config.package_manager, ctx.projectDir, jestPackages(setup));
        const files = await writeJestConfig(ctx.projectDir, setup);
        for (const file of files) {
          ctx.logger.info(`Created ${file}`);
        }
      },
    },
  ];
}

export function envFileSteps(): PipelineStep[] {
  return [
    {
      id: 'env-file',
      label: 'Writing environment file',
      criticality: 'required',
      async run(ctx) {
        const file = await writeEnvFile(ctx.projectDir, ctx.config.env);
        if (file) {
          ctx.logger.info(`Applied environment variables to ${file}`);
        }
      },
    },
  ];
}
