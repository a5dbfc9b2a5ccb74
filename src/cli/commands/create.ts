/**
 * Create command - generates a new front-end project.
 *
 * Usage:
 *   frontend-scaffolder create demo-app -f vue --typescript --eslint --tailwind
 *   frontend-scaffolder create shop -f angular --tests --no-git
 *   frontend-scaffolder create --config answers.yaml --yes
 */
import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import { buildScaffoldConfig, getProjectDir, loadAnswersFile, mergeAnswers, type Answers } from '../../core/config/loader.js';
import { createProject, planSteps } from '../../core/scaffolder.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { createRunLogger, logger as log } from '../../utils/logger.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { askConfirmation, askSecret } from '../prompts.js';
import { formatFailure, formatNextSteps, formatStepPlan, formatStepReports } from '../formatters/summary.js';
import { answersFromOptions, type CreateOptions } from './create-options.js';

/**
 * Create the create command.
 */
export function createCreateCommand(): Command {
  return new Command('create')
    .description('Generate a new Vue or Angular project')
    .argument('[name]', 'Project name (letters, digits, hyphens, underscores)')
    .option('-p, --path <dir>', 'Parent directory for the project (default: current directory)')
    .option('-f, --framework <name>', 'Framework: vue, angular')
    .option('--package-manager <pm>', 'Package manager: npm, yarn, pnpm')
    .option('--style <lang>', 'Stylesheet language: css, scss, sass, less')
    .option('--routing', 'Include the router')
    .option('--no-routing', 'Skip the router')
    .option('--typescript', 'Add TypeScript')
    .option('--eslint', 'Add ESLint')
    .option('--eslint-preset <name>', 'Shareable config appended to ESLint extends')
    .option('--eslint-rules <json>', 'ESLint rules as JSON, bare or wrapped in {"rules": ...}')
    .option('--tailwind', 'Add Tailwind CSS')
    .option('--stylesheet-mode <mode>', 'Tailwind directives: append, replace')
    .option('--prettier', 'Add Prettier')
    .option('--prettier-config <json>', 'Prettier options as JSON')
    .option('--stylelint', 'Add Stylelint')
    .option('--tests', 'Add Jest')
    .option('--standalone', 'Angular: standalone components')
    .option('--no-standalone', 'Angular: NgModule-based application')
    .option('--ssr', 'Angular: server-side rendering')
    .option('--git', 'Initialize a Git repository')
    .option('--no-git', 'Skip Git initialization')
    .option('--env-file <path>', 'File whose contents become the project .env')
    .option('-c, --config <path>', 'Answers file (YAML or JSON); flags override it')
    .option('--log-file <path>', 'Log file (default: <path>/logs/scaffold.log)')
    .option('-y, --yes', 'Delete an existing project directory without asking')
    .option('--dry-run', 'Print the resolved configuration and steps without running them')
    .option('-v, --verbose', 'Show debug output')
    .addHelpText('after', `
Examples:
  # Vue with TypeScript, ESLint and Tailwind
  frontend-scaffolder create demo-app -f vue --typescript --eslint --tailwind

  # Angular with Jest, no Git
  frontend-scaffolder create shop -f angular --tests --no-git

  # Answers from a file, overriding the framework
  frontend-scaffolder create --config answers.yaml -f angular
`)
    .action(async (name: string | undefined, options: CreateOptions) => {
      try {
        const ok = await runCreate(name, options);
        if (!ok) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Resolve answers from the answers file and flags. Flags win.
 */
export async function resolveAnswers(name: string | undefined, options: CreateOptions): Promise<Answers> {
  const fileAnswers = options.config ? await loadAnswersFile(options.config) : {};
  const envText = options.envFile ? await readFile(path.resolve(options.envFile)) : undefined;
  return mergeAnswers({ project_path: process.cwd() }, fileAnswers, answersFromOptions(name, options, envText));
}

async function runCreate(name: string | undefined, options: CreateOptions): Promise<boolean> {
  const answers = await resolveAnswers(name, options);
  // Validate before the run logger exists: its file sink creates <project_path>/logs
  const config = await buildScaffoldConfig(answers);

  if (options.dryRun) {
    console.log(chalk.bold('Configuration:'));
    console.log(stringifyYaml(config));
    console.log(chalk.bold('Steps:'));
    console.log(formatStepPlan(planSteps(config)));
    return true;
  }

  const target = getProjectDir(config);
  if (!options.yes && (await fileExists(target))) {
    const answer = await askConfirmation(`Directory ${target} exists and will be deleted. Continue? (y/N) `);
    if (answer !== 'y' && answer !== 'yes') {
      log.info('Cancelled.');
      return true;
    }
  }

  const runLogger = createRunLogger({
    logFile: options.logFile ?? path.join(config.project_path, 'logs', 'scaffold.log'),
    level: options.verbose ? 'debug' : 'info',
  });
  const result = await createProject(config, { logger: runLogger, promptSecret: askSecret });

  if (result.steps.length > 0) {
    console.log('');
    console.log(formatStepReports(result.steps));
  }

  for (const warning of result.warnings) {
    log.warn(warning);
  }

  if (!result.success) {
    console.log(formatFailure(result));
    return false;
  }

  console.log('');
  console.log(formatNextSteps(config.project_name, config.framework, config.package_manager));
  return true;
}
