/**
 * Doctor command - reports whether the toolchain a framework needs is installed.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { FrameworkSchema, PackageManagerSchema } from '../../core/config/schema.js';
import { DependencyResolver } from '../../core/deps/resolver.js';
import { getGenerator } from '../../core/generators/registry.js';
import { ToolRunner } from '../../core/process/runner.js';
import { InvalidConfigError } from '../../utils/errors.js';
import { createRunLogger, logger as log } from '../../utils/logger.js';
import { formatDependencyChecks } from '../formatters/summary.js';

interface DoctorOptions {
  framework: string;
  packageManager: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create the doctor command.
 */
export function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check Node.js, the package manager and the framework CLI without installing anything')
    .option('-f, --framework <name>', 'Framework: vue, angular', 'vue')
    .option('--package-manager <pm>', 'Package manager: npm, yarn, pnpm', 'npm')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: DoctorOptions) => {
      try {
        const ok = await runDoctor(options);
        if (!ok) process.exit(1);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

async function runDoctor(options: DoctorOptions): Promise<boolean> {
  const framework = FrameworkSchema.safeParse(options.framework);
  if (!framework.success) {
    throw new InvalidConfigError('framework', `Unknown framework: ${options.framework}. Use: ${FrameworkSchema.options.join(', ')}`);
  }
  const packageManager = PackageManagerSchema.safeParse(options.packageManager);
  if (!packageManager.success) {
    throw new InvalidConfigError(
      'package_manager',
      `Unknown package manager: ${options.packageManager}. Use: ${PackageManagerSchema.options.join(', ')}`
    );
  }

  const logger = createRunLogger({ level: options.verbose ? 'debug' : 'warn' });
  const generator = getGenerator(framework.data);
  const resolver = new DependencyResolver({ runner: new ToolRunner(logger), logger });
  const results = await resolver.check({
    runtime: generator.runtimeRange,
    packageManager: packageManager.data,
    frameworkCli: generator.cli,
  });
  const allSatisfied = results.every((r) => r.status === 'satisfied');

  if (options.json) {
    console.log(JSON.stringify({ framework: framework.data, ok: allSatisfied, results }, null, 2));
    return allSatisfied;
  }

  console.log(chalk.bold(`${generator.displayName} toolchain:`));
  console.log(formatDependencyChecks(results));
  if (!allSatisfied) {
    console.log(chalk.yellow('\nMissing tools are installed automatically by "create".'));
  }
  return allSatisfied;
}
