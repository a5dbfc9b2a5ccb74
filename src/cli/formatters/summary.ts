/**
 * Human-readable run and doctor summaries.
 */
import chalk from 'chalk';
import type { Framework, PackageManager } from '../../core/config/schema.js';
import type { DependencyCheckResult } from '../../core/deps/types.js';
import type { PipelineStep, StepReport } from '../../core/generators/types.js';
import type { CreateProjectResult } from '../../core/scaffolder.js';

const DEV_SCRIPTS: Record<Framework, string> = {
  vue: 'serve',
  angular: 'start',
};

const STATUS_ICONS: Record<StepReport['status'], string> = {
  succeeded: chalk.green('✓'),
  failed: chalk.red('✗'),
  skipped: chalk.gray('-'),
};

export function formatStepPlan(steps: readonly PipelineStep[]): string {
  return steps
    .map((step, index) => {
      const tag = step.criticality === 'best-effort' ? chalk.gray(' (best-effort)') : '';
      return `  ${index + 1}. ${step.label}${tag}`;
    })
    .join('\n');
}

export function formatStepReports(steps: readonly StepReport[]): string {
  return steps
    .map((step) => {
      const timing = step.status === 'skipped' ? '' : chalk.gray(` ${step.durationMs}ms`);
      const error = step.error ? chalk.red(` - ${step.error}`) : '';
      return `  ${STATUS_ICONS[step.status]} ${step.label}${timing}${error}`;
    })
    .join('\n');
}

export function formatNextSteps(
  projectName: string,
  framework: Framework,
  packageManager: PackageManager
): string {
  return [
    chalk.bold('Next steps:'),
    `  cd ${projectName}`,
    `  ${packageManager} run ${DEV_SCRIPTS[framework]}`,
  ].join('\n');
}

export function formatFailure(result: Extract<CreateProjectResult, { success: false }>): string {
  const lines = [chalk.red(`Failed at step "${result.failedStep}": ${result.error.message}`)];
  if (result.error.remediation) {
    lines.push(chalk.yellow(`  Fix: ${result.error.remediation}`));
  }
  return lines.join('\n');
}

export function formatDependencyChecks(results: readonly DependencyCheckResult[]): string {
  const width = Math.max(...results.map((r) => r.tool.length));
  return results
    .map((result) => {
      const name = result.tool.padEnd(width);
      if (result.status === 'satisfied') {
        return `  ${chalk.green('✓')} ${name}  ${result.version}`;
      }
      return `  ${chalk.red('✗')} ${name}  ${result.reason}\n    ${chalk.yellow(result.remediation)}`;
    })
    .join('\n');
}
