/**
 * Verification of installed tools. Checks never mutate anything.
 */
import type { PackageManager } from '../config/schema.js';
import type { Logger } from '../../utils/logger.js';
import type { CommandRunner } from '../process/runner.js';
import { globalInstallCommand } from '../process/package-manager.js';
import { describeRange, isVersionInRange, parseVersion, type VersionRange } from './version.js';
import type { DependencyCheckResult, FrameworkCli } from './types.js';

export const VERSION_CHECK_TIMEOUT_MS = 30000;

/**
 * Manual install command for the Node.js runtime.
 */
export function nodeRemediation(range: VersionRange): string {
  const major = parseVersion(range.minimum)?.major ?? 20;
  return (
    'Run: sudo apt-get update && sudo apt-get install -y curl && ' +
    `curl -fsSL https://deb.nodesource.com/setup_${major}.x | sudo -E bash - && sudo apt-get install -y nodejs`
  );
}

export async function checkRuntime(
  runner: CommandRunner,
  range: VersionRange,
  log: Logger
): Promise<DependencyCheckResult> {
  const remediation = nodeRemediation(range);
  const result = await runner.run('node', ['--version'], { timeoutMs: VERSION_CHECK_TIMEOUT_MS });
  if (!result.success) {
    log.info('Node.js not installed or not found in PATH');
    return { tool: 'node', status: 'missing', reason: 'Node.js is not installed.', remediation };
  }

  const raw = result.stdout.trim();
  const version = parseVersion(raw);
  if (!version) {
    log.warn(`Could not parse Node.js version: ${raw}`);
    return { tool: 'node', status: 'missing', reason: `Unrecognized Node.js version "${raw}".`, remediation };
  }

  log.info(`Node.js found: ${raw}`);
  if (!isVersionInRange(version, range)) {
    log.warn(`Node.js version ${raw} is not supported (required: ${describeRange(range)})`);
    return {
      tool: 'node',
      status: 'missing',
      reason: `Node.js version ${raw} is not supported (required: ${describeRange(range)}).`,
      remediation,
      unsupportedVersion: raw,
    };
  }

  return { tool: 'node', status: 'satisfied', version: raw };
}

export async function checkPackageManager(
  runner: CommandRunner,
  pm: PackageManager,
  log: Logger
): Promise<DependencyCheckResult> {
  const result = await runner.run(pm, ['--version'], { timeoutMs: VERSION_CHECK_TIMEOUT_MS });
  if (!result.success) {
    log.info(`${pm} not installed or not found in PATH`);
    const remediation = pm === 'npm' ? 'Reinstall Node.js, which ships with npm.' : `Run: npm install -g ${pm}`;
    return { tool: pm, status: 'missing', reason: `${pm} is not installed.`, remediation };
  }
  const version = result.stdout.trim();
  log.info(`${pm} found: ${version}`);
  return { tool: pm, status: 'satisfied', version };
}

export async function checkFrameworkCli(
  runner: CommandRunner,
  cli: FrameworkCli,
  pm: PackageManager,
  log: Logger
): Promise<DependencyCheckResult> {
  const result = await runner.run(cli.binary, cli.versionArgs, {
    timeoutMs: VERSION_CHECK_TIMEOUT_MS,
    env: cli.env,
  });
  if (!result.success) {
    log.info(`${cli.label} not installed or not found in PATH`);
    return {
      tool: cli.binary,
      status: 'missing',
      reason: `${cli.label} is not installed.`,
      remediation: `Run: ${globalInstallCommand(pm, cli.packageName)}`,
    };
  }
  const version = firstLine(result.stdout);
  log.info(`${cli.label} found: ${version}`);
  return { tool: cli.binary, status: 'satisfied', version };
}

function firstLine(output: string): string {
  return output.trim().split('\n').find((line) => line.trim().length > 0)?.trim() ?? '';
}
