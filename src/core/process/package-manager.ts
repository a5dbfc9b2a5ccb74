/**
 * Command lines for the supported package managers.
 */
import type { PackageManager } from '../config/schema.js';
import { formatCommand, runOrThrow, type CommandRunner } from './runner.js';

/**
 * Arguments that add packages as dev dependencies of the project in cwd.
 */
export function devInstallArgs(pm: PackageManager, packages: readonly string[]): string[] {
  switch (pm) {
    case 'yarn':
      return ['add', '--dev', ...packages];
    case 'pnpm':
      return ['add', '--save-dev', ...packages];
    case 'npm':
      return ['install', '--save-dev', ...packages];
  }
}

/**
 * Arguments that install a package globally.
 */
export function globalInstallArgs(pm: PackageManager, pkg: string): string[] {
  switch (pm) {
    case 'yarn':
      return ['global', 'add', pkg];
    case 'pnpm':
      return ['add', '-g', pkg];
    case 'npm':
      return ['install', '-g', pkg];
  }
}

/**
 * The full global install command line, used as a remediation hint.
 */
export function globalInstallCommand(pm: PackageManager, pkg: string): string {
  return formatCommand(pm, globalInstallArgs(pm, pkg));
}

/**
 * Install dev dependencies into a project, throwing on failure.
 */
export async function installDevDependencies(
  runner: CommandRunner,
  pm: PackageManager,
  projectDir: string,
  packages: readonly string[]
): Promise<void> {
  await runOrThrow(runner, pm, devInstallArgs(pm, packages), { cwd: projectDir });
}
