/**
 * Dependency resolver type definitions.
 */
import type { PackageManager } from '../config/schema.js';
import type { VersionRange } from './version.js';

/**
 * A framework command-line tool installed globally through the package manager.
 */
export interface FrameworkCli {
  /** Display name, e.g. "Vue CLI" */
  label: string;
  /** Executable looked up on PATH */
  binary: string;
  /** Arguments that print the version */
  versionArgs: string[];
  /** npm package that provides the binary */
  packageName: string;
  /** Extra environment for non-interactive runs */
  env?: Record<string, string>;
}

export interface DependencyRequirements {
  runtime: VersionRange;
  packageManager: PackageManager;
  frameworkCli?: FrameworkCli;
}

/**
 * Outcome of verifying one tool. Produced fresh on every run.
 */
export type DependencyCheckResult =
  | { tool: string; status: 'satisfied'; version: string }
  | {
      tool: string;
      status: 'missing';
      reason: string;
      remediation: string;
      /** Set when the tool exists but its version is outside the supported range */
      unsupportedVersion?: string;
    };

/** Runtime range used when a generator does not narrow it. */
export const DEFAULT_RUNTIME_RANGE: VersionRange = { minimum: '20.11.1', maxMajor: 24 };
