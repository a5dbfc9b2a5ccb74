/**
 * Dependency resolver exports barrel file.
 */
export { DependencyResolver } from './resolver.js';
export type { DependencyResolverOptions } from './resolver.js';
export { checkRuntime, checkPackageManager, checkFrameworkCli, nodeRemediation } from './checks.js';
export { FetchHttpClient, checkNetwork, nodeSetupScriptUrl, NODESOURCE_HOST } from './network.js';
export type { HttpClient } from './network.js';
export { acquirePrivileges, PrivilegedRunner } from './privilege.js';
export type { SecretPrompt } from './privilege.js';
export { withTempFile } from './temp-file.js';
export { parseVersion, compareVersions, isVersionInRange, describeRange } from './version.js';
export type { ParsedVersion, VersionRange } from './version.js';
export { DEFAULT_RUNTIME_RANGE } from './types.js';
export type { DependencyCheckResult, DependencyRequirements, FrameworkCli } from './types.js';
