/**
 * Front-end project scaffolder.
 * Main library exports barrel file.
 */

// Entry point
export { createProject, planSteps, type CreateProjectOptions, type CreateProjectResult } from './core/scaffolder.js';

// Configuration
export * from './core/config/index.js';

// Dependency resolution
export * from './core/deps/index.js';

// Generators
export * from './core/generators/index.js';

// Config file synthesis
export * from './core/synth/index.js';

// Version control
export { initRepository, detectProjectKind } from './core/vcs/git-init.js';
export { GITIGNORE_TEMPLATES, type ProjectKind } from './core/vcs/gitignore-templates.js';

// Metadata
export {
  METADATA_FILE,
  SCAFFOLDER_VERSION,
  ScaffoldMetadataSchema,
  buildScaffoldMetadata,
  readScaffoldMetadata,
  writeScaffoldMetadata,
} from './core/metadata/writer.js';

// Process execution
export { ToolRunner, runOrThrow, formatCommand, failureOutput } from './core/process/runner.js';
export type { CommandRunner, RunOptions, ToolInvocationResult } from './core/process/runner.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
