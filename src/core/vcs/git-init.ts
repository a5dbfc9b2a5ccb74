/**
 * Git repository initialization for generated projects.
 */
import * as path from 'node:path';
import { fileExists, listDir, writeFile } from '../../utils/file-system.js';
import { GitSetupError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { failureOutput, type CommandRunner } from '../process/runner.js';
import { GITIGNORE_TEMPLATES, type ProjectKind } from './gitignore-templates.js';

/** Default timeout for git commands in milliseconds */
const GIT_COMMAND_TIMEOUT_MS = 10000;

export type GitInitOutcome = 'initialized' | 'already-initialized';

/**
 * Heuristic project kind: a manifest file wins, then Python sources, else generic.
 */
export async function detectProjectKind(projectDir: string): Promise<ProjectKind> {
  if (await fileExists(path.join(projectDir, 'package.json'))) {
    return 'node';
  }
  if (await fileExists(path.join(projectDir, 'requirements.txt'))) {
    return 'python';
  }
  const entries = await listDir(projectDir);
  return entries.some((entry) => entry.endsWith('.py')) ? 'python' : 'default';
}

/**
 * Initialize a repository at `projectDir`. A no-op when `.git` already exists.
 * `.gitignore` is written only when missing; `kindHint` skips detection.
 *
 * @throws GitSetupError when `git init` fails
 */
export async function initRepository(
  runner: CommandRunner,
  projectDir: string,
  log: Logger,
  kindHint?: ProjectKind
): Promise<GitInitOutcome> {
  if (await fileExists(path.join(projectDir, '.git'))) {
    log.info('Git already initialized');
    return 'already-initialized';
  }

  const result = await runner.run('git', ['init'], { cwd: projectDir, timeoutMs: GIT_COMMAND_TIMEOUT_MS });
  if (!result.success) {
    const output = failureOutput(result);
    log.error(`Git initialization failed: ${output}`);
    throw new GitSetupError('Git setup failed.', { output, notFound: result.notFound === true });
  }
  log.info('Initialized Git repository');

  const gitignorePath = path.join(projectDir, '.gitignore');
  if (!(await fileExists(gitignorePath))) {
    const kind = kindHint ?? (await detectProjectKind(projectDir));
    await writeFile(gitignorePath, GITIGNORE_TEMPLATES[kind]);
    log.info(`.gitignore created for ${kind} project`);
  }

  return 'initialized';
}
