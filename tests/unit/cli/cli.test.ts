/**
 * Tests for the CLI program.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createCli } from '../../../src/cli/index.js';
import { resolveAnswers } from '../../../src/cli/commands/create.js';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir.js';

describe('createCli', () => {
  it('should register the create and doctor commands', () => {
    const program = createCli();

    expect(program.name()).toBe('frontend-scaffolder');
    expect(program.commands.map((c) => c.name())).toEqual(['create', 'doctor']);
  });

  it('should print the resolved configuration on a dry run', async () => {
    const tempDir = makeTempDir('cli');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      await createCli().parseAsync(
        ['create', 'demo-app', '-f', 'vue', '--path', tempDir, '--eslint', '--no-git', '--dry-run'],
        { from: 'user' }
      );

      const output = log.mock.calls.map((args) => String(args[0])).join('\n');
      expect(output).toContain('project_name: demo-app');
      expect(output).toContain('Running ESLint auto-fix');
      expect(output).not.toContain('Initializing Git repository');
    } finally {
      log.mockRestore();
      removeTempDir(tempDir);
    }
  });

  it('should reject a missing project path without creating it', async () => {
    const tempDir = makeTempDir('cli');
    const missing = join(tempDir, 'typo');
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    try {
      await expect(
        createCli().parseAsync(['create', 'demo-app', '-f', 'vue', '--path', missing, '--yes'], { from: 'user' })
      ).rejects.toThrow('process.exit called');

      expect(exit).toHaveBeenCalledWith(1);
      const output = error.mock.calls.map((args) => String(args[0])).join('\n');
      expect(output).toContain(`Project path does not exist or is not a directory: ${missing}`);
      expect(existsSync(missing)).toBe(false);
    } finally {
      error.mockRestore();
      exit.mockRestore();
      removeTempDir(tempDir);
    }
  });
});

describe('resolveAnswers', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('answers');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should let flags override the answers file', async () => {
    const file = join(tempDir, 'answers.yaml');
    writeFileSync(file, `project_name: from-file\nproject_path: ${tempDir}\nframework: vue\nfeatures:\n  eslint: true\n`);

    const answers = await resolveAnswers(undefined, { config: file, framework: 'angular', tests: true });

    expect(answers).toEqual({
      project_name: 'from-file',
      project_path: tempDir,
      framework: 'angular',
      features: { eslint: true, tests: true },
    });
  });

  it('should read the env file contents', async () => {
    const envFile = join(tempDir, 'app.env');
    writeFileSync(envFile, 'TOKEN=test-secret\n');

    const answers = await resolveAnswers('demo', { envFile });

    expect(answers.env).toBe('TOKEN=test-secret\n');
    expect(answers.project_path).toBe(process.cwd());
  });
});
