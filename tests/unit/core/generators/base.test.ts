/**
 * Tests for the shared generator steps: toolchain, directory reset and base scaffold.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { VueGenerator } from '../../../../src/core/generators/vue.js';
import { makeContext } from '../../../helpers/context.js';
import { FakeRunner, fail, ok, withHealthyToolchain, withVueCli } from '../../../helpers/fake-runner.js';
import { makeTempDir, removeTempDir } from '../../../helpers/temp-dir.js';

vi.mock('../../../../src/utils/file-system.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../../src/utils/file-system.js')>();
  return {
    ...actual,
    removeDir: vi.fn(actual.removeDir),
  };
});

import { removeDir } from '../../../../src/utils/file-system.js';

const mockRemoveDir = vi.mocked(removeDir);

describe('FrameworkGenerator.generate', () => {
  let tempDir: string;
  const answers = () => ({ project_name: 'demo-app', project_path: tempDir, framework: 'vue', git: false });

  beforeEach(() => {
    tempDir = makeTempDir('generate');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should delete an existing project directory before generating', async () => {
    const projectDir = join(tempDir, 'demo-app');
    mkdirSync(join(projectDir, 'old'), { recursive: true });
    writeFileSync(join(projectDir, 'old', 'stale.js'), '');
    const { ctx } = await makeContext(answers(), withVueCli(withHealthyToolchain(new FakeRunner())));

    const result = await new VueGenerator().generate(ctx);

    expect(result.success).toBe(true);
    expect(existsSync(join(projectDir, 'old'))).toBe(false);
    expect(existsSync(join(projectDir, 'package.json'))).toBe(true);
  });

  it('should abort without recreating anything when the existing directory cannot be removed', async () => {
    const projectDir = join(tempDir, 'demo-app');
    mkdirSync(projectDir);
    writeFileSync(join(projectDir, 'keep.txt'), 'old');
    mockRemoveDir.mockRejectedValueOnce(new Error('EBUSY: resource busy or locked'));
    const { ctx, runner } = await makeContext(answers(), withVueCli(withHealthyToolchain(new FakeRunner())));

    const result = await new VueGenerator().generate(ctx);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.failedStep).toBe('directory-reset');
      expect(result.error.code).toBe('G001');
      expect(result.error.message).toBe(
        `Failed to remove existing project directory ${projectDir}: EBUSY: resource busy or locked`
      );
    }
    expect(runner.callsTo('vue create')).toEqual([]);
    expect(existsSync(join(projectDir, 'keep.txt'))).toBe(true);
  });

  it('should run the framework CLI in the parent directory', async () => {
    const { ctx, runner } = await makeContext(answers(), withVueCli(withHealthyToolchain(new FakeRunner())));

    await new VueGenerator().generate(ctx);

    const [create] = runner.callsTo('vue create');
    expect(create.options.cwd).toBe(tempDir);
  });

  it('should abort with the CLI error output when project creation fails', async () => {
    const runner = withHealthyToolchain(new FakeRunner()).on('vue create', fail('ERROR  Invalid project name'));
    const { ctx } = await makeContext(answers(), runner);

    const result = await new VueGenerator().generate(ctx);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.failedStep).toBe('base-scaffold');
      expect(result.error.message).toBe('Vue.js project creation failed: ERROR  Invalid project name');
    }
    expect(result.steps.map((s) => s.status)).toEqual(['succeeded', 'succeeded', 'failed', 'skipped']);
  });

  it('should abort when the CLI reports success without creating the project', async () => {
    const runner = withHealthyToolchain(new FakeRunner()).on('vue create', ok());
    const { ctx } = await makeContext(answers(), runner);

    const result = await new VueGenerator().generate(ctx);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        `Vue.js project creation reported success but package.json, src are missing from ${join(tempDir, 'demo-app')}`
      );
    }
  });

  it('should not touch the disk when the toolchain cannot be resolved', async () => {
    const runner = withHealthyToolchain(new FakeRunner()).on('npm --version', fail('npm: command not found'));
    const { ctx } = await makeContext(answers(), runner);

    const result = await new VueGenerator().generate(ctx);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.failedStep).toBe('dependency-check');
      expect(result.error.remediation).toBe('Reinstall Node.js, which ships with npm.');
    }
    expect(existsSync(join(tempDir, 'demo-app'))).toBe(false);
  });
});
