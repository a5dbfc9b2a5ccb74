/**
 * Tests for configuration loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  buildScaffoldConfig,
  getProjectDir,
  loadAnswersFile,
  mergeAnswers,
} from '../../../../src/core/config/loader.js';
import { FilesystemError, InvalidConfigError } from '../../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../../helpers/temp-dir.js';

describe('buildScaffoldConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('config');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should return a frozen config with an absolute project path', async () => {
    const config = await buildScaffoldConfig({ project_name: 'demo', project_path: tempDir, framework: 'vue' });

    expect(config.project_path).toBe(tempDir);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.features)).toBe(true);
    expect(getProjectDir(config)).toBe(join(tempDir, 'demo'));
  });

  it('should name the invalid field', async () => {
    await expect(
      buildScaffoldConfig({ project_name: 'bad name', project_path: tempDir, framework: 'vue' })
    ).rejects.toMatchObject({ field: 'project_name' });
  });

  it('should report a missing root object', async () => {
    await expect(buildScaffoldConfig('vue')).rejects.toMatchObject({ field: '(root)' });
  });

  it('should reject a project path that is not a directory', async () => {
    const missing = join(tempDir, 'nowhere');

    await expect(
      buildScaffoldConfig({ project_name: 'demo', project_path: missing, framework: 'vue' })
    ).rejects.toThrow(`Project path does not exist or is not a directory: ${missing}`);
  });

  it('should throw InvalidConfigError for validation failures', async () => {
    await expect(
      buildScaffoldConfig({ project_name: 'demo', project_path: tempDir, framework: 'react' })
    ).rejects.toBeInstanceOf(InvalidConfigError);
  });
});

describe('loadAnswersFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('answers');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should load YAML answers', async () => {
    const file = join(tempDir, 'answers.yaml');
    writeFileSync(file, 'project_name: demo\nframework: angular\nfeatures:\n  tests: true\n');

    expect(await loadAnswersFile(file)).toEqual({
      project_name: 'demo',
      framework: 'angular',
      features: { tests: true },
    });
  });

  it('should fail with FilesystemError when the file is missing', async () => {
    await expect(loadAnswersFile(join(tempDir, 'none.yaml'))).rejects.toBeInstanceOf(FilesystemError);
  });

  it('should reject documents that are not mappings', async () => {
    const file = join(tempDir, 'answers.yaml');
    writeFileSync(file, '- vue\n- angular\n');

    await expect(loadAnswersFile(file)).rejects.toBeInstanceOf(InvalidConfigError);
  });
});

describe('mergeAnswers', () => {
  it('should let later sources win and merge nested objects one level deep', () => {
    const merged = mergeAnswers(
      { project_path: '/work', features: { eslint: true, tests: true } },
      { framework: 'vue', features: { tests: false } },
      { framework: undefined, routing: false }
    );

    expect(merged).toEqual({
      project_path: '/work',
      framework: 'vue',
      routing: false,
      features: { eslint: true, tests: false },
    });
  });
});
