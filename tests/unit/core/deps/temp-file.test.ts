/**
 * Tests for scoped temporary files.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, writeFileSync } from 'node:fs';
import { basename, dirname } from 'node:path';
import { withTempFile } from '../../../../src/core/deps/temp-file.js';
import { makeTempDir, removeTempDir } from '../../../helpers/temp-dir.js';

describe('withTempFile', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('tmp-root');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('should hand out a path inside a fresh directory and remove it afterwards', async () => {
    let seen = '';

    const value = await withTempFile(
      'setup.sh',
      async (filePath) => {
        seen = filePath;
        writeFileSync(filePath, 'echo hi');
        expect(existsSync(filePath)).toBe(true);
        return 42;
      },
      root
    );

    expect(value).toBe(42);
    expect(basename(seen)).toBe('setup.sh');
    expect(dirname(dirname(seen))).toBe(root);
    expect(readdirSync(root)).toEqual([]);
  });

  it('should remove the directory when the callback throws', async () => {
    const promise = withTempFile(
      'setup.sh',
      async (filePath) => {
        writeFileSync(filePath, 'echo hi');
        throw new Error('install failed');
      },
      root
    );

    await expect(promise).rejects.toThrow('install failed');
    expect(readdirSync(root)).toEqual([]);
  });
});
