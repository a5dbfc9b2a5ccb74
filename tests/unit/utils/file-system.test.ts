/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  appendFile,
  fileExists,
  globFiles,
  isDirectory,
  isPlainObject,
  readJsonFile,
  removeDir,
  writeFile,
  writeJsonFile,
} from '../../../src/utils/file-system.js';
import { FilesystemError } from '../../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../../helpers/temp-dir.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir('fs');
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should create parent directories when writing', async () => {
    const filePath = join(tempDir, 'a', 'b', 'c.txt');

    await writeFile(filePath, 'hello');

    expect(readFileSync(filePath, 'utf-8')).toBe('hello');
  });

  it('should append to files', async () => {
    const filePath = join(tempDir, 'styles.css');
    writeFileSync(filePath, 'body {}\n');

    await appendFile(filePath, '@tailwind base;\n');

    expect(readFileSync(filePath, 'utf-8')).toBe('body {}\n@tailwind base;\n');
  });

  it('should distinguish files from directories', async () => {
    writeFileSync(join(tempDir, 'file.txt'), '');

    expect(await fileExists(join(tempDir, 'file.txt'))).toBe(true);
    expect(await isDirectory(join(tempDir, 'file.txt'))).toBe(false);
    expect(await isDirectory(tempDir)).toBe(true);
    expect(await fileExists(join(tempDir, 'missing'))).toBe(false);
  });

  it('should remove directories recursively and ignore missing ones', async () => {
    mkdirSync(join(tempDir, 'project', 'src'), { recursive: true });
    writeFileSync(join(tempDir, 'project', 'src', 'main.js'), '');

    await removeDir(join(tempDir, 'project'));
    await removeDir(join(tempDir, 'project'));

    expect(existsSync(join(tempDir, 'project'))).toBe(false);
  });

  it('should write JSON with the requested indent and a trailing newline', async () => {
    const filePath = join(tempDir, 'data.json');

    await writeJsonFile(filePath, { a: 1 }, 4);

    expect(readFileSync(filePath, 'utf-8')).toBe('{\n    "a": 1\n}\n');
  });

  it('should throw FilesystemError on malformed JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    writeFileSync(filePath, '{ nope');

    await expect(readJsonFile(filePath)).rejects.toBeInstanceOf(FilesystemError);
  });

  it('should glob relative paths', async () => {
    mkdirSync(join(tempDir, 'src', 'assets'), { recursive: true });
    writeFileSync(join(tempDir, 'src', 'assets', 'base.css'), '');

    const files = await globFiles('src/assets/*.css', { cwd: tempDir, absolute: false });

    expect(files).toEqual(['src/assets/base.css']);
  });

  it('should recognise plain objects only', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('x')).toBe(false);
  });
});
