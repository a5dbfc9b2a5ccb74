/**
 * File system operations - reading, writing, removing and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';
import { FilesystemError } from './errors.js';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Append content to a file, creating it if necessary.
 */
export async function appendFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.appendFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Recursively remove a directory. Missing directories are not an error.
 */
export async function removeDir(dirPath: string): Promise<void> {
  await fs.promises.rm(dirPath, { recursive: true, force: true });
}

/**
 * List entry names of a directory.
 */
export async function listDir(dirPath: string): Promise<string[]> {
  return fs.promises.readdir(dirPath);
}

/**
 * Read and parse a JSON file.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath);
  try {
    return JSON.parse(content) as unknown;
  } catch (error) {
    throw new FilesystemError(
      `Failed to parse JSON file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { filePath }
    );
  }
}

/**
 * Serialize data as pretty JSON and write it.
 */
export async function writeJsonFile(filePath: string, data: unknown, indent = 2): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(data, null, indent)}\n`);
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    onlyFiles: true,
  });
}

/**
 * Narrow an unknown value to a plain JSON object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
