/**
 * Prettier configuration (.prettierrc).
 */
import * as path from 'node:path';
import { writeJsonFile } from '../../utils/file-system.js';
import { assertJsonObject } from './shared.js';

export const PRETTIER_CONFIG_FILE = '.prettierrc';
export const PRETTIER_PACKAGES = ['prettier'];

export async function writePrettierConfig(projectDir: string, options: unknown): Promise<string> {
  assertJsonObject(options, 'prettier');
  const filePath = path.join(projectDir, PRETTIER_CONFIG_FILE);
  await writeJsonFile(filePath, options);
  return filePath;
}
