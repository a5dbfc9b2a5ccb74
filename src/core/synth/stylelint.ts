/**
 * Stylelint configuration (.stylelintrc.json).
 */
import * as path from 'node:path';
import { writeJsonFile } from '../../utils/file-system.js';
import type { StylelintOptions } from '../config/schema.js';
import { assertJsonObject } from './shared.js';

export const STYLELINT_CONFIG_FILE = '.stylelintrc.json';

export function stylelintPackages(options: StylelintOptions): string[] {
  return ['stylelint', options.extends];
}

export async function writeStylelintConfig(projectDir: string, options: StylelintOptions): Promise<string> {
  assertJsonObject(options.rules, 'stylelint.rules');
  const filePath = path.join(projectDir, STYLELINT_CONFIG_FILE);
  await writeJsonFile(filePath, { extends: options.extends, rules: options.rules });
  return filePath;
}
