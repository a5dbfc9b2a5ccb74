/**
 * ESLint configuration (.eslintrc.json).
 *
 * The generated file is the base; custom rules merge into its `rules` key and
 * leave every other key untouched.
 */
import * as path from 'node:path';
import { fileExists, isPlainObject, readJsonFile, writeJsonFile } from '../../utils/file-system.js';
import { FilesystemError } from '../../utils/errors.js';
import type { Framework, JsonObject } from '../config/schema.js';
import { assertJsonObject } from './shared.js';

export const ESLINT_CONFIG_FILE = '.eslintrc.json';

export interface EslintSetup {
  framework: Framework;
  /** Shareable config name without the `eslint-config-` prefix */
  preset: string;
  typescript: boolean;
  rules: JsonObject;
}

/**
 * Dev dependencies for the lint setup. ESLint 8 is the last major that reads .eslintrc.json.
 */
export function eslintPackages(setup: EslintSetup): string[] {
  const packages = ['eslint@^8', `eslint-config-${setup.preset}`];
  if (setup.framework === 'vue') {
    packages.push('eslint-plugin-vue');
  }
  if (setup.typescript || setup.framework === 'angular') {
    packages.push('@typescript-eslint/parser', '@typescript-eslint/eslint-plugin');
  }
  return packages;
}

export function buildEslintConfig(setup: EslintSetup): JsonObject {
  const parserOptions: JsonObject = { ecmaVersion: 12, sourceType: 'module' };
  const config: JsonObject = {
    root: true,
    env: { browser: true, es2021: true, node: true },
  };

  if (setup.framework === 'vue') {
    config.extends = ['eslint:recommended', 'plugin:vue/vue3-essential', `eslint-config-${setup.preset}`];
    if (setup.typescript) {
      // vue-eslint-parser delegates <script lang="ts"> to this parser
      parserOptions.parser = '@typescript-eslint/parser';
    }
  } else {
    config.extends = ['eslint:recommended', `eslint-config-${setup.preset}`];
    config.parser = '@typescript-eslint/parser';
    config.plugins = ['@typescript-eslint'];
  }

  config.parserOptions = parserOptions;
  config.rules = { ...setup.rules };
  return config;
}

/**
 * Write a fresh config, replacing any existing file.
 */
export async function writeEslintConfig(projectDir: string, setup: EslintSetup): Promise<string> {
  assertJsonObject(setup.rules, 'eslint.rules');
  const filePath = path.join(projectDir, ESLINT_CONFIG_FILE);
  await writeJsonFile(filePath, buildEslintConfig(setup));
  return filePath;
}

/**
 * Overlay `rules` onto the `rules` key of an existing config.
 * Keys outside `rules`, and rules not named in the overlay, are preserved.
 */
export async function mergeEslintRules(projectDir: string, rules: unknown): Promise<string> {
  assertJsonObject(rules, 'eslint.rules');
  const filePath = path.join(projectDir, ESLINT_CONFIG_FILE);
  const existing = await readJsonFile(filePath);
  if (!isPlainObject(existing)) {
    throw new FilesystemError(`${ESLINT_CONFIG_FILE} does not contain a JSON object`, { filePath });
  }

  const current = isPlainObject(existing.rules) ? existing.rules : {};
  const merged = { ...existing, rules: { ...current, ...rules } };
  await writeJsonFile(filePath, merged);
  return filePath;
}

/**
 * Merge into a config the linter's own initializer generated, or write one when none exists.
 */
export async function ensureEslintConfig(projectDir: string, setup: EslintSetup): Promise<string> {
  if (await fileExists(path.join(projectDir, ESLINT_CONFIG_FILE))) {
    return mergeEslintRules(projectDir, setup.rules);
  }
  return writeEslintConfig(projectDir, setup);
}
