/**
 * Builds the immutable ScaffoldConfig from caller answers.
 */
import * as path from 'node:path';
import { ScaffoldConfigSchema, type ScaffoldConfig } from './schema.js';
import { isDirectory, isPlainObject } from '../../utils/file-system.js';
import { InvalidConfigError } from '../../utils/errors.js';
import { loadYamlWithSchema, formatZodError } from '../../utils/yaml.js';
import { z } from 'zod';

/** Answers as read from a file or CLI flags, before validation. */
export type Answers = Record<string, unknown>;

const AnswersFileSchema = z.record(z.string(), z.unknown());

/**
 * Parse and validate raw answers, then freeze the result.
 * `project_path` must be an existing directory; it is resolved to an absolute path.
 */
export async function buildScaffoldConfig(input: unknown): Promise<ScaffoldConfig> {
  const result = ScaffoldConfigSchema.safeParse(input);
  if (!result.success) {
    const first = result.error.issues[0];
    const field = first && first.path.length > 0 ? first.path.join('.') : '(root)';
    throw new InvalidConfigError(field, `Invalid configuration: ${formatZodError(result.error)}`);
  }

  const config = { ...result.data, project_path: path.resolve(result.data.project_path) };
  if (!(await isDirectory(config.project_path))) {
    throw new InvalidConfigError(
      'project_path',
      `Project path does not exist or is not a directory: ${config.project_path}`
    );
  }

  return deepFreeze(config);
}

/**
 * Load an answers file (YAML or JSON).
 */
export async function loadAnswersFile(filePath: string): Promise<Answers> {
  return loadYamlWithSchema(path.resolve(filePath), AnswersFileSchema);
}

/**
 * Merge answers; later sources win. Nested objects merge one level deep.
 */
export function mergeAnswers(...sources: Answers[]): Answers {
  const merged: Answers = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue;
      const existing = merged[key];
      merged[key] = isPlainObject(existing) && isPlainObject(value) ? { ...existing, ...value } : value;
    }
  }
  return merged;
}

/**
 * Directory the project will be generated in.
 */
export function getProjectDir(config: ScaffoldConfig): string {
  return path.join(config.project_path, config.project_name);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
