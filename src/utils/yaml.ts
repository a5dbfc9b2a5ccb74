/**
 * YAML parsing utilities for answers files.
 * JSON documents parse as YAML too, so one loader covers both formats.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { FilesystemError, InvalidConfigError } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content) as unknown;
  } catch (error) {
    throw new FilesystemError(
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content) ?? {};
  const result = schema.safeParse(parsed);

  if (!result.success) {
    const first = result.error.issues[0];
    throw new InvalidConfigError(
      first ? first.path.join('.') || '(root)' : '(root)',
      `Invalid configuration: ${formatZodError(result.error)}`
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new FilesystemError(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { filePath }
    );
  }
  return parseYamlWithSchema(content, schema);
}

/**
 * Stringify an object to YAML.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
