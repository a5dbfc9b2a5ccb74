/**
 * Helpers shared by the config synthesizers.
 */
import { InvalidConfigError } from '../../utils/errors.js';
import { isPlainObject } from '../../utils/file-system.js';
import type { JsonObject } from '../config/schema.js';

/**
 * Reject option bags that are not JSON objects.
 */
export function assertJsonObject(value: unknown, field: string): asserts value is JsonObject {
  if (!isPlainObject(value)) {
    const actual = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
    throw new InvalidConfigError(field, `${field} must be a JSON object (got ${actual})`);
  }
}

/**
 * Render a CommonJS config module, e.g. tailwind.config.js.
 */
export function renderCommonJsModule(value: unknown): string {
  return `module.exports = ${JSON.stringify(value, null, 2)}\n`;
}
