/**
 * Tests for the scaffold configuration schema.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  PROJECT_NAME_PATTERN,
  ScaffoldConfigSchema,
  validateProjectName,
} from '../../../../src/core/config/schema.js';

describe('validateProjectName', () => {
  it('should accept letters, digits, hyphens and underscores', () => {
    expect(validateProjectName('demo-app_2')).toEqual({ valid: true });
  });

  it('should reject empty names', () => {
    expect(validateProjectName('')).toEqual({ valid: false, error: 'Project name cannot be empty' });
  });

  it('should reject names longer than 50 characters', () => {
    expect(validateProjectName('a'.repeat(51))).toEqual({
      valid: false,
      error: 'Project name must be at most 50 characters (got 51)',
    });
  });

  it('should list the offending characters once each', () => {
    expect(validateProjectName('my app/my app')).toEqual({
      valid: false,
      error: 'Project name may only contain letters, digits, hyphens and underscores (found: " /")',
    });
  });

  it('should agree with the name pattern for any string', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 60 }), (name) => {
        expect(validateProjectName(name).valid).toBe(PROJECT_NAME_PATTERN.test(name));
      })
    );
  });

  it('should accept every name drawn from the allowed alphabet', () => {
    const allowed = fc.constantFrom(...'abcXYZ019-_'.split(''));
    fc.assert(
      fc.property(fc.array(allowed, { minLength: 1, maxLength: 50 }), (chars) => {
        expect(validateProjectName(chars.join('')).valid).toBe(true);
      })
    );
  });
});

describe('ScaffoldConfigSchema', () => {
  it('should apply defaults', () => {
    const config = ScaffoldConfigSchema.parse({ project_name: 'demo', project_path: '/tmp', framework: 'vue' });

    expect(config).toEqual({
      project_name: 'demo',
      project_path: '/tmp',
      framework: 'vue',
      package_manager: 'npm',
      routing: true,
      style: 'css',
      features: { typescript: false, eslint: false, tailwind: false, prettier: false, stylelint: false, tests: false },
      git: true,
      eslint: null,
      prettier: null,
      tailwind: null,
      stylelint: null,
      jest: null,
      angular: null,
      env: '',
    });
  });

  it('should fill sub-config defaults when a sub-config is given', () => {
    const config = ScaffoldConfigSchema.parse({
      project_name: 'demo',
      project_path: '/tmp',
      framework: 'vue',
      eslint: { rules: { 'no-console': 'warn' } },
    });

    expect(config.eslint).toEqual({ preset: 'prettier', rules: { 'no-console': 'warn' } });
  });

  it('should reject unknown frameworks', () => {
    const result = ScaffoldConfigSchema.safeParse({ project_name: 'demo', project_path: '/tmp', framework: 'svelte' });

    expect(result.success).toBe(false);
  });

  it('should reject rules that are not an object', () => {
    const result = ScaffoldConfigSchema.safeParse({
      project_name: 'demo',
      project_path: '/tmp',
      framework: 'vue',
      eslint: { rules: ['no-console'] },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['eslint', 'rules']);
    }
  });
});
