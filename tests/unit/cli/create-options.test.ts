/**
 * Tests for translating create flags into answers.
 */
import { describe, it, expect } from 'vitest';
import { answersFromOptions, parseJsonOption, unwrapRules } from '../../../src/cli/commands/create-options.js';
import { InvalidConfigError } from '../../../src/utils/errors.js';

describe('answersFromOptions', () => {
  it('should only include flags that were passed', () => {
    expect(answersFromOptions('demo-app', { framework: 'vue', eslint: true, routing: false })).toEqual({
      project_name: 'demo-app',
      framework: 'vue',
      routing: false,
      features: { eslint: true },
    });
  });

  it('should return no answers when nothing was passed', () => {
    expect(answersFromOptions(undefined, {})).toEqual({});
  });

  it('should parse JSON options into sub-configs', () => {
    expect(
      answersFromOptions(
        'shop',
        {
          eslintPreset: 'standard',
          eslintRules: '{"rules": {"no-console": "warn"}}',
          prettierConfig: '{"semi": false}',
          stylesheetMode: 'replace',
          standalone: false,
        },
        'API_URL=http://localhost\n'
      )
    ).toEqual({
      project_name: 'shop',
      env: 'API_URL=http://localhost\n',
      eslint: { preset: 'standard', rules: { 'no-console': 'warn' } },
      prettier: { semi: false },
      tailwind: { stylesheet_mode: 'replace' },
      angular: { standalone: false },
    });
  });
});

describe('unwrapRules', () => {
  it('should unwrap a rules wrapper', () => {
    expect(unwrapRules({ rules: { semi: 'error' } })).toEqual({ semi: 'error' });
  });

  it('should keep bare rule maps', () => {
    expect(unwrapRules({ semi: 'error', rules: 'x' })).toEqual({ semi: 'error', rules: 'x' });
  });
});

describe('parseJsonOption', () => {
  it('should name the field on invalid JSON', () => {
    try {
      parseJsonOption('{oops', 'eslint.rules');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigError);
      if (error instanceof InvalidConfigError) {
        expect(error.field).toBe('eslint.rules');
        expect(error.message.startsWith('Invalid JSON for eslint.rules: ')).toBe(true);
      }
    }
  });
});
