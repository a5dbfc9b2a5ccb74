/**
 * Tests for the Vue generator.
 */
import { describe, it, expect } from 'vitest';
import { ScaffoldConfigSchema, type ScaffoldConfigInput } from '../../../../src/core/config/schema.js';
import { buildVuePreset, VueGenerator } from '../../../../src/core/generators/vue.js';

const configFor = (overrides: Partial<ScaffoldConfigInput> = {}) =>
  ScaffoldConfigSchema.parse({ project_name: 'demo-app', project_path: '/work', framework: 'vue', ...overrides });

describe('buildVuePreset', () => {
  it('should include the router and TypeScript plugins when selected', () => {
    expect(buildVuePreset(configFor({ features: { typescript: true }, style: 'scss' }))).toEqual({
      vueVersion: '3',
      useConfigFiles: true,
      cssPreprocessor: 'dart-sass',
      plugins: {
        '@vue/cli-plugin-babel': {},
        '@vue/cli-plugin-router': { historyMode: true },
        '@vue/cli-plugin-typescript': { classComponent: false, useTsWithBabel: true },
      },
    });
  });

  it('should leave out the router when routing is off', () => {
    expect(buildVuePreset(configFor({ routing: false }))).toEqual({
      vueVersion: '3',
      useConfigFiles: true,
      plugins: { '@vue/cli-plugin-babel': {} },
    });
  });
});

describe('VueGenerator', () => {
  const generator = new VueGenerator();

  it('should create the project non-interactively with an inline preset', () => {
    const config = configFor({ package_manager: 'yarn', routing: false });

    expect(generator.scaffoldCommand(config)).toEqual({
      command: 'vue',
      args: [
        'create',
        'demo-app',
        '--force',
        '--no-git',
        '--packageManager',
        'yarn',
        '--inlinePreset',
        '{"vueVersion":"3","useConfigFiles":true,"plugins":{"@vue/cli-plugin-babel":{}}}',
      ],
    });
  });

  it('should order feature steps after the base scaffold', () => {
    const config = configFor({
      features: { typescript: true, eslint: true, tailwind: true, prettier: true, stylelint: true, tests: true },
    });

    expect(generator.buildSteps(config).map((s) => s.id)).toEqual([
      'dependency-check',
      'directory-reset',
      'base-scaffold',
      'typescript',
      'eslint',
      'eslint-config',
      'eslint-autofix',
      'tailwind',
      'prettier',
      'stylelint',
      'jest',
      'env-file',
    ]);
  });

  it('should only run the toolchain and base steps without features', () => {
    expect(generator.buildSteps(configFor()).map((s) => `${s.id}:${s.criticality}`)).toEqual([
      'dependency-check:required',
      'directory-reset:required',
      'base-scaffold:required',
      'env-file:required',
    ]);
  });
});
