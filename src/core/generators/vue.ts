/**
 * Vue generator, driven by Vue CLI with an inline preset.
 */
import type { ScaffoldConfig, StyleLanguage } from '../config/schema.js';
import type { FrameworkCli } from '../deps/types.js';
import type { TailwindProfile } from '../synth/tailwind.js';
import { FrameworkGenerator, type ScaffoldCommand } from './base.js';
import type { EslintStepOptions } from './features.js';

export const VUE_CLI: FrameworkCli = {
  label: 'Vue CLI',
  binary: 'vue',
  versionArgs: ['--version'],
  packageName: '@vue/cli',
};

const CSS_PREPROCESSORS: Record<StyleLanguage, string | undefined> = {
  css: undefined,
  scss: 'dart-sass',
  sass: 'dart-sass',
  less: 'less',
};

/**
 * The Vue CLI preset matching the configuration's routing, typing and style choices.
 */
export function buildVuePreset(config: ScaffoldConfig): Record<string, unknown> {
  const plugins: Record<string, unknown> = { '@vue/cli-plugin-babel': {} };
  if (config.routing) {
    plugins['@vue/cli-plugin-router'] = { historyMode: true };
  }
  if (config.features.typescript) {
    plugins['@vue/cli-plugin-typescript'] = { classComponent: false, useTsWithBabel: true };
  }

  const preset: Record<string, unknown> = { vueVersion: '3', useConfigFiles: true, plugins };
  const preprocessor = CSS_PREPROCESSORS[config.style];
  if (preprocessor) {
    preset.cssPreprocessor = preprocessor;
  }
  return preset;
}

export class VueGenerator extends FrameworkGenerator {
  readonly framework = 'vue' as const;
  readonly displayName = 'Vue.js';
  readonly cli = VUE_CLI;

  protected readonly expectedOutputs = ['package.json', 'src'];

  protected readonly tailwindProfile: TailwindProfile = {
    content: ['./public/index.html', './index.html', './src/**/*.{vue,js,ts,jsx,tsx}'],
    stylesheetCandidates: ['src/assets/main.css', 'src/style.css', 'src/styles.css', 'src/assets/*.css'],
    defaultStylesheet: 'src/assets/main.css',
    entryModules: ['src/main.ts', 'src/main.js'],
  };

  scaffoldCommand(config: ScaffoldConfig): ScaffoldCommand {
    return {
      command: 'vue',
      args: [
        'create',
        config.project_name,
        '--force',
        '--no-git',
        '--packageManager',
        config.package_manager,
        '--inlinePreset',
        JSON.stringify(buildVuePreset(config)),
      ],
    };
  }

  protected eslintOptions(): EslintStepOptions {
    return {
      autofix: { command: 'npx', args: ['eslint', '--ext', '.js,.ts,.vue', '--fix', 'src'] },
    };
  }
}
