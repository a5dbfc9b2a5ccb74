/**
 * Angular generator, driven by `ng new`.
 */
import { AngularOptionsSchema, type ScaffoldConfig } from '../config/schema.js';
import type { FrameworkCli } from '../deps/types.js';
import type { TailwindProfile } from '../synth/tailwind.js';
import { FrameworkGenerator, type ScaffoldCommand } from './base.js';
import type { EslintStepOptions } from './features.js';

const NON_INTERACTIVE_ENV = { NG_CLI_ANALYTICS: 'false' };

export const ANGULAR_CLI: FrameworkCli = {
  label: 'Angular CLI',
  binary: 'ng',
  versionArgs: ['version'],
  packageName: '@angular/cli',
  env: NON_INTERACTIVE_ENV,
};

/**
 * Answers for `eslint --init`, one prompt per line.
 */
export function eslintInitAnswers(preset: string): string {
  return [
    'To check syntax and find problems',
    'JavaScript modules (import/export)',
    'Angular',
    'TypeScript: Yes',
    'Browser',
    'Use a popular style guide',
    preset,
    'JSON',
    'Yes',
    '',
  ].join('\n');
}

export class AngularGenerator extends FrameworkGenerator {
  readonly framework = 'angular' as const;
  readonly displayName = 'Angular';
  readonly cli = ANGULAR_CLI;

  protected readonly expectedOutputs = ['package.json', 'src', 'angular.json'];

  protected readonly tailwindProfile: TailwindProfile = {
    content: ['./src/**/*.{html,ts}'],
    stylesheetCandidates: ['src/styles.css', 'src/styles.scss', 'src/styles.sass', 'src/styles.less'],
    defaultStylesheet: 'src/styles.css',
  };

  scaffoldCommand(config: ScaffoldConfig, projectDir: string): ScaffoldCommand {
    const angular = config.angular ?? AngularOptionsSchema.parse({});
    return {
      command: 'ng',
      args: [
        'new',
        config.project_name,
        '--directory',
        projectDir,
        '--skip-git',
        `--style=${config.style}`,
        `--routing=${config.routing}`,
        `--ssr=${angular.ssr}`,
        `--standalone=${angular.standalone}`,
        `--skip-tests=${!config.features.tests}`,
        `--package-manager=${config.package_manager}`,
        '--defaults',
        '--interactive=false',
      ],
      env: NON_INTERACTIVE_ENV,
    };
  }

  // Angular projects are TypeScript from the start
  protected supportsTypeScriptFeature(): boolean {
    return false;
  }

  protected eslintOptions(config: ScaffoldConfig): EslintStepOptions {
    return {
      init: {
        command: 'npx',
        args: ['eslint', '--init'],
        input: eslintInitAnswers(config.eslint?.preset ?? 'prettier'),
      },
      autofix: { command: 'npx', args: ['eslint', '--fix', 'src/**/*.ts'] },
    };
  }
}
