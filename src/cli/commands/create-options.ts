/**
 * Translate `create` command flags into scaffold answers.
 */
import { InvalidConfigError } from '../../utils/errors.js';
import { isPlainObject } from '../../utils/file-system.js';
import type { Answers } from '../../core/config/loader.js';

export interface CreateOptions {
  path?: string;
  framework?: string;
  packageManager?: string;
  style?: string;
  routing?: boolean;
  typescript?: boolean;
  eslint?: boolean;
  eslintPreset?: string;
  eslintRules?: string;
  tailwind?: boolean;
  stylesheetMode?: string;
  prettier?: boolean;
  prettierConfig?: string;
  stylelint?: boolean;
  tests?: boolean;
  standalone?: boolean;
  ssr?: boolean;
  git?: boolean;
  envFile?: string;
  config?: string;
  logFile?: string;
  yes?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Parse a JSON flag value, naming the config field on failure.
 */
export function parseJsonOption(value: string, field: string): unknown {
  try {
    return JSON.parse(value) as unknown;
  } catch (error) {
    throw new InvalidConfigError(
      field,
      `Invalid JSON for ${field}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * ESLint rules may be given bare or wrapped as `{ "rules": { ... } }`.
 */
export function unwrapRules(value: unknown): unknown {
  if (isPlainObject(value) && Object.keys(value).length === 1 && isPlainObject(value.rules)) {
    return value.rules;
  }
  return value;
}

function defined(entries: Record<string, unknown>): Answers {
  return Object.fromEntries(Object.entries(entries).filter(([, value]) => value !== undefined));
}

/**
 * Only flags the user actually passed become answers, so an answers file is not overridden by defaults.
 */
export function answersFromOptions(name: string | undefined, options: CreateOptions, envText?: string): Answers {
  const features = defined({
    typescript: options.typescript,
    eslint: options.eslint,
    tailwind: options.tailwind,
    prettier: options.prettier,
    stylelint: options.stylelint,
    tests: options.tests,
  });

  const eslint = defined({
    preset: options.eslintPreset,
    rules: options.eslintRules === undefined ? undefined : unwrapRules(parseJsonOption(options.eslintRules, 'eslint.rules')),
  });
  const angular = defined({ standalone: options.standalone, ssr: options.ssr });

  return defined({
    project_name: name,
    project_path: options.path,
    framework: options.framework,
    package_manager: options.packageManager,
    style: options.style,
    routing: options.routing,
    git: options.git,
    env: envText,
    features: Object.keys(features).length > 0 ? features : undefined,
    eslint: Object.keys(eslint).length > 0 ? eslint : undefined,
    prettier: options.prettierConfig === undefined ? undefined : parseJsonOption(options.prettierConfig, 'prettier'),
    tailwind: options.stylesheetMode === undefined ? undefined : { stylesheet_mode: options.stylesheetMode },
    angular: Object.keys(angular).length > 0 ? angular : undefined,
  });
}
