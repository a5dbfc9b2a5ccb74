/**
 * Scaffold configuration record.
 *
 * One closed record per run. Tool-specific option bags are enumerated
 * sub-configs, each independently nullable (null = use the feature defaults).
 */
import { z } from 'zod';

export const PROJECT_NAME_PATTERN = /^[A-Za-z0-9_-]{1,50}$/;
export const PROJECT_NAME_MAX_LENGTH = 50;

export type ProjectNameCheck = { valid: true } | { valid: false; error: string };

/**
 * Validate a project name against PROJECT_NAME_PATTERN with a descriptive error.
 */
export function validateProjectName(name: string): ProjectNameCheck {
  if (name.length === 0) {
    return { valid: false, error: 'Project name cannot be empty' };
  }
  if (name.length > PROJECT_NAME_MAX_LENGTH) {
    return {
      valid: false,
      error: `Project name must be at most ${PROJECT_NAME_MAX_LENGTH} characters (got ${name.length})`,
    };
  }
  if (!PROJECT_NAME_PATTERN.test(name)) {
    const offending = [...new Set(name.replace(/[A-Za-z0-9_-]/g, ''))].join('');
    return {
      valid: false,
      error: `Project name may only contain letters, digits, hyphens and underscores (found: ${JSON.stringify(offending)})`,
    };
  }
  return { valid: true };
}

export const ProjectNameSchema = z.string().superRefine((name, ctx) => {
  const check = validateProjectName(name);
  if (!check.valid) {
    ctx.addIssue({ code: 'custom', message: check.error });
  }
});

/** Supported frameworks. */
export const FrameworkSchema = z.enum(['vue', 'angular']);
export type Framework = z.infer<typeof FrameworkSchema>;

/** Supported package managers. */
export const PackageManagerSchema = z.enum(['npm', 'yarn', 'pnpm']);
export type PackageManager = z.infer<typeof PackageManagerSchema>;

/** Stylesheet language passed to the framework CLI. */
export const StyleSchema = z.enum(['css', 'scss', 'sass', 'less']);
export type StyleLanguage = z.infer<typeof StyleSchema>;

/** Feature toggles. */
export const FeatureTogglesSchema = z.object({
  typescript: z.boolean().default(false),
  eslint: z.boolean().default(false),
  tailwind: z.boolean().default(false),
  prettier: z.boolean().default(false),
  stylelint: z.boolean().default(false),
  tests: z.boolean().default(false),
});
export type FeatureToggles = z.infer<typeof FeatureTogglesSchema>;

const DEFAULT_FEATURES: FeatureToggles = {
  typescript: false,
  eslint: false,
  tailwind: false,
  prettier: false,
  stylelint: false,
  tests: false,
};

/** JSON object with arbitrary values (rule maps, formatter options). */
export const JsonObjectSchema = z.record(z.string(), z.unknown());
export type JsonObject = z.infer<typeof JsonObjectSchema>;

export const EslintOptionsSchema = z.object({
  /** Shareable config name without the `eslint-config-` prefix (e.g. "prettier", "standard") */
  preset: z.string().min(1).default('prettier'),
  /** Rules merged into the generated config's `rules` key */
  rules: JsonObjectSchema.default({}),
});
export type EslintOptions = z.infer<typeof EslintOptionsSchema>;

export const StylesheetModeSchema = z.enum(['append', 'replace']);
export type StylesheetMode = z.infer<typeof StylesheetModeSchema>;

export const TailwindOptionsSchema = z.object({
  /** Content globs; the framework's defaults are used when omitted */
  content: z.array(z.string()).optional(),
  /** How directives are injected into an existing stylesheet */
  stylesheet_mode: StylesheetModeSchema.default('append'),
});
export type TailwindOptions = z.infer<typeof TailwindOptionsSchema>;

export const StylelintOptionsSchema = z.object({
  extends: z.string().min(1).default('stylelint-config-standard'),
  rules: JsonObjectSchema.default({}),
});
export type StylelintOptions = z.infer<typeof StylelintOptionsSchema>;

export const JestOptionsSchema = z.object({
  test_environment: z.enum(['jsdom', 'node']).default('jsdom'),
  coverage: z.boolean().default(false),
});
export type JestOptions = z.infer<typeof JestOptionsSchema>;

export const AngularOptionsSchema = z.object({
  standalone: z.boolean().default(true),
  ssr: z.boolean().default(false),
});
export type AngularOptions = z.infer<typeof AngularOptionsSchema>;

/**
 * The full configuration record for one scaffold run.
 */
export const ScaffoldConfigSchema = z.object({
  project_name: ProjectNameSchema,
  /** Parent directory the project is created in */
  project_path: z.string().min(1, 'Project path cannot be empty'),
  framework: FrameworkSchema,
  package_manager: PackageManagerSchema.default('npm'),
  routing: z.boolean().default(true),
  style: StyleSchema.default('css'),
  features: FeatureTogglesSchema.default(DEFAULT_FEATURES),
  git: z.boolean().default(true),
  eslint: EslintOptionsSchema.nullable().default(null),
  prettier: JsonObjectSchema.nullable().default(null),
  tailwind: TailwindOptionsSchema.nullable().default(null),
  stylelint: StylelintOptionsSchema.nullable().default(null),
  jest: JestOptionsSchema.nullable().default(null),
  angular: AngularOptionsSchema.nullable().default(null),
  /** Raw .env file content */
  env: z.string().default(''),
});

export type ScaffoldConfig = z.infer<typeof ScaffoldConfigSchema>;
export type ScaffoldConfigInput = z.input<typeof ScaffoldConfigSchema>;

export const DEFAULT_PRETTIER_OPTIONS: JsonObject = {
  printWidth: 80,
  singleQuote: true,
  trailingComma: 'es5',
};
