/**
 * Tailwind CSS: config pair plus stylesheet directives.
 *
 * Directives are appended to the first stylesheet found among the profile's
 * candidates. A new stylesheet is created only when none exists, and an
 * existing one is replaced only in `replace` mode.
 */
import * as path from 'node:path';
import { appendFile, fileExists, globFiles, readFile, writeFile } from '../../utils/file-system.js';
import type { StylesheetMode, TailwindOptions } from '../config/schema.js';
import { renderCommonJsModule } from './shared.js';

export const TAILWIND_CONFIG_FILE = 'tailwind.config.js';
export const POSTCSS_CONFIG_FILE = 'postcss.config.js';

export const TAILWIND_DIRECTIVES = '@tailwind base;\n@tailwind components;\n@tailwind utilities;\n';

// Tailwind 3 is the last major configured through tailwind.config.js and @tailwind directives
export const TAILWIND_PACKAGES = ['tailwindcss@^3', 'postcss', 'autoprefixer'];

/**
 * Framework-specific Tailwind layout.
 */
export interface TailwindProfile {
  /** Default content globs */
  content: string[];
  /** Stylesheet globs relative to the project root, searched in order */
  stylesheetCandidates: string[];
  /** Stylesheet created when no candidate exists */
  defaultStylesheet: string;
  /** Entry modules, in order, that must import a created stylesheet */
  entryModules?: string[];
}

export interface StylesheetInjection {
  action: 'appended' | 'replaced' | 'created' | 'unchanged';
  file: string;
}

export function buildTailwindConfig(profile: TailwindProfile, options: TailwindOptions | null): Record<string, unknown> {
  return {
    content: options?.content ?? profile.content,
    theme: { extend: {} },
    plugins: [],
  };
}

export function buildPostcssConfig(): Record<string, unknown> {
  return { plugins: { tailwindcss: {}, autoprefixer: {} } };
}

export async function writeTailwindConfigs(
  projectDir: string,
  profile: TailwindProfile,
  options: TailwindOptions | null
): Promise<string[]> {
  const tailwindPath = path.join(projectDir, TAILWIND_CONFIG_FILE);
  const postcssPath = path.join(projectDir, POSTCSS_CONFIG_FILE);
  await writeFile(tailwindPath, renderCommonJsModule(buildTailwindConfig(profile, options)));
  await writeFile(postcssPath, renderCommonJsModule(buildPostcssConfig()));
  return [tailwindPath, postcssPath];
}

/**
 * Find the first existing stylesheet among the profile's candidates.
 */
export async function findStylesheet(projectDir: string, profile: TailwindProfile): Promise<string | null> {
  for (const candidate of profile.stylesheetCandidates) {
    const matches = await globFiles(candidate, { cwd: projectDir, absolute: false });
    if (matches.length > 0) {
      return path.join(projectDir, [...matches].sort()[0]);
    }
  }
  return null;
}

export async function injectTailwindDirectives(
  projectDir: string,
  profile: TailwindProfile,
  mode: StylesheetMode = 'append'
): Promise<StylesheetInjection> {
  const existing = await findStylesheet(projectDir, profile);

  if (!existing) {
    const file = path.join(projectDir, profile.defaultStylesheet);
    await writeFile(file, TAILWIND_DIRECTIVES);
    return { action: 'created', file };
  }

  if (mode === 'replace') {
    await writeFile(existing, TAILWIND_DIRECTIVES);
    return { action: 'replaced', file: existing };
  }

  const content = await readFile(existing);
  if (content.includes('@tailwind base;')) {
    return { action: 'unchanged', file: existing };
  }
  const separator = content.length === 0 || content.endsWith('\n') ? '' : '\n';
  await appendFile(existing, `${separator}\n${TAILWIND_DIRECTIVES}`);
  return { action: 'appended', file: existing };
}

/**
 * Import a newly created stylesheet from the first entry module that exists.
 * Returns the entry module, or null when the profile has none on disk.
 */
export async function importStylesheet(
  projectDir: string,
  profile: TailwindProfile,
  stylesheet: string
): Promise<string | null> {
  for (const candidate of profile.entryModules ?? []) {
    const entry = path.join(projectDir, candidate);
    if (!(await fileExists(entry))) continue;

    let specifier = path.relative(path.dirname(entry), stylesheet).split(path.sep).join('/');
    if (!specifier.startsWith('.')) {
      specifier = `./${specifier}`;
    }
    const statement = `import '${specifier}'`;
    const content = await readFile(entry);
    if (!content.includes(statement)) {
      await writeFile(entry, `${statement}\n${content}`);
    }
    return entry;
  }
  return null;
}
