/**
 * TypeScript configuration (tsconfig.json) for projects whose generator did not write one.
 */
import * as path from 'node:path';
import { fileExists, writeJsonFile } from '../../utils/file-system.js';

export const TSCONFIG_FILE = 'tsconfig.json';
export const TYPESCRIPT_PACKAGES = ['typescript', '@types/node'];

export const VUE_TSCONFIG = {
  compilerOptions: {
    target: 'esnext',
    module: 'esnext',
    strict: true,
    jsx: 'preserve',
    moduleResolution: 'node',
    skipLibCheck: true,
    esModuleInterop: true,
    allowSyntheticDefaultImports: true,
    forceConsistentCasingInFileNames: true,
    useDefineForClassFields: true,
    sourceMap: true,
    baseUrl: '.',
    types: ['node'],
    paths: { '@/*': ['src/*'] },
    lib: ['esnext', 'dom', 'dom.iterable', 'scripthost'],
  },
  include: ['src/**/*.ts', 'src/**/*.tsx', 'src/**/*.vue', 'tests/**/*.ts', 'tests/**/*.tsx'],
  exclude: ['node_modules'],
};

/**
 * Write tsconfig.json unless one exists. Returns the path and whether it was written.
 */
export async function ensureTsConfig(
  projectDir: string,
  template: Record<string, unknown> = VUE_TSCONFIG
): Promise<{ file: string; written: boolean }> {
  const file = path.join(projectDir, TSCONFIG_FILE);
  if (await fileExists(file)) {
    return { file, written: false };
  }
  await writeJsonFile(file, template);
  return { file, written: true };
}
