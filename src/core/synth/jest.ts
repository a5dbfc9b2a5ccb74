/**
 * Jest configuration (jest.config.js).
 */
import * as path from 'node:path';
import { writeFile } from '../../utils/file-system.js';
import type { Framework, JestOptions } from '../config/schema.js';
import { renderCommonJsModule } from './shared.js';

export const JEST_CONFIG_FILE = 'jest.config.js';
export const ANGULAR_JEST_SETUP_FILE = 'setup-jest.ts';

export interface JestSetup {
  framework: Framework;
  typescript: boolean;
  options: JestOptions;
}

export function jestPackages(setup: JestSetup): string[] {
  if (setup.framework === 'angular') {
    return ['jest@^29', 'jest-preset-angular', '@types/jest@^29'];
  }
  const packages = ['jest@^29', 'jest-environment-jsdom@^29', 'babel-jest@^29', '@vue/test-utils', '@vue/vue3-jest'];
  if (setup.typescript) {
    packages.push('ts-jest@^29', '@types/jest@^29');
  }
  return packages;
}

export function buildJestConfig(setup: JestSetup): Record<string, unknown> {
  const { options } = setup;
  if (setup.framework === 'angular') {
    return {
      preset: 'jest-preset-angular',
      setupFilesAfterEnv: [`<rootDir>/${ANGULAR_JEST_SETUP_FILE}`],
      testPathIgnorePatterns: ['<rootDir>/node_modules/', '<rootDir>/dist/'],
      collectCoverage: options.coverage,
    };
  }

  const transform: Record<string, string> = {
    '^.+\\.vue$': '@vue/vue3-jest',
    '^.+\\.js$': 'babel-jest',
  };
  if (setup.typescript) {
    transform['^.+\\.ts$'] = 'ts-jest';
  }
  return {
    testEnvironment: options.test_environment,
    moduleFileExtensions: setup.typescript ? ['js', 'ts', 'json', 'vue'] : ['js', 'json', 'vue'],
    transform,
    moduleNameMapper: { '^@/(.*)$': '<rootDir>/src/$1' },
    testMatch: ['**/tests/**/*.spec.[jt]s', '**/__tests__/**/*.[jt]s'],
    collectCoverage: options.coverage,
  };
}

export async function writeJestConfig(projectDir: string, setup: JestSetup): Promise<string[]> {
  const configPath = path.join(projectDir, JEST_CONFIG_FILE);
  await writeFile(configPath, renderCommonJsModule(buildJestConfig(setup)));
  if (setup.framework !== 'angular') {
    return [configPath];
  }
  const setupPath = path.join(projectDir, ANGULAR_JEST_SETUP_FILE);
  await writeFile(
    setupPath,
    "import { setupZoneTestEnv } from 'jest-preset-angular/setup-env/zone';\n\nsetupZoneTestEnv();\n"
  );
  return [configPath, setupPath];
}
