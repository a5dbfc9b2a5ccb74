/**
 * Tests for package manager command lines.
 */
import { describe, it, expect } from 'vitest';
import {
  devInstallArgs,
  globalInstallArgs,
  globalInstallCommand,
  installDevDependencies,
} from '../../../../src/core/process/package-manager.js';
import { ExternalCommandFailedError } from '../../../../src/utils/errors.js';
import { FakeRunner, fail } from '../../../helpers/fake-runner.js';

describe('package manager arguments', () => {
  it('should build dev install arguments per manager', () => {
    expect(devInstallArgs('npm', ['prettier'])).toEqual(['install', '--save-dev', 'prettier']);
    expect(devInstallArgs('yarn', ['prettier'])).toEqual(['add', '--dev', 'prettier']);
    expect(devInstallArgs('pnpm', ['prettier'])).toEqual(['add', '--save-dev', 'prettier']);
  });

  it('should build global install arguments per manager', () => {
    expect(globalInstallArgs('npm', '@vue/cli')).toEqual(['install', '-g', '@vue/cli']);
    expect(globalInstallArgs('yarn', '@vue/cli')).toEqual(['global', 'add', '@vue/cli']);
    expect(globalInstallArgs('pnpm', '@vue/cli')).toEqual(['add', '-g', '@vue/cli']);
    expect(globalInstallCommand('yarn', '@angular/cli')).toBe('yarn global add @angular/cli');
  });
});

describe('installDevDependencies', () => {
  it('should run the install in the project directory', async () => {
    const runner = new FakeRunner();

    await installDevDependencies(runner, 'pnpm', '/work/demo', ['typescript', '@types/node']);

    expect(runner.calls).toEqual([
      { command: 'pnpm', args: ['add', '--save-dev', 'typescript', '@types/node'], options: { cwd: '/work/demo' } },
    ]);
  });

  it('should throw when the install fails', async () => {
    const runner = new FakeRunner().on('npm install', fail('network timeout'));

    await expect(installDevDependencies(runner, 'npm', '/work/demo', ['eslint'])).rejects.toBeInstanceOf(
      ExternalCommandFailedError
    );
  });
});
