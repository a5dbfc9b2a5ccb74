/**
 * Dependency resolver: verifies the runtime, package manager and framework CLI,
 * installing whatever is missing.
 *
 * Re-running `ensure` with everything present only runs version checks.
 */
import type { PackageManager } from '../config/schema.js';
import {
  InstallFailedError,
  ToolMissingError,
  ToolVersionUnsupportedError,
} from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import { failureOutput, type CommandRunner } from '../process/runner.js';
import { globalInstallArgs, globalInstallCommand } from '../process/package-manager.js';
import { checkFrameworkCli, checkPackageManager, checkRuntime, nodeRemediation } from './checks.js';
import {
  checkNetwork,
  DOWNLOAD_TIMEOUT_MS,
  FetchHttpClient,
  nodeSetupScriptUrl,
  type HttpClient,
} from './network.js';
import { acquirePrivileges, type SecretPrompt } from './privilege.js';
import { withTempFile } from './temp-file.js';
import { parseVersion, type VersionRange } from './version.js';
import type { DependencyCheckResult, DependencyRequirements, FrameworkCli } from './types.js';

const INSTALL_TIMEOUT_MS = 10 * 60 * 1000;

export interface DependencyResolverOptions {
  runner: CommandRunner;
  logger: Logger;
  http?: HttpClient;
  /** Credential prompt used when sudo needs a password */
  promptSecret?: SecretPrompt;
  /** Directory for the temporary setup script (default: OS temp dir) */
  tempRoot?: string;
}

export class DependencyResolver {
  private readonly runner: CommandRunner;
  private readonly log: Logger;
  private readonly http: HttpClient;
  private readonly promptSecret?: SecretPrompt;
  private readonly tempRoot?: string;

  constructor(options: DependencyResolverOptions) {
    this.runner = options.runner;
    this.log = options.logger.child('deps');
    this.http = options.http ?? new FetchHttpClient();
    this.promptSecret = options.promptSecret;
    this.tempRoot = options.tempRoot;
  }

  /**
   * Verify every required tool without installing anything.
   */
  async check(requirements: DependencyRequirements): Promise<DependencyCheckResult[]> {
    const results = [
      await checkRuntime(this.runner, requirements.runtime, this.log),
      await checkPackageManager(this.runner, requirements.packageManager, this.log),
    ];
    if (requirements.frameworkCli) {
      results.push(
        await checkFrameworkCli(this.runner, requirements.frameworkCli, requirements.packageManager, this.log)
      );
    }
    return results;
  }

  /**
   * Make sure every required tool is present, installing missing ones.
   * Throws a ScaffolderError carrying the remediation command on failure.
   */
  async ensure(requirements: DependencyRequirements): Promise<void> {
    await this.ensureRuntime(requirements.runtime);
    await this.ensurePackageManager(requirements.packageManager);
    if (requirements.frameworkCli) {
      await this.ensureFrameworkCli(requirements.frameworkCli, requirements.packageManager);
    }
  }

  private async ensureRuntime(range: VersionRange): Promise<void> {
    const status = await checkRuntime(this.runner, range, this.log);
    if (status.status === 'satisfied') return;

    this.log.info('Attempting to install Node.js');
    await this.installRuntime(range);
  }

  /**
   * Download the vendor setup script, run it as root, install the package and verify.
   */
  private async installRuntime(range: VersionRange): Promise<void> {
    const remediation = nodeRemediation(range);
    await checkNetwork(this.http, this.log);
    const sudo = await acquirePrivileges(this.runner, this.log, remediation, this.promptSecret);

    const major = parseVersion(range.minimum)?.major ?? 20;
    const url = nodeSetupScriptUrl(major);

    await withTempFile(
      'nodesource_setup.sh',
      async (scriptPath) => {
        this.log.info(`Downloading Node.js ${major}.x setup script`);
        try {
          await this.http.download(url, scriptPath, DOWNLOAD_TIMEOUT_MS);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.log.error(`Failed to download ${url}: ${reason}`);
          throw new InstallFailedError('download', `Failed to download Node.js setup script: ${reason}`, remediation);
        }

        this.log.info('Running Node.js setup script');
        const setup = await sudo.run(['-E', 'bash', scriptPath], { timeoutMs: INSTALL_TIMEOUT_MS });
        if (!setup.success) {
          return this.installFailure('setup', `Failed to install Node.js: ${failureOutput(setup)}`, remediation);
        }

        this.log.info('Installing Node.js');
        const install = await sudo.run(['apt-get', 'install', '-y', 'nodejs'], { timeoutMs: INSTALL_TIMEOUT_MS });
        if (!install.success) {
          return this.installFailure('package', `Failed to install Node.js: ${failureOutput(install)}`, remediation);
        }
      },
      this.tempRoot
    );

    const verified = await checkRuntime(this.runner, range, this.log);
    if (verified.status === 'satisfied') {
      this.log.info(`Node.js installed: ${verified.version}`);
      return;
    }
    if (verified.unsupportedVersion) {
      this.log.error(verified.reason);
      throw new ToolVersionUnsupportedError('node', verified.unsupportedVersion, verified.reason, remediation);
    }
    this.installFailure('verify', `Node.js installation could not be verified: ${verified.reason}`, remediation);
  }

  private async ensurePackageManager(pm: PackageManager): Promise<void> {
    const status = await checkPackageManager(this.runner, pm, this.log);
    if (status.status === 'satisfied') return;

    if (pm === 'npm') {
      this.log.error('npm is missing although Node.js is installed');
      throw new ToolMissingError('npm', 'npm is not installed.', status.remediation);
    }

    this.log.info(`Attempting to install ${pm}`);
    const remediation = `Run: npm install -g ${pm}`;
    const install = await this.runner.run('npm', ['install', '-g', pm], { timeoutMs: INSTALL_TIMEOUT_MS });
    if (!install.success) {
      this.installFailure('package-manager', `Failed to install ${pm}: ${failureOutput(install)}`, remediation);
    }

    const verified = await checkPackageManager(this.runner, pm, this.log);
    if (verified.status !== 'satisfied') {
      this.installFailure('verify', `${pm} installation could not be verified: ${verified.reason}`, remediation);
    }
  }

  private async ensureFrameworkCli(cli: FrameworkCli, pm: PackageManager): Promise<void> {
    const status = await checkFrameworkCli(this.runner, cli, pm, this.log);
    if (status.status === 'satisfied') return;

    this.log.info(`Attempting to install ${cli.label}`);
    const remediation = `Run: ${globalInstallCommand(pm, cli.packageName)}`;
    const install = await this.runner.run(pm, globalInstallArgs(pm, cli.packageName), {
      timeoutMs: INSTALL_TIMEOUT_MS,
      env: cli.env,
    });
    if (!install.success) {
      this.installFailure('framework-cli', `Failed to install ${cli.label}: ${failureOutput(install)}`, remediation);
    }

    const verified = await checkFrameworkCli(this.runner, cli, pm, this.log);
    if (verified.status !== 'satisfied') {
      this.installFailure('verify', `${cli.label} installation could not be verified: ${verified.reason}`, remediation);
    }
    this.log.info(`${cli.label} installed`);
  }

  private installFailure(stage: string, message: string, remediation: string): never {
    this.log.error(message);
    throw new InstallFailedError(stage, message, remediation);
  }
}
