/**
 * Privilege escalation through sudo.
 *
 * Non-interactive sudo is tried first. When sudo is installed but needs a
 * password, the credential prompt (if any) is asked once and the password is
 * fed on stdin to every later sudo call of the session.
 */
import { PrivilegeUnavailableError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';
import type { CommandRunner, RunOptions, ToolInvocationResult } from '../process/runner.js';

export const SUDO_TIMEOUT_MS = 5000;

/** Ask the user for a secret without echoing it. */
export type SecretPrompt = (question: string) => Promise<string>;

/**
 * Runs commands as root for the rest of a resolver run.
 */
export class PrivilegedRunner {
  constructor(
    private readonly runner: CommandRunner,
    private readonly password?: string
  ) {}

  get interactive(): boolean {
    return this.password !== undefined;
  }

  run(args: string[], options: RunOptions = {}): Promise<ToolInvocationResult> {
    if (this.password === undefined) {
      return this.runner.run('sudo', ['-n', ...args], options);
    }
    return this.runner.run('sudo', ['-S', '-p', '', ...args], { ...options, input: `${this.password}\n` });
  }
}

/**
 * Acquire sudo. `remediation` is the manual command line reported on failure.
 */
export async function acquirePrivileges(
  runner: CommandRunner,
  log: Logger,
  remediation: string,
  prompt?: SecretPrompt
): Promise<PrivilegedRunner> {
  const probe = await runner.run('sudo', ['-n', 'true'], { timeoutMs: SUDO_TIMEOUT_MS });
  if (probe.success) {
    log.info('Sudo access verified (non-interactive)');
    return new PrivilegedRunner(runner);
  }

  if (probe.notFound) {
    log.error('Sudo not installed');
    throw new PrivilegeUnavailableError('Sudo is not installed.', remediation);
  }

  if (!prompt) {
    log.error('Sudo requires a password and no prompt is available');
    throw new PrivilegeUnavailableError('Sudo requires a password.', remediation);
  }

  const password = await prompt('[sudo] password required to install Node.js: ');
  const verify = await runner.run('sudo', ['-S', '-p', '', '-v'], {
    input: `${password}\n`,
    timeoutMs: SUDO_TIMEOUT_MS,
  });
  if (!verify.success) {
    log.error('Sudo rejected the supplied password');
    throw new PrivilegeUnavailableError('Sudo rejected the supplied password.', remediation);
  }

  log.info('Sudo access verified (password)');
  return new PrivilegedRunner(runner, password);
}
