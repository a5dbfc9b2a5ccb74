/**
 * Tool invoker: runs external commands without a shell and captures output.
 */
import { spawn } from 'node:child_process';
import { ExternalCommandFailedError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export interface RunOptions {
  /** Working directory */
  cwd?: string;
  /** Payload written to stdin, then stdin is closed */
  input?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Extra environment variables */
  env?: Record<string, string>;
}

export interface ToolInvocationResult {
  success: boolean;
  /** Exit code, or null when the process never ran or was killed */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** The executable was not found on PATH */
  notFound?: boolean;
  /** The process was killed after exceeding timeoutMs */
  timedOut?: boolean;
}

/**
 * The seam every component uses to reach the process boundary.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ToolInvocationResult>;
}

/**
 * Render a command line for logs and error messages.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(' ');
}

/**
 * Extract the most useful failure text: stderr, then stdout, then a generic message.
 */
export function failureOutput(result: ToolInvocationResult): string {
  return result.stderr.trim() || result.stdout.trim() || 'Command failed without output';
}

/**
 * CommandRunner backed by child_process.spawn.
 */
export class ToolRunner implements CommandRunner {
  constructor(private readonly log?: Logger) {}

  run(command: string, args: string[], options: RunOptions = {}): Promise<ToolInvocationResult> {
    this.log?.debug(`Running command: ${formatCommand(command, args)}`, options.cwd ? { cwd: options.cwd } : undefined);

    return new Promise((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
      });

      const timer = options.timeoutMs
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGTERM');
          }, options.timeoutMs)
        : undefined;

      const finish = (result: ToolInvocationResult): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: NodeJS.ErrnoException) => {
        finish({
          success: false,
          exitCode: null,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: error.message,
          notFound: error.code === 'ENOENT',
        });
      });

      child.on('close', (code) => {
        const result: ToolInvocationResult = {
          success: code === 0 && !timedOut,
          exitCode: code,
          stdout: Buffer.concat(stdout).toString('utf-8'),
          stderr: Buffer.concat(stderr).toString('utf-8'),
        };
        if (timedOut) {
          result.timedOut = true;
          result.stderr = result.stderr || `Command timed out after ${options.timeoutMs}ms`;
        }
        finish(result);
      });

      // A process that exits before reading stdin raises EPIPE; the exit status reports the failure.
      child.stdin.on('error', () => undefined);
      if (options.input !== undefined) {
        child.stdin.write(options.input);
      }
      child.stdin.end();
    });
  }
}

/**
 * Run a command and throw ExternalCommandFailedError on a non-zero exit.
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<ToolInvocationResult> {
  const result = await runner.run(command, args, options);
  if (!result.success) {
    const commandLine = formatCommand(command, args);
    throw new ExternalCommandFailedError(commandLine, failureOutput(result), {
      exitCode: result.exitCode,
      cwd: options.cwd,
    });
  }
  return result;
}
