/**
 * Error types and codes for the scaffolder.
 * Every failure that crosses a component boundary is a ScaffolderError.
 */

export const ErrorCodes = {
  // Dependency resolution (D001-D006)
  NETWORK_UNAVAILABLE: 'D001',
  PRIVILEGE_UNAVAILABLE: 'D002',
  TOOL_MISSING: 'D003',
  TOOL_VERSION_UNSUPPORTED: 'D004',
  INSTALL_FAILED: 'D005',

  // Configuration (C001)
  INVALID_CONFIG: 'C001',

  // Generation (G001-G004)
  DIRECTORY_CONFLICT: 'G001',
  EXTERNAL_COMMAND_FAILED: 'G002',
  FILESYSTEM_ERROR: 'G003',
  GIT_SETUP_FAILED: 'G004',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all scaffolder errors.
 * `remediation` holds the exact command a user can run to fix the problem.
 */
export class ScaffolderError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly remediation?: string
  ) {
    super(message);
    this.name = 'ScaffolderError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      remediation: this.remediation,
    };
  }
}

/**
 * The reachability probe to the vendor host failed.
 */
export class NetworkUnavailableError extends ScaffolderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.NETWORK_UNAVAILABLE, message, details);
    this.name = 'NetworkUnavailableError';
  }
}

/**
 * sudo is missing, or needs a password nobody can supply.
 */
export class PrivilegeUnavailableError extends ScaffolderError {
  constructor(message: string, remediation: string, details?: Record<string, unknown>) {
    super(ErrorCodes.PRIVILEGE_UNAVAILABLE, message, details, remediation);
    this.name = 'PrivilegeUnavailableError';
  }
}

export class ToolMissingError extends ScaffolderError {
  constructor(
    public readonly tool: string,
    message: string,
    remediation: string
  ) {
    super(ErrorCodes.TOOL_MISSING, message, { tool }, remediation);
    this.name = 'ToolMissingError';
  }
}

export class ToolVersionUnsupportedError extends ScaffolderError {
  constructor(
    public readonly tool: string,
    public readonly version: string,
    message: string,
    remediation: string
  ) {
    super(ErrorCodes.TOOL_VERSION_UNSUPPORTED, message, { tool, version }, remediation);
    this.name = 'ToolVersionUnsupportedError';
  }
}

/**
 * An install sequence failed. `stage` names the sub-step (download, setup, package, verify).
 */
export class InstallFailedError extends ScaffolderError {
  constructor(
    public readonly stage: string,
    message: string,
    remediation?: string,
    details?: Record<string, unknown>
  ) {
    super(ErrorCodes.INSTALL_FAILED, message, { stage, ...details }, remediation);
    this.name = 'InstallFailedError';
  }
}

export class InvalidConfigError extends ScaffolderError {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(ErrorCodes.INVALID_CONFIG, message, { field });
    this.name = 'InvalidConfigError';
  }
}

export class DirectoryConflictError extends ScaffolderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.DIRECTORY_CONFLICT, message, details);
    this.name = 'DirectoryConflictError';
  }
}

/**
 * A required external command exited non-zero.
 * The message is the command's stderr, falling back to stdout.
 */
export class ExternalCommandFailedError extends ScaffolderError {
  constructor(
    public readonly command: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(ErrorCodes.EXTERNAL_COMMAND_FAILED, message, { command, ...details });
    this.name = 'ExternalCommandFailedError';
  }
}

export class FilesystemError extends ScaffolderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.FILESYSTEM_ERROR, message, details);
    this.name = 'FilesystemError';
  }
}

export class GitSetupError extends ScaffolderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.GIT_SETUP_FAILED, message, details);
    this.name = 'GitSetupError';
  }
}

/**
 * Normalize anything thrown into a ScaffolderError.
 */
export function toScaffolderError(error: unknown, fallbackMessage = 'Unexpected error'): ScaffolderError {
  if (error instanceof ScaffolderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FilesystemError(`${fallbackMessage}: ${message}`, { originalError: message });
}
