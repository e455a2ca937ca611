/**
 * CLI error types for structured error handling.
 *
 * Every error that should end the run with a specific exit code extends
 * CLIError. Core modules throw these directly so the CLI can report them
 * without wrapping.
 */

/**
 * Base CLI error. Thrown for operational errors that should exit
 * with a specific code but don't need stack traces.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public exitCode = 1,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Validation error for usage/argument issues.
 * Exit code 2 follows Unix convention.
 */
export class ValidationError extends CLIError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'ValidationError';
  }
}

/**
 * Missing or invalid configuration (token, owner, repo names, config file).
 * Raised before any network or git activity.
 */
export class ConfigError extends CLIError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'ConfigError';
  }
}

/**
 * The hosting platform rejected or failed a request.
 * `status` is the HTTP status when one was received.
 */
export class RepositoryAccessError extends CLIError {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(status === undefined ? message : `${message} (HTTP ${status})`, 1);
    this.name = 'RepositoryAccessError';
  }
}

/**
 * Release asset file does not exist locally.
 */
export class AssetNotFoundError extends CLIError {
  constructor(public readonly filePath: string) {
    super(`Release asset file not found: ${filePath}`, 1);
    this.name = 'AssetNotFoundError';
  }
}

/**
 * Asset upload failed in transport or was refused by the platform.
 */
export class UploadError extends CLIError {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(status === undefined ? message : `${message} (HTTP ${status})`, 1);
    this.name = 'UploadError';
  }
}

/**
 * A fatal stage of the submodule update workflow failed.
 * Earlier stages are not rolled back.
 */
export class SubmoduleStageError extends CLIError {
  constructor(
    public readonly stage: string,
    cause: Error,
  ) {
    super(`Submodule update failed at stage '${stage}': ${cause.message}`, 1);
    this.name = 'SubmoduleStageError';
    this.cause = cause;
  }
}

/**
 * Extract the HTTP status from an Octokit request error, if present.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
