/**
 * Custom error classes for the backend.
 * Provides typed errors for the failures that abort an operation.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git invocation fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Error thrown when the configuration file cannot be read or has the wrong shape.
 * Fatal: the report is never rendered.
 */
export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly configPath: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'ConfigError'
  }
}
