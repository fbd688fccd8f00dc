/**
 * Custom Error Classes
 */

/**
 * Base error class for all tiersync errors
 */
export class TierSyncError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TierSyncError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Local filesystem failure (stat, read, directory walk)
 */
export class IOError extends TierSyncError {
  constructor(path: string, operation: string, cause?: unknown) {
    super(
      `Failed to ${operation} ${path}: ${describeCause(cause)}`,
      'IO_ERROR',
      { path, operation },
      { cause }
    );
    this.name = 'IOError';
  }
}

/**
 * Remote store call failed or answered with an error
 */
export class RemoteError extends TierSyncError {
  public readonly statusCode?: number;

  constructor(
    message: string,
    endpoint: string,
    statusCode?: number,
    cause?: unknown
  ) {
    super(message, 'REMOTE_ERROR', { endpoint, statusCode }, { cause });
    this.name = 'RemoteError';
    this.statusCode = statusCode;
  }
}

/**
 * A create notification collided with an object that is already uploaded
 */
export class RaceError extends TierSyncError {
  constructor(path: string, cause?: unknown) {
    super(
      `Create of ${path} failed after retry: ${describeCause(cause)}`,
      'RACE_ERROR',
      { path },
      { cause }
    );
    this.name = 'RaceError';
  }
}

/**
 * Invalid configuration or an environment that cannot be started in
 */
export class ConfigError extends TierSyncError {
  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}\n${issues.map(i => `  - ${i}`).join('\n')}` : message,
      'CONFIG_ERROR',
      { issues }
    );
    this.name = 'ConfigError';
  }
}

/**
 * A local path outside the synchronized root, or a malformed remote path
 */
export class PathError extends TierSyncError {
  constructor(path: string, reason: string) {
    super(`Invalid path ${JSON.stringify(path)}: ${reason}`, 'PATH_ERROR', { path, reason });
    this.name = 'PathError';
  }
}

/**
 * A remote call was refused because the sync folder is closing
 */
export class ShutdownError extends TierSyncError {
  constructor(operation: string, path: string) {
    super(`Not starting ${operation} of ${path}: sync folder is closing`, 'SHUTDOWN', { operation, path });
    this.name = 'ShutdownError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

/**
 * Render any thrown value as a single message
 */
export function formatError(error: unknown): string {
  if (error instanceof TierSyncError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
