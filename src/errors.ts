/**
 * Error taxonomy for the diagnostics log.
 *
 * Usage errors are thrown at the call site. Transient I/O and low disk space
 * never reach callers; see RollingLogStore.
 */

export type DiagnosticsErrorCode =
  | 'ALREADY_INITIALIZED'
  | 'NOT_READY'
  | 'LOG_FILE_CREATION_FAILED';

export class DiagnosticsError extends Error {
  readonly code: DiagnosticsErrorCode;

  constructor(code: DiagnosticsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiagnosticsError';
    this.code = code;
  }
}

/** initialize() was called on a store that is already set up */
export class AlreadyInitializedError extends DiagnosticsError {
  constructor(filePath: string) {
    super('ALREADY_INITIALIZED', `Diagnostics log is already initialized at ${filePath}`);
    this.name = 'AlreadyInitializedError';
  }
}

/** The log was used before initialize() */
export class NotReadyError extends DiagnosticsError {
  constructor(operation: string) {
    super('NOT_READY', `Diagnostics log is not initialized (called ${operation} before initialize)`);
    this.name = 'NotReadyError';
  }
}

/** The log file could not be created within the creation limit */
export class LogFileCreationError extends DiagnosticsError {
  constructor(filePath: string, cause?: unknown) {
    super('LOG_FILE_CREATION_FAILED', `Unable to create the log file at ${filePath}`, { cause });
    this.name = 'LogFileCreationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
