/**
 * Custom error classes for @paneward/core operations.
 *
 * Every error carries a stable `code` so the presentation layer can map a
 * failure to a user-facing message without `instanceof` chains.
 */

export type ErrorCode =
  | 'LIST_UNAVAILABLE'
  | 'CAPTURE_FAILED'
  | 'DUPLICATE_NAME'
  | 'ALREADY_EXISTS'
  | 'NOT_FOUND'
  | 'TIMEOUT'
  | 'VALIDATION'
  | 'NO_CLIENT'
  | 'EXTERNAL_COMMAND'
  | 'FILE_SYSTEM'
  | 'LOCK_TIMEOUT';

/** Base class for all Paneward errors. */
export abstract class PanewardError extends Error {
  abstract readonly code: ErrorCode;
}

/** The multiplexer could not be reached to list its sessions. */
export class ListUnavailableError extends PanewardError {
  readonly code = 'LIST_UNAVAILABLE';

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ListUnavailableError';
  }
}

/** A single session's pane could not be captured this cycle. */
export class CaptureFailedError extends PanewardError {
  readonly code = 'CAPTURE_FAILED';

  constructor(
    message: string,
    public readonly sessionId: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CaptureFailedError';
  }
}

/** A create command named a session that is already tracked. */
export class DuplicateNameError extends PanewardError {
  readonly code = 'DUPLICATE_NAME';

  constructor(public readonly sessionId: string) {
    super(`A session named "${sessionId}" already exists`);
    this.name = 'DuplicateNameError';
  }
}

/** The multiplexer refused to create a session because the name is taken. */
export class AlreadyExistsError extends PanewardError {
  readonly code = 'ALREADY_EXISTS';

  constructor(
    public readonly sessionId: string,
    public readonly cause?: unknown,
  ) {
    super(`tmux session "${sessionId}" already exists`);
    this.name = 'AlreadyExistsError';
  }
}

/** Thrown when a requested resource (session, directory) is not found. */
export class NotFoundError extends PanewardError {
  readonly code = 'NOT_FOUND';

  constructor(
    message: string,
    public readonly resourceType: string,
    public readonly resourceId: string,
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** An external call did not settle within its time budget. */
export class TimeoutError extends PanewardError {
  readonly code = 'TIMEOUT';

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/** Thrown when input or configuration fails validation. */
export class ValidationError extends PanewardError {
  readonly code = 'VALIDATION';

  constructor(
    message: string,
    public readonly path: string,
    public readonly details: unknown[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** No terminal client is attached to the multiplexer, so nothing can be switched. */
export class NoClientError extends PanewardError {
  readonly code = 'NO_CLIENT';

  constructor(public readonly sessionId: string) {
    super(`No tmux client attached. Run: tmux attach -t ${sessionId}`);
    this.name = 'NoClientError';
  }
}

/** The multiplexer command exited with a failure not covered by a narrower error. */
export class ExternalCommandError extends PanewardError {
  readonly code = 'EXTERNAL_COMMAND';

  constructor(
    message: string,
    public readonly stderr: string = '',
    public readonly exitCode?: number,
  ) {
    super(message);
    this.name = 'ExternalCommandError';
  }
}

/** Thrown when a file system read/write operation fails. */
export class FileSystemError extends PanewardError {
  readonly code = 'FILE_SYSTEM';

  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/** Thrown when a file lock cannot be acquired after retries. */
export class LockTimeoutError extends PanewardError {
  readonly code = 'LOCK_TIMEOUT';

  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'LockTimeoutError';
  }
}

/** Returns a printable message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
