import { AuditCode } from '../types/index.js';

export class CleanupError extends Error {
  constructor(
    message: string,
    public readonly code: AuditCode,
    public readonly path: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'CleanupError';
  }

  /** Underlying OS error message, if any */
  get detail(): string {
    return errorMessage(this.cause) ?? this.message;
  }
}

// fs errors come from Node's realm, not the caller's, so instanceof Error is
// not reliable; read the fields instead.
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return undefined;
}

export class PathInvalidError extends CleanupError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Source root is not usable: ${path} (${reason})`, AuditCode.PATH_INVALID, path, cause);
    this.name = 'PathInvalidError';
  }
}

export class UnreadableFileError extends CleanupError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot read file: ${path}`, AuditCode.UNREADABLE_FILE, path, cause);
    this.name = 'UnreadableFileError';
  }
}

export class DirectoryUnreadableError extends CleanupError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot list directory: ${path}`, AuditCode.DIRECTORY_UNREADABLE, path, cause);
    this.name = 'DirectoryUnreadableError';
  }
}

export class RenameFailedError extends CleanupError {
  constructor(path: string, public readonly target: string, cause?: unknown) {
    super(`Cannot rename ${path} to ${target}`, AuditCode.RENAME_FAILED, path, cause);
    this.name = 'RenameFailedError';
  }
}

export class RemovalFailedError extends CleanupError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot remove ${path}`, AuditCode.REMOVAL_FAILED, path, cause);
    this.name = 'RemovalFailedError';
  }
}

export class NameCollisionError extends CleanupError {
  constructor(path: string, public readonly target: string) {
    super(`Target already exists: ${target}`, AuditCode.NAME_COLLISION, path);
    this.name = 'NameCollisionError';
  }
}

export class PathStillTooLongError extends CleanupError {
  constructor(path: string, public readonly maxLength: number) {
    super(`Path cannot be shortened to ${maxLength} characters`, AuditCode.PATH_STILL_TOO_LONG, path);
    this.name = 'PathStillTooLongError';
  }
}

export class AttributeFailedError extends CleanupError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot clear hidden attribute on ${path}`, AuditCode.ATTRIBUTE_FAILED, path, cause);
    this.name = 'AttributeFailedError';
  }
}
