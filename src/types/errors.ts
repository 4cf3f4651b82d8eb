/**
 * Custom error types for dashsync.
 *
 * These error classes provide structured error information with error codes
 * for programmatic handling and optional cause chaining. Every error can be
 * rendered as a structured payload for user-visible output.
 */

import type { SavedObjectRecord } from './saved-objects';

/**
 * Structured error payload printed by the CLI instead of a stack trace.
 */
export interface ErrorPayload {
  /** Error class name (e.g., 'NotFoundError') */
  kind: string;
  /** Error code for programmatic handling */
  code: string;
  /** Human-readable message */
  message: string;
}

/**
 * Base error class for all dashsync errors.
 */
export abstract class DashsyncError extends Error {
  /**
   * Error code for programmatic handling
   */
  abstract readonly code: string;

  /**
   * Optional underlying cause of this error
   */
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;

    // Maintains proper stack trace for where our error was thrown (V8-specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toPayload(): ErrorPayload {
    return { kind: this.name, code: this.code, message: this.message };
  }
}

/**
 * Validation error for environment variables and configuration.
 *
 * Thrown when:
 * - Required setting is missing
 * - Setting has an invalid format (e.g., unknown protocol)
 * - Configuration value is out of valid range
 *
 * @example
 * ```typescript
 * throw new ValidationError(
 *   "servers[0].protocol must be http or https (got: ftp)",
 *   "servers[0].protocol",
 *   "INVALID_PROTOCOL"
 * );
 * ```
 */
export class ValidationError extends DashsyncError {
  readonly code: string;
  readonly variable: string;

  constructor(message: string, variable: string, code = 'VALIDATION_ERROR', cause?: Error) {
    super(message, cause);
    this.variable = variable;
    this.code = code;
  }
}

/**
 * Configuration error for the server profile file.
 *
 * Thrown when the file is missing, unreadable or not valid JSON.
 */
export class ConfigError extends DashsyncError {
  readonly code: string;
  readonly path?: string;

  constructor(message: string, path: string | undefined, code = 'CONFIG_ERROR', cause?: Error) {
    super(message, cause);
    this.path = path;
    this.code = code;
  }
}

/**
 * File system error for export/import files.
 *
 * @example
 * ```typescript
 * try {
 *   await writeFile(filePath, content);
 * } catch (err) {
 *   throw new FileSystemError(
 *     `Failed to write export file: ${filePath}`,
 *     filePath,
 *     'FILE_WRITE_FAILED',
 *     err instanceof Error ? err : undefined
 *   );
 * }
 * ```
 */
export class FileSystemError extends DashsyncError {
  readonly code: string;
  readonly path: string;

  constructor(message: string, path: string, code = 'FS_ERROR', cause?: Error) {
    super(message, cause);
    this.path = path;
    this.code = code;
  }
}

/**
 * A named target is not declared in the server profiles.
 */
export class UnknownTargetError extends DashsyncError {
  readonly code = 'UNKNOWN_TARGET';
  readonly target: string;
  readonly available: readonly string[];

  constructor(target: string, available: readonly string[]) {
    const list = available.length > 0 ? available.join(', ') : '(none configured)';
    super(`Server '${target}' not found in configuration. Available servers: ${list}`);
    this.target = target;
    this.available = available;
  }
}

/**
 * The server could not be reached (refused, DNS failure, timeout, 5xx).
 */
export class ConnectionError extends DashsyncError {
  readonly code: string;
  readonly url: string;
  /** HTTP status when the server answered with a server-side failure */
  readonly statusCode?: number;

  constructor(message: string, url: string, statusCode?: number, cause?: Error) {
    super(message, cause);
    this.url = url;
    this.statusCode = statusCode;
    this.code = statusCode === undefined ? 'CONNECTION_FAILED' : 'SERVER_ERROR';
  }
}

/**
 * The server rejected the configured credentials (401/403).
 */
export class AuthError extends DashsyncError {
  readonly code = 'AUTH_FAILED';
  readonly url: string;
  readonly statusCode: number;

  constructor(message: string, url: string, statusCode: number, cause?: Error) {
    super(message, cause);
    this.url = url;
    this.statusCode = statusCode;
  }
}

/**
 * Any other unexpected HTTP response from the server.
 */
export class RequestError extends DashsyncError {
  readonly code = 'REQUEST_FAILED';
  readonly url: string;
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, url: string, statusCode: number, body: string) {
    super(message);
    this.url = url;
    this.statusCode = statusCode;
    this.body = body;
  }
}

/**
 * A saved object does not exist.
 */
export class NotFoundError extends DashsyncError {
  readonly code = 'NOT_FOUND';
  readonly objectType: string;
  readonly objectId: string;

  constructor(objectType: string, objectId: string) {
    super(`Saved object ${objectType}:${objectId} not found`);
    this.objectType = objectType;
    this.objectId = objectId;
  }
}

/**
 * An index does not exist.
 */
export class IndexNotFoundError extends DashsyncError {
  readonly code = 'INDEX_NOT_FOUND';
  readonly index: string;

  constructor(index: string) {
    super(`Index '${index}' not found`);
    this.index = index;
  }
}

/**
 * A line of an export file could not be decoded; aborts the whole decode.
 */
export class MalformedRecordError extends DashsyncError {
  readonly code = 'MALFORMED_RECORD';
  /** 1-based line number (or array position for the flat JSON form) */
  readonly lineNumber: number;

  constructor(lineNumber: number, reason: string, cause?: Error) {
    super(`Malformed record at line ${String(lineNumber)}: ${reason}`, cause);
    this.lineNumber = lineNumber;
  }
}

/**
 * A record is structurally invalid and cannot be written (per-record failure).
 */
export class InvalidRecordError extends DashsyncError {
  readonly code = 'INVALID_RECORD';
}

/**
 * The same (type, id) pair appeared twice within a single listing or
 * import batch.
 */
export class DuplicateRecordError extends DashsyncError {
  readonly code = 'DUPLICATE_RECORD';
  readonly objectType: string;
  readonly objectId: string;

  constructor(objectType: string, objectId: string, source: 'listing' | 'batch' = 'listing') {
    super(
      source === 'listing'
        ? `Saved object ${objectType}:${objectId} was returned twice while listing`
        : `Saved object ${objectType}:${objectId} appears more than once in the import batch`,
    );
    this.objectType = objectType;
    this.objectId = objectId;
  }
}

/**
 * Reference descriptor used by {@link DanglingReferenceError}.
 */
export interface MissingReference {
  type: string;
  id: string;
}

/**
 * A record references objects that exist neither in the batch nor in the destination.
 */
export class DanglingReferenceError extends DashsyncError {
  readonly code = 'DANGLING_REFERENCE';
  readonly missing: readonly MissingReference[];

  constructor(objectType: string, objectId: string, missing: readonly MissingReference[]) {
    const refs = missing.map((ref) => `${ref.type}:${ref.id}`).join(', ');
    super(`Saved object ${objectType}:${objectId} references missing objects: ${refs}`);
    this.missing = missing;
  }
}

/**
 * Export by id found only a subset of the requested ids.
 */
export class PartialExportError extends DashsyncError {
  readonly code = 'PARTIAL_EXPORT';
  readonly missingIds: readonly string[];
  /** Records that were found */
  readonly records: readonly SavedObjectRecord[];

  constructor(missingIds: readonly string[], records: readonly SavedObjectRecord[]) {
    super(`Export incomplete, objects not found: ${missingIds.join(', ')}`);
    this.missingIds = missingIds;
    this.records = records;
  }
}

/**
 * A lifecycle policy edit would make phase ages decrease.
 */
export class InvalidPhaseOrderingError extends DashsyncError {
  readonly code = 'INVALID_PHASE_ORDERING';
  readonly policy: string;

  constructor(policy: string, message: string) {
    super(`Policy '${policy}': ${message}`);
    this.policy = policy;
  }
}

/**
 * The target's cluster does not offer the API an operation needs
 * (e.g. `_ilm` on OpenSearch).
 */
export class UnsupportedOperationError extends DashsyncError {
  readonly code = 'UNSUPPORTED_OPERATION';
}

/**
 * Render any thrown value as a structured payload.
 *
 * @param error - Error object, string, or unknown value
 * @returns Payload with kind, code and message
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof DashsyncError) {
    return error.toPayload();
  }
  if (error instanceof Error) {
    return { kind: error.name || 'Error', code: 'UNEXPECTED', message: error.message };
  }
  return { kind: 'Error', code: 'UNEXPECTED', message: String(error) };
}
