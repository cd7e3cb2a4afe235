/**
 * Custom error types for the mail archiver
 * Provides structured error handling with context and categorization
 */

export enum ErrorCode {
  // Connection errors
  CONNECTION_FAILED = "CONNECTION_FAILED",
  CONNECTION_TIMEOUT = "CONNECTION_TIMEOUT",
  CONNECTION_REFUSED = "CONNECTION_REFUSED",
  HOST_NOT_FOUND = "HOST_NOT_FOUND",

  // Authentication errors
  AUTH_FAILED = "AUTH_FAILED",

  // TLS errors
  TLS_FAILED = "TLS_FAILED",

  // Per-item errors
  FETCH_TRANSIENT = "FETCH_TRANSIENT",
  FETCH_MALFORMED = "FETCH_MALFORMED",
  PARSE_FAILED = "PARSE_FAILED",
  WRITE_FAILED = "WRITE_FAILED",
  DELETE_FAILED = "DELETE_FAILED",
  CLEANUP_FAILED = "CLEANUP_FAILED",

  // Mailbox errors
  FOLDER_NOT_FOUND = "FOLDER_NOT_FOUND",

  // Validation and configuration errors
  VALIDATION_FAILED = "VALIDATION_FAILED",
  CONFIG_INVALID = "CONFIG_INVALID",
  CONFIG_MISSING = "CONFIG_MISSING",

  // Internal errors
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export interface ErrorContext {
  operation?: string;
  service?: string;
  timestamp?: Date;
  folder?: string;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all archiver errors
 */
export abstract class ArchiveError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isRetryable = false,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...context,
      timestamp: context.timestamp || new Date(),
    };
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a serializable representation of the error
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      isRetryable: this.isRetryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  /**
   * Get a user-friendly error message
   */
  getUserMessage(): string {
    return this.message;
  }
}

export type ConnectionErrorKind = "auth" | "network" | "tls";
export type ConnectionTarget = "mail" | "storage";

/**
 * Connection-level failures. Fatal to the whole run.
 */
export class ConnectionError extends ArchiveError {
  public readonly target: ConnectionTarget;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONNECTION_FAILED,
    target: ConnectionTarget = "mail",
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    // Auth failures will not heal by themselves; network ones might
    super(message, code, context, code !== ErrorCode.AUTH_FAILED, options);
    this.target = target;
  }

  get kind(): ConnectionErrorKind {
    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
        return "auth";
      case ErrorCode.TLS_FAILED:
        return "tls";
      default:
        return "network";
    }
  }

  getUserMessage(): string {
    const server = this.target === "mail" ? "mail server" : "NAS";
    switch (this.code) {
      case ErrorCode.AUTH_FAILED:
        return `The ${server} rejected the credentials. Please check your username and password.`;
      case ErrorCode.TLS_FAILED:
        return `Could not establish a secure connection to the ${server}. Check the port and TLS settings.`;
      case ErrorCode.HOST_NOT_FOUND:
        return `The ${server} host name could not be resolved.`;
      case ErrorCode.CONNECTION_TIMEOUT:
        return `Connection to the ${server} timed out. Please check your network connection and try again.`;
      case ErrorCode.CONNECTION_REFUSED:
        return `Connection to the ${server} was refused. The server may be unavailable.`;
      default:
        return `Unable to connect to the ${server}. Please try again later.`;
    }
  }
}

/**
 * Failure to download one message. Transient faults are retryable.
 */
export class FetchError extends ArchiveError {
  public readonly uid: number;

  constructor(
    message: string,
    uid: number,
    retryable: boolean,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(
      message,
      retryable ? ErrorCode.FETCH_TRANSIENT : ErrorCode.FETCH_MALFORMED,
      context,
      retryable,
      options,
    );
    this.uid = uid;
  }

  getUserMessage(): string {
    return this.isRetryable
      ? `Message ${this.uid} could not be downloaded because of a network problem.`
      : `Message ${this.uid} could not be downloaded: the server response was unusable.`;
  }
}

/**
 * Malformed message structure
 */
export class ParseError extends ArchiveError {
  public readonly uid: number;

  constructor(
    message: string,
    uid: number,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.PARSE_FAILED, context, false, options);
    this.uid = uid;
  }

  getUserMessage(): string {
    return `Message ${this.uid} could not be parsed and was skipped.`;
  }
}

/**
 * Local filesystem or remote transfer failure for one file
 */
export class WriteError extends ArchiveError {
  public readonly path: string;

  constructor(
    message: string,
    path: string,
    context: ErrorContext = {},
    options?: { cause?: unknown },
    code: ErrorCode.WRITE_FAILED | ErrorCode.CLEANUP_FAILED = ErrorCode.WRITE_FAILED,
  ) {
    super(message, code, context, false, options);
    this.path = path;
  }

  getUserMessage(): string {
    if (this.code === ErrorCode.CLEANUP_FAILED) {
      return `Could not remove ${this.path}.`;
    }
    return `Could not write ${this.path}.`;
  }
}

/**
 * Server-side deletion failure for a batch of messages
 */
export class DeleteError extends ArchiveError {
  public readonly uids: number[];

  constructor(
    message: string,
    uids: number[],
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.DELETE_FAILED, context, false, options);
    this.uids = uids;
  }

  getUserMessage(): string {
    return `Deleting ${this.uids.length} message(s) from the server failed. Nothing that was already archived was rolled back.`;
  }
}

/**
 * The requested mailbox does not exist or cannot be opened
 */
export class FolderNotFoundError extends ArchiveError {
  public readonly folder: string;

  constructor(
    message: string,
    folder: string,
    context: ErrorContext = {},
    options?: { cause?: unknown },
  ) {
    super(message, ErrorCode.FOLDER_NOT_FOUND, context, false, options);
    this.folder = folder;
  }

  getUserMessage(): string {
    return `The folder '${this.folder}' does not exist or cannot be opened.`;
  }
}

/**
 * Input validation errors
 */
export class ValidationError extends ArchiveError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    field?: string,
    value?: unknown,
    context: ErrorContext = {},
  ) {
    super(message, ErrorCode.VALIDATION_FAILED, context, false);
    this.field = field;
    this.value = value;
  }

  getUserMessage(): string {
    if (this.field) {
      return `Invalid value for '${this.field}': ${this.message}`;
    }
    return `Validation failed: ${this.message}`;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ArchiveError {
  public readonly configKey?: string;

  constructor(
    message: string,
    configKey?: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context: ErrorContext = {},
  ) {
    super(message, code, context, false);
    this.configKey = configKey;
  }

  getUserMessage(): string {
    if (this.configKey) {
      return `Configuration error for '${this.configKey}': ${this.message}`;
    }
    return `Configuration error: ${this.message}`;
  }
}

class InternalError extends ArchiveError {
  constructor(error: Error, context: ErrorContext) {
    super(error.message, ErrorCode.INTERNAL_ERROR, context, false, {
      cause: error,
    });
    this.stack = error.stack;
  }

  getUserMessage(): string {
    return "An unexpected error occurred. Please try again.";
  }
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ArchiveError) {
    return error.isRetryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  // Consider network errors as retryable
  return (
    error.message.includes("ECONNRESET") ||
    error.message.includes("ENOTFOUND") ||
    error.message.includes("ETIMEDOUT")
  );
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof ArchiveError) {
    return error.code;
  }
  return ErrorCode.INTERNAL_ERROR;
}

/**
 * Get user-friendly message from any error
 */
export function getUserMessage(error: unknown): string {
  if (error instanceof ArchiveError) {
    return error.getUserMessage();
  }
  return "An unexpected error occurred. Please try again.";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert any thrown value to an ArchiveError
 */
export function toArchiveError(
  error: unknown,
  context: ErrorContext = {},
): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  const base = error instanceof Error ? error : new Error(String(error));
  return new InternalError(base, context);
}
