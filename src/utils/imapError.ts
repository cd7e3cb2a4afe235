import {
  ArchiveError,
  ConnectionError,
  type ConnectionTarget,
  type ErrorContext,
  ErrorCode,
  errorMessage,
  FetchError,
} from "../types/errors.js";

const TLS_CODES = new Set([
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "CERT_HAS_EXPIRED",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ECONNABORTED",
  "NoConnection",
  "EConnectionClosed",
]);

/**
 * Read `code` off an error thrown by a network library without trusting its
 * shape.
 */
export function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function hasFlag(error: unknown, flag: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    flag in error &&
    Reflect.get(error, flag) === true
  );
}

function isTlsFailure(error: unknown, code: string | undefined): boolean {
  if (code && (TLS_CODES.has(code) || code.startsWith("ERR_SSL_"))) {
    return true;
  }
  return /\b(ssl|tls|certificate)\b/i.test(errorMessage(error));
}

function isAuthFailure(error: unknown, code: string | undefined): boolean {
  if (hasFlag(error, "authenticationFailed")) {
    return true;
  }
  if (code === "STATUS_LOGON_FAILURE" || code === "STATUS_ACCESS_DENIED") {
    return true;
  }
  return /\b(authentication|login|logon) failed\b|invalid credentials/i.test(
    errorMessage(error),
  );
}

/**
 * Map a connect-time failure of either adapter onto the auth / tls / network
 * split of ConnectionError.
 */
export function classifyConnectionError(
  error: unknown,
  target: ConnectionTarget,
  context: ErrorContext = {},
): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }

  const code = errorCodeOf(error);
  const message = errorMessage(error);
  const options = { cause: error };

  if (isAuthFailure(error, code)) {
    return new ConnectionError(message, ErrorCode.AUTH_FAILED, target, context, options);
  }
  if (isTlsFailure(error, code)) {
    return new ConnectionError(message, ErrorCode.TLS_FAILED, target, context, options);
  }

  switch (code) {
    case "ENOTFOUND":
    case "EAI_AGAIN":
      return new ConnectionError(message, ErrorCode.HOST_NOT_FOUND, target, context, options);
    case "ECONNREFUSED":
      return new ConnectionError(message, ErrorCode.CONNECTION_REFUSED, target, context, options);
    case "ETIMEDOUT":
    case "ConnectionTimeout":
    case "GreetingTimeout":
      return new ConnectionError(message, ErrorCode.CONNECTION_TIMEOUT, target, context, options);
    default:
      return new ConnectionError(message, ErrorCode.CONNECTION_FAILED, target, context, options);
  }
}

export function isTransientNetworkError(error: unknown): boolean {
  const code = errorCodeOf(error);
  if (code && TRANSIENT_CODES.has(code)) {
    return true;
  }
  return /socket|connection not available|connection closed|timed? ?out/i.test(
    errorMessage(error),
  );
}

/**
 * Wrap a failure from a single-message fetch. Anything that looks like the
 * connection dropping is worth one more attempt.
 */
export function toFetchError(
  error: unknown,
  uid: number,
  context: ErrorContext = {},
): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  return new FetchError(
    `Failed to fetch message ${uid}: ${errorMessage(error)}`,
    uid,
    isTransientNetworkError(error),
    context,
    { cause: error },
  );
}
