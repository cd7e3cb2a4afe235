import { describe, expect, it } from "vitest";
import {
  ConnectionError,
  ErrorCode,
  FetchError,
  ParseError,
} from "../src/types/errors.js";
import {
  classifyConnectionError,
  errorCodeOf,
  isTransientNetworkError,
  toFetchError,
} from "../src/utils/imapError.js";

const withCode = (message: string, code: string): Error =>
  Object.assign(new Error(message), { code });

describe("errorCodeOf", () => {
  it("should read string codes only", () => {
    expect(errorCodeOf(withCode("x", "ECONNRESET"))).toBe("ECONNRESET");
    expect(errorCodeOf({ code: 42 })).toBeUndefined();
    expect(errorCodeOf("ECONNRESET")).toBeUndefined();
    expect(errorCodeOf(null)).toBeUndefined();
  });
});

describe("classifyConnectionError", () => {
  it("should detect IMAP authentication failures", () => {
    const error = Object.assign(new Error("Command failed"), { authenticationFailed: true });
    const classified = classifyConnectionError(error, "mail");

    expect(classified.code).toBe(ErrorCode.AUTH_FAILED);
    expect(classified.kind).toBe("auth");
    expect(classified.cause).toBe(error);
  });

  it("should detect SMB logon failures", () => {
    const classified = classifyConnectionError(
      withCode("logon", "STATUS_LOGON_FAILURE"),
      "storage",
    );
    expect(classified.code).toBe(ErrorCode.AUTH_FAILED);
    expect(classified.target).toBe("storage");
  });

  it("should detect authentication failures by message", () => {
    expect(classifyConnectionError(new Error("Invalid credentials (Failure)"), "mail").kind).toBe(
      "auth",
    );
  });

  it("should detect TLS failures", () => {
    expect(classifyConnectionError(withCode("cert", "CERT_HAS_EXPIRED"), "mail").kind).toBe("tls");
    expect(
      classifyConnectionError(withCode("x", "ERR_SSL_WRONG_VERSION_NUMBER"), "mail").kind,
    ).toBe("tls");
    expect(classifyConnectionError(new Error("TLS handshake aborted"), "mail").kind).toBe("tls");
  });

  it.each([
    ["ENOTFOUND", ErrorCode.HOST_NOT_FOUND],
    ["EAI_AGAIN", ErrorCode.HOST_NOT_FOUND],
    ["ECONNREFUSED", ErrorCode.CONNECTION_REFUSED],
    ["ETIMEDOUT", ErrorCode.CONNECTION_TIMEOUT],
    ["GreetingTimeout", ErrorCode.CONNECTION_TIMEOUT],
    ["EHOSTUNREACH", ErrorCode.CONNECTION_FAILED],
  ])("should map %s to %s", (code, expected) => {
    const classified = classifyConnectionError(withCode("failed", code), "mail");
    expect(classified.code).toBe(expected);
    expect(classified.kind).toBe("network");
  });

  it("should pass existing connection errors through", () => {
    const original = new ConnectionError("x", ErrorCode.TLS_FAILED);
    expect(classifyConnectionError(original, "storage")).toBe(original);
  });
});

describe("isTransientNetworkError", () => {
  it("should recognise dropped connections", () => {
    expect(isTransientNetworkError(withCode("x", "ECONNRESET"))).toBe(true);
    expect(isTransientNetworkError(withCode("x", "NoConnection"))).toBe(true);
    expect(isTransientNetworkError(new Error("Socket timeout"))).toBe(true);
    expect(isTransientNetworkError(new Error("Connection not available"))).toBe(true);
  });

  it("should not retry protocol errors", () => {
    expect(isTransientNetworkError(new Error("Command failed: BAD"))).toBe(false);
  });
});

describe("toFetchError", () => {
  it("should wrap transient failures as retryable", () => {
    const error = toFetchError(withCode("read ECONNRESET", "ECONNRESET"), 12);

    expect(error).toBeInstanceOf(FetchError);
    expect(error.isRetryable).toBe(true);
    expect(error.message).toBe("Failed to fetch message 12: read ECONNRESET");
  });

  it("should wrap other failures as not retryable", () => {
    const error = toFetchError(new Error("Command failed"), 12);
    expect(error.code).toBe(ErrorCode.FETCH_MALFORMED);
  });

  it("should keep archive errors as they are", () => {
    const original = new ParseError("bad", 1);
    expect(toFetchError(original, 1)).toBe(original);
  });
});
