import { describe, it, expect } from "vitest";
import {
  ProviderError,
  DiscoveryTimeoutError,
  classifyProviderError,
  extractErrorCode,
  formatErrorMessage,
  toProviderError,
  toUnavailableReason,
  isRetryableFailure,
} from "./errors.js";

function sdkError(name: string, message = name, status?: number): Error {
  const error = Object.assign(new Error(message), status === undefined ? {} : { $metadata: { httpStatusCode: status } });
  error.name = name;
  return error;
}

describe("classifyProviderError", () => {
  it("maps *NotFound* names to NotFound", () => {
    expect(classifyProviderError(sdkError("DBInstanceNotFoundFault"))).toBe("NotFound");
    expect(classifyProviderError(sdkError("InvalidGroup.NotFound"))).toBe("NotFound");
    expect(classifyProviderError(sdkError("DBSubnetGroupNotFoundFault"))).toBe("NotFound");
  });

  it("maps auth failures to AccessDenied", () => {
    expect(classifyProviderError(sdkError("AccessDenied"))).toBe("AccessDenied");
    expect(classifyProviderError(sdkError("UnauthorizedOperation"))).toBe("AccessDenied");
    expect(classifyProviderError(sdkError("ExpiredToken"))).toBe("AccessDenied");
    expect(classifyProviderError(sdkError("SomethingElse", "nope", 403))).toBe("AccessDenied");
  });

  it("maps throttling to RateLimited", () => {
    expect(classifyProviderError(sdkError("ThrottlingException"))).toBe("RateLimited");
    expect(classifyProviderError(sdkError("RequestLimitExceeded"))).toBe("RateLimited");
    expect(classifyProviderError(sdkError("SomeError", "slow down", 429))).toBe("RateLimited");
    expect(classifyProviderError(new Error("Rate exceeded"))).toBe("RateLimited");
  });

  it("maps 5xx and network errors to Transient", () => {
    expect(classifyProviderError(sdkError("InternalFailure"))).toBe("Transient");
    expect(classifyProviderError(sdkError("SomeError", "boom", 502))).toBe("Transient");
    expect(classifyProviderError(Object.assign(new Error("connect failed"), { code: "ECONNRESET" }))).toBe(
      "Transient",
    );
    expect(classifyProviderError(new Error("socket hang up"))).toBe("Transient");
  });

  it("treats anything else as Malformed", () => {
    expect(classifyProviderError(new Error("unexpected token"))).toBe("Malformed");
    expect(classifyProviderError("weird")).toBe("Malformed");
    expect(classifyProviderError(undefined)).toBe("Malformed");
  });

  it("passes through the kind of a ProviderError", () => {
    expect(classifyProviderError(new ProviderError("AccessDenied", "denied"))).toBe("AccessDenied");
  });
});

describe("extractErrorCode", () => {
  it("prefers an explicit code over the name", () => {
    const error = Object.assign(sdkError("TimeoutError"), { code: "ETIMEDOUT" });
    expect(extractErrorCode(error)).toBe("ETIMEDOUT");
  });

  it("falls back to a non-generic name", () => {
    expect(extractErrorCode(sdkError("ThrottlingException"))).toBe("ThrottlingException");
    expect(extractErrorCode(new Error("plain"))).toBeUndefined();
  });
});

describe("formatErrorMessage", () => {
  it("formats errors, strings and objects", () => {
    expect(formatErrorMessage(new Error("bad"))).toBe("bad");
    expect(formatErrorMessage("text")).toBe("text");
    expect(formatErrorMessage(42)).toBe("42");
    expect(formatErrorMessage({ a: 1 })).toBe('{"a":1}');
  });
});

describe("toProviderError", () => {
  it("wraps with label, kind, code and cause", () => {
    const cause = sdkError("AccessDenied", "User is not authorized");
    const wrapped = toProviderError(cause, "DescribeDBSubnetGroups");
    expect(wrapped).toBeInstanceOf(ProviderError);
    expect(wrapped.kind).toBe("AccessDenied");
    expect(wrapped.code).toBe("AccessDenied");
    expect(wrapped.message).toBe("DescribeDBSubnetGroups: User is not authorized");
    expect(wrapped.cause).toBe(cause);
  });

  it("returns an existing ProviderError unchanged", () => {
    const error = new ProviderError("Malformed", "odd payload");
    expect(toProviderError(error, "label")).toBe(error);
  });
});

describe("toUnavailableReason", () => {
  it("reports timeouts separately", () => {
    expect(toUnavailableReason(new DiscoveryTimeoutError())).toBe("timeout");
    expect(toUnavailableReason(new ProviderError("RateLimited", "slow"))).toBe("RateLimited");
  });
});

describe("isRetryableFailure", () => {
  it("retries only rate limiting and transient failures", () => {
    expect(isRetryableFailure("RateLimited")).toBe(true);
    expect(isRetryableFailure("Transient")).toBe(true);
    expect(isRetryableFailure("NotFound")).toBe(false);
    expect(isRetryableFailure("AccessDenied")).toBe(false);
    expect(isRetryableFailure("Malformed")).toBe(false);
  });
});
