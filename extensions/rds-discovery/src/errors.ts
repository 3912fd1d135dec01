/**
 * Provider Error Taxonomy
 *
 * Normalizes AWS SDK v3 errors into the small set of failure kinds the
 * discovery engine reasons about.
 */

import type { FailureKind, UnavailableReason } from "./types.js";

// =============================================================================
// Error Classes
// =============================================================================

/**
 * A provider call failure, normalized to a {@link FailureKind}
 */
export class ProviderError extends Error {
  readonly kind: FailureKind;
  readonly code?: string;

  constructor(kind: FailureKind, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ProviderError";
    this.kind = kind;
    this.code = options.code;
  }
}

/**
 * Raised for sub-lookups that were still queued or in flight when the
 * run-level timeout fired
 */
export class DiscoveryTimeoutError extends Error {
  constructor(message = "Discovery run timed out") {
    super(message);
    this.name = "DiscoveryTimeoutError";
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Read a property off an unknown value without asserting its shape
 */
export function readField(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object" || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

/**
 * Extract an error code from an AWS SDK or Node.js error
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = readField(err, "code") ?? readField(err, "Code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  if (err instanceof Error && err.name && err.name !== "Error") return err.name;
  return undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function extractHttpStatus(err: unknown): number | undefined {
  const status = readField(readField(err, "$metadata"), "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

// =============================================================================
// Classification
// =============================================================================

const ACCESS_DENIED_CODES = new Set([
  "AccessDenied",
  "AccessDeniedException",
  "UnauthorizedOperation",
  "UnauthorizedAccess",
  "AuthFailure",
  "ExpiredToken",
  "ExpiredTokenException",
  "InvalidClientTokenId",
  "UnrecognizedClientException",
  "SignatureDoesNotMatch",
  "CredentialsProviderError",
]);

const RATE_LIMITED_CODES = new Set([
  "Throttling",
  "ThrottlingException",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "RequestThrottled",
  "RequestThrottledException",
  "EC2ThrottledException",
  "SlowDown",
]);

const TRANSIENT_CODES = new Set([
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalFailure",
  "InternalServiceError",
  "InternalServerError",
  "RequestTimeout",
  "RequestTimeoutException",
  "TimeoutError",
  "NetworkingError",
  "PriorRequestNotComplete",
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

/**
 * Map any error thrown by a provider call onto the failure taxonomy.
 *
 * Anything unrecognized is treated as `Malformed`: the call returned or
 * raised something the gateway cannot interpret.
 */
export function classifyProviderError(err: unknown): FailureKind {
  if (err instanceof ProviderError) return err.kind;

  const code = extractErrorCode(err) ?? "";
  const status = extractHttpStatus(err);

  if (code.includes("NotFound")) return "NotFound";
  if (ACCESS_DENIED_CODES.has(code) || status === 403) return "AccessDenied";
  if (RATE_LIMITED_CODES.has(code) || status === 429) return "RateLimited";
  if (TRANSIENT_CODES.has(code)) return "Transient";
  if (status !== undefined && status >= 500) return "Transient";

  const message = formatErrorMessage(err);
  if (/throttl|rate exceeded/i.test(message)) return "RateLimited";
  if (/ECONNRESET|ETIMEDOUT|ECONNREFUSED|socket hang up/i.test(message)) return "Transient";

  return "Malformed";
}

/**
 * Wrap an arbitrary error into a {@link ProviderError}
 */
export function toProviderError(err: unknown, label?: string): ProviderError {
  if (err instanceof ProviderError) return err;
  const kind = classifyProviderError(err);
  const message = formatErrorMessage(err);
  return new ProviderError(kind, label ? `${label}: ${message}` : message, {
    code: extractErrorCode(err),
    cause: err,
  });
}

export function isRetryableFailure(kind: FailureKind): boolean {
  return kind === "RateLimited" || kind === "Transient";
}

/**
 * Reason recorded in the graph when a sub-lookup fails
 */
export function toUnavailableReason(err: unknown): UnavailableReason {
  if (err instanceof DiscoveryTimeoutError) return "timeout";
  return classifyProviderError(err);
}
