/**
 * Error Classification
 *
 * Classifies generation errors to decide whether a call is worth retrying
 * (timeouts, rate limits) and whether it counts against provider health.
 *
 * @module error-classification
 */

export type ErrorCategory = "provider_outage" | "rate_limit" | "input_error" | "timeout" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  retriable: boolean;
  shouldCountAsProviderFailure: boolean;
};

/** Patterns indicating LLM provider rate limiting or overload */
const LLM_RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const LLM_AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

const TIMEOUT_ERROR_NAMES = new Set(["TimeoutError", "AbortError", "GenerationTimeoutError"]);

function statusCodeOf(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  for (const key of ["status", "statusCode"] as const) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === "number") return value;
  }
  return null;
}

/**
 * Classify an error to determine its category and retry policy.
 */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (name === "ProviderUnavailableError") {
    return { category: "provider_outage", message: msg, retriable: false, shouldCountAsProviderFailure: false };
  }

  // Timeouts are retriable and never count as a provider failure
  if (TIMEOUT_ERROR_NAMES.has(name) || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "timeout", message: msg, retriable: true, shouldCountAsProviderFailure: false };
  }

  const statusCode = statusCodeOf(error);
  if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
    return { category: "rate_limit", message: msg, retriable: true, shouldCountAsProviderFailure: true };
  }
  if (statusCode === 401 || statusCode === 403) {
    return { category: "provider_outage", message: msg, retriable: false, shouldCountAsProviderFailure: true };
  }
  if (statusCode === 400 || statusCode === 422) {
    return { category: "input_error", message: msg, retriable: false, shouldCountAsProviderFailure: false };
  }

  if (LLM_AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", message: msg, retriable: false, shouldCountAsProviderFailure: true };
  }

  if (LLM_RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", message: msg, retriable: true, shouldCountAsProviderFailure: true };
  }

  return { category: "unknown", message: msg, retriable: false, shouldCountAsProviderFailure: false };
}
