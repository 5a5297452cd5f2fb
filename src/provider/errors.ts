/**
 * Provider Error Classification
 *
 * Design:
 * - Error classification: categorize LLM API errors into a few reasons so callers
 *   can tell a rate limit from a bad key from a malformed request
 * - No retry: provider errors surface to the caller of run() as-is
 * - Context overflow is detected separately so callers can suggest compaction
 */

// ============== Error Types ==============

export type ProviderErrorReason =
  | "rate_limit"
  | "auth"
  | "timeout"
  | "billing"
  | "format"
  | "context_overflow"
  | "unknown";

/**
 * ProviderError: a failed provider call with classification information
 *
 * - Carries error reason, provider, model, and other metadata
 */
export class ProviderError extends Error {
  readonly reason: ProviderErrorReason;
  readonly provider?: string;
  readonly model?: string;
  readonly status?: number;

  constructor(
    message: string,
    params: {
      reason?: ProviderErrorReason;
      provider?: string;
      model?: string;
      status?: number;
      cause?: unknown;
    } = {},
  ) {
    super(message, { cause: params.cause });
    this.name = "ProviderError";
    this.reason = params.reason ?? "unknown";
    this.provider = params.provider;
    this.model = params.model;
    this.status = params.status;
  }
}

export class RateLimitError extends ProviderError {
  constructor(
    message: string,
    params: { provider?: string; model?: string; status?: number; cause?: unknown } = {},
  ) {
    super(message, { ...params, reason: "rate_limit" });
    this.name = "RateLimitError";
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

// ============== Error Pattern Matching ==============

const RATE_LIMIT_PATTERNS = [
  "rate_limit",
  "rate limit",
  "too many requests",
  "429",
  "exceeded quota",
  "resource exhausted",
  "quota exceeded",
  "resource_exhausted",
  "usage limit",
  "overloaded",
];

const TIMEOUT_PATTERNS = [
  "timeout",
  "timed out",
  "deadline exceeded",
  "context deadline exceeded",
];

const AUTH_PATTERNS = [
  "invalid_api_key",
  "incorrect api key",
  "invalid x-api-key",
  "invalid token",
  "authentication",
  "unauthorized",
  "forbidden",
  "access denied",
  "401",
  "403",
];

const BILLING_PATTERNS = [
  "402",
  "payment required",
  "insufficient credits",
  "credit balance",
];

const FORMAT_PATTERNS = [
  "string should match pattern",
  "invalid request format",
  "invalid_request_error",
];

const CONTEXT_OVERFLOW_PATTERNS = [
  "request_too_large",
  "request exceeds the maximum size",
  "context length exceeded",
  "maximum context length",
  "prompt is too long",
  "exceeds model context window",
  "context overflow",
];

function matchesAny(message: string, patterns: string[]): boolean {
  const lower = message.toLowerCase();
  return patterns.some((p) => lower.includes(p));
}

export function isContextOverflowError(message?: string): boolean {
  if (!message) return false;
  if (matchesAny(message, CONTEXT_OVERFLOW_PATTERNS)) return true;
  // 413 + "too large" combination
  const lower = message.toLowerCase();
  return lower.includes("413") && lower.includes("too large");
}

export function isRateLimitError(message?: string): boolean {
  return !!message && matchesAny(message, RATE_LIMIT_PATTERNS);
}

/**
 * Classify error reason
 *
 * Matches by priority: context_overflow > billing > auth > rate_limit > timeout > format > unknown
 */
export function classifyProviderError(message: string): ProviderErrorReason {
  if (isContextOverflowError(message)) return "context_overflow";
  if (matchesAny(message, BILLING_PATTERNS)) return "billing";
  if (matchesAny(message, AUTH_PATTERNS)) return "auth";
  if (matchesAny(message, RATE_LIMIT_PATTERNS)) return "rate_limit";
  if (matchesAny(message, TIMEOUT_PATTERNS)) return "timeout";
  if (matchesAny(message, FORMAT_PATTERNS)) return "format";
  return "unknown";
}

/**
 * First HTTP error status mentioned in a message ("429 Too Many Requests" → 429)
 */
export function extractStatus(message: string): number | undefined {
  const match = /\b([45]\d\d)\b/.exec(message);
  return match ? Number(match[1]) : undefined;
}

/**
 * Build the right error class for a failed call
 */
export function toProviderError(
  message: string,
  params: { provider?: string; model?: string; status?: number; cause?: unknown } = {},
): ProviderError {
  const reason = classifyProviderError(message);
  const details = { ...params, status: params.status ?? extractStatus(message) };
  if (reason === "rate_limit") return new RateLimitError(message, details);
  return new ProviderError(message, { ...details, reason });
}
