import { describe, expect, it } from "vitest";
import {
  classifyProviderError,
  extractStatus,
  isContextOverflowError,
  isProviderError,
  isRateLimitError,
  ProviderError,
  RateLimitError,
  toProviderError,
} from "./errors.js";

describe("classifyProviderError", () => {
  it("recognizes common provider messages", () => {
    expect(classifyProviderError("429 Too Many Requests")).toBe("rate_limit");
    expect(classifyProviderError("Overloaded")).toBe("rate_limit");
    expect(classifyProviderError("401 invalid x-api-key")).toBe("auth");
    expect(classifyProviderError("402 Payment Required")).toBe("billing");
    expect(classifyProviderError("Request timed out")).toBe("timeout");
    expect(classifyProviderError("invalid_request_error: messages.0 bad")).toBe("format");
    expect(classifyProviderError("socket hang up")).toBe("unknown");
  });

  it("ranks context overflow above everything else", () => {
    expect(classifyProviderError("invalid_request_error: prompt is too long")).toBe("context_overflow");
    expect(isContextOverflowError("413 Payload Too Large")).toBe(true);
    expect(isContextOverflowError("413")).toBe(false);
    expect(isContextOverflowError(undefined)).toBe(false);
  });

  it("exposes the rate limit check on raw messages", () => {
    expect(isRateLimitError("rate limit exceeded")).toBe(true);
    expect(isRateLimitError("")).toBe(false);
  });
});

describe("extractStatus", () => {
  it("reads the first 4xx or 5xx code", () => {
    expect(extractStatus("upstream said 503 Service Unavailable")).toBe(503);
    expect(extractStatus("model gpt-4o-2024 failed")).toBeUndefined();
  });
});

describe("toProviderError", () => {
  it("builds a RateLimitError for rate limits", () => {
    const cause = new Error("upstream");
    const err = toProviderError("429 slow down", { provider: "anthropic", model: "m", cause });
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err.reason).toBe("rate_limit");
    expect(err.provider).toBe("anthropic");
    expect(err.cause).toBe(cause);
    expect(err.status).toBe(429);
  });

  it("builds a classified ProviderError otherwise", () => {
    const err = toProviderError("unauthorized");
    expect(err).not.toBeInstanceOf(RateLimitError);
    expect(isProviderError(err)).toBe(true);
    expect(err.reason).toBe("auth");
    expect(err.name).toBe("ProviderError");
    expect(err.status).toBeUndefined();
  });

  it("defaults the reason to unknown", () => {
    expect(new ProviderError("x").reason).toBe("unknown");
    expect(isProviderError(new Error("x"))).toBe(false);
  });
});
