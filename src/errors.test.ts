import { describe, it, expect } from "vitest";
import {
  errorMessage,
  NoUsageDataError,
  QuotaFetchError,
  sanitizeApiError,
  UpstreamApiError,
} from "./errors.js";

describe("sanitizeApiError", () => {
  it("maps known statuses to fixed messages", () => {
    expect(sanitizeApiError(400)).toBe("Report not available for requested date");
    expect(sanitizeApiError(401)).toBe("Authentication failed with reports API");
    expect(sanitizeApiError(403)).toBe("Authentication failed with reports API");
    expect(sanitizeApiError(429)).toBe("Rate limit exceeded");
  });

  it("falls back to a generic message with the status", () => {
    expect(sanitizeApiError(503)).toBe("Reports API error (503)");
  });
});

describe("error classes", () => {
  it("UpstreamApiError keeps the status and a sanitized message", () => {
    const err = new UpstreamApiError(403);
    expect(err.status).toBe(403);
    expect(err.message).toBe("Authentication failed with reports API");
    expect(err.name).toBe("UpstreamApiError");
  });

  it("NoUsageDataError names the date", () => {
    const err = new NoUsageDataError("2026-10-18");
    expect(err.message).toBe("No usage data in report for 2026-10-18");
    expect(err.date).toBe("2026-10-18");
  });

  it("QuotaFetchError carries its cause", () => {
    const cause = new Error("boom");
    const err = new QuotaFetchError("failed", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
