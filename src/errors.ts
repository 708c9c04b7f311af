export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UpstreamApiError extends Error {
  readonly status: number;

  constructor(status: number) {
    super(sanitizeApiError(status));
    this.name = "UpstreamApiError";
    this.status = status;
  }
}

/** The report for an accepted date came back without any usage entries. */
export class NoUsageDataError extends Error {
  readonly date: string;

  constructor(date: string) {
    super(`No usage data in report for ${date}`);
    this.name = "NoUsageDataError";
    this.date = date;
  }
}

export class QuotaFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "QuotaFetchError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function sanitizeApiError(status: number): string {
  switch (status) {
    case 400: return "Report not available for requested date";
    case 401:
    case 403: return "Authentication failed with reports API";
    case 404: return "Report not found";
    case 429: return "Rate limit exceeded";
    default: return `Reports API error (${status})`;
  }
}
