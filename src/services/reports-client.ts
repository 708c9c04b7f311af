import { UpstreamApiError } from "../errors.js";

const REPORTS_BASE = "https://admin.googleapis.com/admin/reports/v1";

export const TOTAL_QUOTA_PARAM = "accounts:total_quota_in_mb";
export const USED_QUOTA_PARAM = "accounts:used_quota_in_mb";

/** Anything that can hand out a bearer token, e.g. an OAuth2Client. */
export interface TokenSource {
  getAccessToken(): Promise<{ token?: string | null }>;
}

export interface UsageReportParameter {
  name: string;
  // int64 values are serialized as JSON strings
  intValue?: string;
  boolValue?: boolean;
  stringValue?: string;
  datetimeValue?: string;
}

export interface UsageReport {
  date?: string;
  entity?: { customerId?: string; type?: string };
  parameters?: UsageReportParameter[];
}

export interface UsageReportsResponse {
  kind?: string;
  usageReports?: UsageReport[];
  warnings?: Array<{ code?: string; message?: string }>;
}

export interface UsageReportClient {
  getCustomerUsage(date: string, signal?: AbortSignal): Promise<UsageReportsResponse>;
}

export interface ReportsClientOptions {
  verbose?: boolean;
}

async function getAuthHeaders(tokenSource: TokenSource): Promise<Record<string, string>> {
  const tokenRes = await tokenSource.getAccessToken();
  const token = tokenRes.token;
  if (!token) {
    throw new Error("Failed to obtain access token");
  }
  return {
    Authorization: `Bearer ${token}`,
    Accept: "application/json",
  };
}

export function customerUsageUrl(date: string): string {
  const query = new URLSearchParams({
    parameters: [TOTAL_QUOTA_PARAM, USED_QUOTA_PARAM].join(","),
  });
  return `${REPORTS_BASE}/usage/dates/${encodeURIComponent(date)}?${query}`;
}

export function createReportsClient(
  tokenSource: TokenSource,
  options: ReportsClientOptions = {},
): UsageReportClient {
  const { verbose } = options;

  return {
    async getCustomerUsage(date, signal) {
      const headers = await getAuthHeaders(tokenSource);
      const res = await fetch(customerUsageUrl(date), { headers, signal });

      if (!res.ok) {
        const text = await res.text();
        if (verbose) console.error(`[reports] API error ${res.status} for ${date}: ${text}`);
        throw new UpstreamApiError(res.status);
      }

      return (await res.json()) as UsageReportsResponse;
    },
  };
}
