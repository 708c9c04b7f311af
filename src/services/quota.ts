import { errorMessage, NoUsageDataError, QuotaFetchError } from "../errors.js";
import {
  TOTAL_QUOTA_PARAM,
  USED_QUOTA_PARAM,
  type UsageReportClient,
  type UsageReportsResponse,
} from "./reports-client.js";

/** Reports are published with a lag of a few days and occasionally skip one. */
export const MAX_PROBE_DAYS = 5;

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;

const DAY_MS = 86_400_000;

export interface QuotaSnapshot {
  readonly reportDate: string;
  readonly totalQuotaMB: number;
  readonly usedQuotaMB: number;
  /** NaN when the total quota is 0. */
  readonly percentageUsed: number;
}

export interface FetchQuotaOptions {
  signal?: AbortSignal;
}

export interface QuotaFetcher {
  fetchQuota(options?: FetchQuotaOptions): Promise<QuotaSnapshot>;
}

export interface QuotaFetcherOptions {
  now?: () => Date;
  upstreamTimeoutMs?: number;
  verbose?: boolean;
}

export function formatReportDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Yesterday (UTC, midnight) first, then one day further back per step. */
export function candidateDates(now: Date, count = MAX_PROBE_DAYS): string[] {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  const dates: string[] = [];
  for (let offset = 1; offset <= count; offset++) {
    dates.push(formatReportDate(new Date(today - offset * DAY_MS)));
  }
  return dates;
}

export function percentageUsed(usedQuotaMB: number, totalQuotaMB: number): number {
  if (totalQuotaMB === 0) return Number.NaN;
  return (usedQuotaMB / totalQuotaMB) * 100;
}

export function extractSnapshot(date: string, response: UsageReportsResponse): QuotaSnapshot {
  const report = response.usageReports?.[0];
  if (!report) {
    throw new NoUsageDataError(date);
  }

  let totalQuotaMB = 0;
  let usedQuotaMB = 0;

  for (const param of report.parameters ?? []) {
    const value = Number(param.intValue ?? 0);
    if (!Number.isFinite(value)) continue;
    switch (param.name) {
      case TOTAL_QUOTA_PARAM:
        totalQuotaMB = value;
        break;
      case USED_QUOTA_PARAM:
        usedQuotaMB = value;
        break;
    }
  }

  return Object.freeze({
    reportDate: date,
    totalQuotaMB,
    usedQuotaMB,
    percentageUsed: percentageUsed(usedQuotaMB, totalQuotaMB),
  });
}

function deadlineSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!parent) return timeout;

  const controller = new AbortController();
  const forward = (source: AbortSignal) => () => controller.abort(source.reason);

  if (parent.aborted) {
    controller.abort(parent.reason);
    return controller.signal;
  }
  parent.addEventListener("abort", forward(parent), { once: true });
  timeout.addEventListener("abort", forward(timeout), { once: true });
  return controller.signal;
}

export function createQuotaFetcher(
  client: UsageReportClient,
  options: QuotaFetcherOptions = {},
): QuotaFetcher {
  const now = options.now ?? (() => new Date());
  const timeoutMs = options.upstreamTimeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
  const { verbose } = options;

  return {
    async fetchQuota({ signal: parent } = {}) {
      const signal = deadlineSignal(timeoutMs, parent);
      let lastError: unknown;

      for (const date of candidateDates(now())) {
        let response: UsageReportsResponse;
        try {
          response = await client.getCustomerUsage(date, signal);
        } catch (err) {
          if (signal.aborted) throw signal.reason;
          lastError = err;
          if (verbose) console.log(`[quota] no report for ${date}: ${errorMessage(err)}`);
          continue;
        }

        if (verbose) console.log(`[quota] using report for ${date}`);
        return extractSnapshot(date, response);
      }

      throw new QuotaFetchError(
        `No usage report available in the last ${MAX_PROBE_DAYS} days: ${errorMessage(lastError)}`,
        { cause: lastError },
      );
    },
  };
}
