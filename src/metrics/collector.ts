import { errorMessage } from "../errors.js";
import type { QuotaFetcher } from "../services/quota.js";

export const BYTES_PER_MB = 1_048_576;

export interface MetricDescriptor {
  readonly name: string;
  readonly help: string;
}

export interface GaugeSample {
  name: string;
  value: number;
}

/**
 * Pull-based metric source. `describe` lists what exists and never
 * touches upstream; `collect` reads current values once per scrape.
 */
export interface Collector {
  describe(): readonly MetricDescriptor[];
  collect(signal?: AbortSignal): Promise<GaugeSample[]>;
}

export const REPORT_TIMESTAMP: MetricDescriptor = Object.freeze({
  name: "workspace_quota_report_timestamp_seconds",
  help:
    "Date (UTC midnight, Unix seconds) of the usage report the quota values come from; the data date, not the scrape time",
});

export const TOTAL_BYTES: MetricDescriptor = Object.freeze({
  name: "workspace_quota_total_bytes",
  help: "Total storage quota of the organisation in bytes",
});

export const USED_BYTES: MetricDescriptor = Object.freeze({
  name: "workspace_quota_used_bytes",
  help: "Storage quota used by the organisation in bytes",
});

const DESCRIPTORS: readonly MetricDescriptor[] = Object.freeze([
  REPORT_TIMESTAMP,
  TOTAL_BYTES,
  USED_BYTES,
]);

export function createQuotaCollector(fetcher: QuotaFetcher): Collector {
  return {
    describe() {
      return DESCRIPTORS;
    },

    async collect(signal) {
      try {
        const snapshot = await fetcher.fetchQuota({ signal });
        return [
          {
            name: REPORT_TIMESTAMP.name,
            value: Date.parse(`${snapshot.reportDate}T00:00:00Z`) / 1000,
          },
          { name: TOTAL_BYTES.name, value: snapshot.totalQuotaMB * BYTES_PER_MB },
          { name: USED_BYTES.name, value: snapshot.usedQuotaMB * BYTES_PER_MB },
        ];
      } catch (err) {
        console.error(`[metrics] quota fetch failed: ${errorMessage(err)}`);
        return [];
      }
    },
  };
}
