import { describe, it, expect, vi, beforeEach } from "vitest";
import { metricsRoute } from "./metrics.js";
import { createMetricsExporter } from "../metrics/exporter.js";
import { createQuotaCollector } from "../metrics/collector.js";
import type { QuotaFetcher, QuotaSnapshot } from "../services/quota.js";

function makeFetcher(result: QuotaSnapshot | Error): QuotaFetcher {
  return {
    fetchQuota: vi.fn(async () => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}

function makeApp(fetcher: QuotaFetcher, token = "") {
  return metricsRoute(createMetricsExporter(createQuotaCollector(fetcher)), { token });
}

describe("metricsRoute", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("exposes quota gauges in bytes", async () => {
    const app = makeApp(
      makeFetcher({
        reportDate: "2026-10-18",
        totalQuotaMB: 1048576,
        usedQuotaMB: 524288,
        percentageUsed: 50,
      }),
    );
    const res = await app.request("/metrics");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/plain");
    const body = await res.text();
    expect(body).toMatch(/^workspace_quota_report_timestamp_seconds 1792281600$/m);
    expect(body).toMatch(/^workspace_quota_total_bytes 1099511627776$/m);
    expect(body).toMatch(/^workspace_quota_used_bytes 549755813888$/m);
  });

  it("still serves the descriptors when upstream is failing", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const app = makeApp(makeFetcher(new Error("reports API unavailable")));
    const res = await app.request("/metrics");

    expect(res.status).toBe(200);
    const body = await res.text();
    expect(body).toContain("# HELP workspace_quota_report_timestamp_seconds");
    expect(body).toContain("# HELP workspace_quota_total_bytes");
    expect(body).toContain("# HELP workspace_quota_used_bytes");
    expect(body).toContain("# TYPE workspace_quota_used_bytes gauge");
    expect(body).not.toMatch(/^workspace_quota_total_bytes /m);
    expect(body).not.toContain("reports API unavailable");
  });

  it("fetches once per scrape", async () => {
    const fetcher = makeFetcher({
      reportDate: "2026-10-18",
      totalQuotaMB: 10,
      usedQuotaMB: 5,
      percentageUsed: 50,
    });
    const app = makeApp(fetcher);

    await app.request("/metrics");
    await app.request("/metrics");

    expect(fetcher.fetchQuota).toHaveBeenCalledTimes(2);
  });

  it("is gated by its own token", async () => {
    const fetcher = makeFetcher(new Error("unused"));
    const app = makeApp(fetcher, "test-metrics");

    const res = await app.request("/metrics?token=nope");

    expect(res.status).toBe(401);
    expect(fetcher.fetchQuota).not.toHaveBeenCalled();
  });
});
