import { Hono } from "hono";
import { errorMessage } from "../errors.js";
import { tokenGate } from "../middleware/token-gate.js";
import { BYTES_PER_MB } from "../metrics/collector.js";
import type { QuotaFetcher, QuotaSnapshot } from "../services/quota.js";
import { renderStatsPage, type StatsView } from "../templates/stats-page.js";

// MB -> TB uses the same binary factor as MB -> bytes
const MB_PER_TB = BYTES_PER_MB;

export interface StatsRouteOptions {
  token: string;
  render?: (view: StatsView) => string | Promise<string>;
}

export function toStatsView(snapshot: QuotaSnapshot): StatsView {
  return {
    date: snapshot.reportDate,
    totalQuota: (snapshot.totalQuotaMB / MB_PER_TB).toFixed(3),
    usedQuota: (snapshot.usedQuotaMB / MB_PER_TB).toFixed(3),
    percentageUsed: snapshot.percentageUsed,
  };
}

export function statsRoute(fetcher: QuotaFetcher, options: StatsRouteOptions): Hono {
  const app = new Hono();
  const render = options.render ?? renderStatsPage;

  app.get("/", tokenGate(options.token), async (c) => {
    let snapshot: QuotaSnapshot;
    try {
      snapshot = await fetcher.fetchQuota({ signal: c.req.raw.signal });
    } catch (err) {
      console.error(`[stats] quota fetch failed: ${errorMessage(err)}`);
      return c.text("Failed to fetch quota stats", 500);
    }

    try {
      const page = await render(toStatsView(snapshot));
      return c.html(page);
    } catch (err) {
      console.error(`[stats] render failed: ${errorMessage(err)}`);
      return c.text("Failed to render stats page", 500);
    }
  });

  return app;
}
