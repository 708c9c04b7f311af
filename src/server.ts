import { Hono } from "hono";
import type { Config } from "./config.js";
import type { QuotaFetcher } from "./services/quota.js";
import { createQuotaCollector } from "./metrics/collector.js";
import { createMetricsExporter } from "./metrics/exporter.js";
import { healthRoute } from "./routes/health.js";
import { metricsRoute } from "./routes/metrics.js";
import { statsRoute } from "./routes/stats.js";

export interface ServerOptions {
  fetcher: QuotaFetcher;
  config: Pick<Config, "statsToken" | "metricsToken">;
}

export function createServer(options: ServerOptions): Hono {
  const { fetcher, config } = options;
  const app = new Hono();
  const exporter = createMetricsExporter(createQuotaCollector(fetcher));

  app.route("/", healthRoute(config));
  app.route("/", statsRoute(fetcher, { token: config.statsToken }));
  app.route("/", metricsRoute(exporter, { token: config.metricsToken }));

  return app;
}
