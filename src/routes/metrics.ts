import { Hono } from "hono";
import { tokenGate } from "../middleware/token-gate.js";
import type { MetricsExporter } from "../metrics/exporter.js";

export function metricsRoute(exporter: MetricsExporter, options: { token: string }): Hono {
  const app = new Hono();

  app.get("/metrics", tokenGate(options.token), async (c) => {
    const body = await exporter.scrape(c.req.raw.signal);
    c.header("Content-Type", exporter.contentType);
    return c.body(body);
  });

  return app;
}
