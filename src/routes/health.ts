import { Hono } from "hono";
import { VERSION, type Config } from "../config.js";

type Access = "open" | "token";

export interface HealthReport {
  status: "ok";
  version: string;
  uptimeSeconds: number;
  endpoints: { stats: Access; metrics: Access };
}

function access(secret: string): Access {
  return secret === "" ? "open" : "token";
}

/**
 * Ungated liveness check for container orchestrators. Answers from local
 * state only, so it stays green while the reports API is down.
 */
export function healthRoute(
  config: Pick<Config, "statsToken" | "metricsToken">,
  startedAt: number = Date.now(),
): Hono {
  const app = new Hono();
  const endpoints = { stats: access(config.statsToken), metrics: access(config.metricsToken) };

  app.get("/health", (c) => {
    const report: HealthReport = {
      status: "ok",
      version: VERSION,
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      endpoints,
    };
    return c.json(report);
  });

  return app;
}
