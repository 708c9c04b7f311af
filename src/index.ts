import { Command, Option } from "commander";
import { serve } from "@hono/node-server";
import type { Server } from "node:net";
import { loadConfig, VERSION, type CliOptions } from "./config.js";
import { errorMessage } from "./errors.js";
import { resolveAuth } from "./services/auth.js";
import { createReportsClient } from "./services/reports-client.js";
import { createQuotaFetcher } from "./services/quota.js";
import { createServer } from "./server.js";

function fatal(message: string): never {
  console.error(`[quota-exporter] fatal: ${message}`);
  process.exit(1);
}

const program = new Command();

program
  .name("workspace-quota-exporter")
  .description("Serves Google Workspace storage quota as an HTML page and Prometheus metrics")
  .version(VERSION)
  .addOption(
    new Option("-c, --credentials <path>", "OAuth client secret file")
      .env("CREDENTIALS_FILE")
      .default("credentials.json"),
  )
  .addOption(
    new Option("-t, --token-file <path>", "Stored OAuth token file")
      .env("TOKEN_FILE")
      .default("token.json"),
  )
  .addOption(new Option("-p, --port <number>", "Port to listen on").env("PORT").default("8080"))
  .addOption(new Option("-H, --host <address>", "Host to bind to").env("HOST").default("0.0.0.0"))
  .addOption(
    new Option("--timeout <ms>", "Deadline for one quota fetch across all probed dates")
      .env("UPSTREAM_TIMEOUT_MS")
      .default("30000"),
  )
  .option("-v, --verbose", "Enable verbose logging (or VERBOSE=1|true|yes|on)")
  .action(async (opts: CliOptions) => {
    try {
      const config = loadConfig(opts);

      const oauth2Client = await resolveAuth({
        credentialsFile: config.credentialsFile,
        tokenFile: config.tokenFile,
      });
      const reports = createReportsClient(oauth2Client, { verbose: config.verbose });
      const fetcher = createQuotaFetcher(reports, {
        upstreamTimeoutMs: config.upstreamTimeoutMs,
        verbose: config.verbose,
      });
      const app = createServer({ fetcher, config });

      const server: Server = serve(
        { fetch: app.fetch, port: config.port, hostname: config.host },
        (info) => {
          console.log(`[quota-exporter] listening on http://${config.host}:${info.port}`);
          if (config.verbose) {
            console.log(
              `[config] stats=${config.statsToken ? "gated" : "open"} ` +
                `metrics=${config.metricsToken ? "gated" : "open"} ` +
                `timeout=${config.upstreamTimeoutMs}ms`,
            );
          }
        },
      );

      server.on("error", (err) => fatal(errorMessage(err)));

      const shutdown = () => {
        console.log("\n[quota-exporter] shutting down...");
        server.close(() => {
          console.log("[quota-exporter] stopped");
          process.exit(0);
        });
        // Force exit after 5s if connections don't close
        setTimeout(() => process.exit(1), 5000).unref();
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    } catch (err: unknown) {
      fatal(errorMessage(err));
    }
  });

program.parseAsync().catch((err: unknown) => fatal(errorMessage(err)));
