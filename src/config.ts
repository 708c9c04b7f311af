import { ConfigError } from "./errors.js";

export const VERSION = "0.1.0";

export interface Config {
  credentialsFile: string;
  tokenFile: string;
  host: string;
  port: number;
  /** Shared secret for `/`. Empty means the page is open. */
  statsToken: string;
  /** Shared secret for `/metrics`. Empty means the endpoint is open. */
  metricsToken: string;
  upstreamTimeoutMs: number;
  verbose: boolean;
}

/** Values as they arrive from the command line (with env fallbacks applied). */
export interface CliOptions {
  credentials: string;
  tokenFile: string;
  port: string;
  host: string;
  timeout: string;
  verbose?: boolean;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["", "0", "false", "no", "off"]);

export function parseFlag(raw: string | undefined, label: string): boolean {
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  if (TRUTHY.has(value)) return true;
  if (FALSY.has(value)) return false;
  throw new ConfigError(`Invalid ${label}: "${raw}"`);
}

function parsePositiveInt(raw: string, label: string): number {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid ${label}: "${raw}"`);
  }
  return value;
}

export function loadConfig(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Readonly<Config> {
  const port = parsePositiveInt(opts.port, "port");
  if (port > 65535) {
    throw new ConfigError(`Invalid port: "${opts.port}"`);
  }

  return Object.freeze({
    credentialsFile: opts.credentials,
    tokenFile: opts.tokenFile,
    host: opts.host,
    port,
    statsToken: env.STATS_TOKEN ?? "",
    metricsToken: env.METRICS_TOKEN ?? "",
    upstreamTimeoutMs: parsePositiveInt(opts.timeout, "upstream timeout"),
    verbose: !!opts.verbose || parseFlag(env.VERBOSE, "VERBOSE"),
  });
}
