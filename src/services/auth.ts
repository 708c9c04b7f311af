import { OAuth2Client, type Credentials } from "google-auth-library";
import { readFile, writeFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import { errorMessage } from "../errors.js";

export const REPORTS_SCOPE = "https://www.googleapis.com/auth/admin.reports.usage.readonly";

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
}

export interface AuthOptions {
  credentialsFile: string;
  tokenFile: string;
  /** Reads the authorization code pasted by the operator. Defaults to stdin. */
  promptForCode?: (authUrl: string) => Promise<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseClientSecrets(raw: string, source: string): ClientSecrets {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Unable to parse client secret file ${source}: invalid JSON`);
  }

  const section: unknown = isRecord(parsed) ? (parsed.installed ?? parsed.web) : undefined;
  if (!isRecord(section)) {
    throw new Error(
      `Unable to parse client secret file ${source}: expected an "installed" or "web" section`,
    );
  }

  const { client_id, client_secret, redirect_uris } = section;
  if (typeof client_id !== "string" || typeof client_secret !== "string") {
    throw new Error(
      `Unable to parse client secret file ${source}: missing client_id or client_secret`,
    );
  }

  const redirectUri =
    Array.isArray(redirect_uris) && typeof redirect_uris[0] === "string"
      ? redirect_uris[0]
      : undefined;

  return { clientId: client_id, clientSecret: client_secret, redirectUri };
}

export async function loadClientSecrets(path: string): Promise<ClientSecrets> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new Error(`Unable to read client secret file ${path}: ${errorMessage(err)}`);
  }
  return parseClientSecrets(raw, path);
}

/**
 * Accepts the google-auth-library layout (`expiry_date` in ms) as well as
 * token files carrying an RFC 3339 `expiry` string.
 */
export function parseToken(raw: string): Credentials {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("token file does not contain an object");
  }
  const fields: Record<string, unknown> = parsed;

  const str = (key: string): string | undefined => {
    const value = fields[key];
    return typeof value === "string" ? value : undefined;
  };

  let expiryDate = typeof fields.expiry_date === "number" ? fields.expiry_date : undefined;
  const expiry = str("expiry");
  if (expiryDate === undefined && expiry) {
    const ms = Date.parse(expiry);
    if (!Number.isNaN(ms)) expiryDate = ms;
  }

  const credentials: Credentials = {
    access_token: str("access_token"),
    refresh_token: str("refresh_token"),
    token_type: str("token_type"),
    scope: str("scope"),
    expiry_date: expiryDate,
  };

  if (!credentials.access_token && !credentials.refresh_token) {
    throw new Error("token file has neither access_token nor refresh_token");
  }
  return credentials;
}

export async function loadToken(path: string): Promise<Credentials> {
  return parseToken(await readFile(path, "utf-8"));
}

export async function saveToken(path: string, tokens: Credentials): Promise<void> {
  console.log(`[auth] Saving credential file to: ${path}`);
  await writeFile(path, JSON.stringify(tokens, null, 2), { mode: 0o600 });
}

async function promptOnStdin(authUrl: string): Promise<string> {
  console.log(`Go to the following link in your browser:\n${authUrl}\n`);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question("Enter the authorization code: ")).trim();
  } finally {
    rl.close();
  }
}

async function getTokenFromWeb(
  oauth2Client: OAuth2Client,
  promptForCode: (authUrl: string) => Promise<string>,
): Promise<Credentials> {
  const authUrl = oauth2Client.generateAuthUrl({
    access_type: "offline",
    scope: [REPORTS_SCOPE],
  });

  const code = await promptForCode(authUrl);
  if (!code) {
    throw new Error("Unable to read authorization code");
  }

  try {
    const { tokens } = await oauth2Client.getToken(code);
    return tokens;
  } catch (err) {
    throw new Error(`Unable to retrieve token from web: ${errorMessage(err)}`);
  }
}

/**
 * Builds an authorized OAuth2 client from the client-secret file and the
 * stored token. Runs the interactive consent flow when no usable token
 * file exists and persists its result.
 */
export async function resolveAuth(options: AuthOptions): Promise<OAuth2Client> {
  const secrets = await loadClientSecrets(options.credentialsFile);
  const oauth2Client = new OAuth2Client(
    secrets.clientId,
    secrets.clientSecret,
    secrets.redirectUri,
  );

  let tokens: Credentials;
  try {
    tokens = await loadToken(options.tokenFile);
  } catch (err) {
    console.log(`[auth] No usable token at ${options.tokenFile} (${errorMessage(err)})`);
    tokens = await getTokenFromWeb(oauth2Client, options.promptForCode ?? promptOnStdin);
    await saveToken(options.tokenFile, tokens);
  }

  oauth2Client.setCredentials(tokens);

  // Triggers a refresh when the stored access token has expired
  try {
    await oauth2Client.getAccessToken();
  } catch (err) {
    throw new Error(
      `Failed to obtain access token: ${errorMessage(err)}. ` +
        `Delete ${options.tokenFile} and authorize again.`,
    );
  }

  console.log("[auth] Using stored OAuth token");
  return oauth2Client;
}
