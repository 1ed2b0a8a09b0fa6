import { randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import { google } from "googleapis";

import { SerialQueue } from "./concurrency.js";
import type { TokenProvider } from "./drive.js";
import { AuthError, errorMessage } from "./errors.js";
import { listenForRedirect } from "./oauth-callback.js";

// Full Drive access: the tool copies files it did not create.
export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive"];

export type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;
export type Credentials = OAuth2Client["credentials"];

export interface OAuthClient {
  client_id: string;
  client_secret?: string;
}

export interface StoredToken {
  refresh_token: string;
  access_token?: string;
  expiry_date?: number; // Unix ms
  scope?: string;
}

export interface GoogleAuthOptions {
  credentialsPath: string;
  tokenPath: string;
  scopes?: string[];
  createClient?: (client: OAuthClient, redirectUri?: string) => OAuth2Client;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function createOAuth2Client(client: OAuthClient, redirectUri?: string): OAuth2Client {
  return new google.auth.OAuth2(client.client_id, client.client_secret, redirectUri);
}

// The token endpoint answers a revoked or expired refresh token with `invalid_grant`.
function isInvalidGrant(error: unknown): boolean {
  if (errorMessage(error).includes("invalid_grant")) return true;
  const response = isObject(error) ? error.response : undefined;
  return isObject(response) && isObject(response.data) && response.data.error === "invalid_grant";
}

function refreshFailure(error: unknown): AuthError {
  const message = errorMessage(error);
  if (isInvalidGrant(error)) {
    return new AuthError("Token refresh failed: the saved token was revoked or expired. Run `drive-duplicate auth`.");
  }
  return new AuthError(`Token refresh failed: ${message}`);
}

/** Read the OAuth client from a Google Cloud `credentials.json` (desktop or web client). */
export async function readOAuthClient(credentialsPath: string): Promise<OAuthClient> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(credentialsPath, "utf8")) as unknown;
  } catch {
    throw new AuthError(
      `credentials.json not found or unreadable at ${credentialsPath}. ` +
        "Download OAuth 2.0 Desktop credentials from Google Cloud Console and save them there.",
    );
  }

  const block = isObject(raw) ? (raw.installed ?? raw.web ?? raw) : null;
  if (!isObject(block) || typeof block.client_id !== "string" || block.client_id.length === 0) {
    throw new AuthError(`${credentialsPath} does not contain an OAuth client_id`);
  }
  return {
    client_id: block.client_id,
    client_secret: typeof block.client_secret === "string" ? block.client_secret : undefined,
  };
}

export async function readStoredToken(tokenPath: string): Promise<StoredToken | null> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(tokenPath, "utf8")) as unknown;
  } catch {
    return null;
  }
  if (!isObject(raw) || typeof raw.refresh_token !== "string" || raw.refresh_token.length === 0) {
    return null;
  }
  return {
    refresh_token: raw.refresh_token,
    access_token: typeof raw.access_token === "string" ? raw.access_token : undefined,
    expiry_date: typeof raw.expiry_date === "number" ? raw.expiry_date : undefined,
    scope: typeof raw.scope === "string" ? raw.scope : undefined,
  };
}

export function consentUrl(client: OAuth2Client, scopes: string[], state: string): string {
  return client.generateAuthUrl({
    access_type: "offline", // refresh token
    prompt: "consent",
    scope: scopes,
    state,
  });
}

/**
 * OAuth for an installed app on top of the googleapis OAuth2 client. The
 * refresh token lives in a local token file; every token the client mints
 * is written back to it.
 */
export class GoogleAuth implements TokenProvider {
  private readonly credentialsPath: string;
  private readonly tokenPath: string;
  private readonly scopes: string[];
  private readonly createClient: (client: OAuthClient, redirectUri?: string) => OAuth2Client;
  private readonly writes = new SerialQueue();

  private signedIn: Promise<OAuth2Client> | null = null;
  private stored: StoredToken | null = null;
  private saving: Promise<void> = Promise.resolve();

  constructor(options: GoogleAuthOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokenPath = options.tokenPath;
    this.scopes = options.scopes ?? DRIVE_SCOPES;
    this.createClient = options.createClient ?? createOAuth2Client;
  }

  /** Returns a valid access token; the client refreshes it shortly before expiry. */
  async getAccessToken(): Promise<string> {
    return await this.accessToken(await this.client());
  }

  async refreshAfterUnauthorized(): Promise<string> {
    const client = await this.client();
    client.setCredentials({ ...client.credentials, access_token: null, expiry_date: null });
    return await this.accessToken(client);
  }

  /**
   * Desktop loopback flow: `onAuthUrl` receives the consent URL to open, the
   * redirect lands on a local listener.
   */
  async authenticate(onAuthUrl: (url: string) => void): Promise<StoredToken> {
    const state = randomUUID();
    const listener = await listenForRedirect();
    try {
      const client = await this.newClient(listener.redirectUri);
      onAuthUrl(consentUrl(client, this.scopes, state));

      const params = await listener.params;
      const error = params.get("error");
      if (error) throw new AuthError(`Sign-in was not completed: ${error}`);
      if (params.get("state") !== state) {
        throw new AuthError("OAuth state mismatch; the callback did not come from this sign-in");
      }
      const code = params.get("code");
      if (!code) throw new AuthError("Sign-in callback carried no authorization code");

      let tokens: Credentials;
      try {
        ({ tokens } = await client.getToken(code));
      } catch (exchangeError) {
        throw new AuthError(`Token exchange failed: ${errorMessage(exchangeError)}`);
      }
      if (!tokens.refresh_token) {
        throw new AuthError("Google did not return a refresh token. Revoke the app's access and retry.");
      }

      client.setCredentials(tokens);
      await this.saving;
      const stored = await this.saveTokens(tokens);
      this.signedIn = Promise.resolve(client);
      return stored ?? { refresh_token: tokens.refresh_token };
    } finally {
      listener.close();
    }
  }

  private client(): Promise<OAuth2Client> {
    this.signedIn ??= this.restore();
    return this.signedIn;
  }

  private async restore(): Promise<OAuth2Client> {
    const stored = await readStoredToken(this.tokenPath);
    if (!stored) {
      throw new AuthError(`No saved token at ${this.tokenPath}. Run \`drive-duplicate auth\` first.`);
    }
    this.stored = stored;
    const client = await this.newClient();
    client.setCredentials({
      refresh_token: stored.refresh_token,
      access_token: stored.access_token,
      expiry_date: stored.expiry_date,
    });
    return client;
  }

  private async newClient(redirectUri?: string): Promise<OAuth2Client> {
    const client = this.createClient(await readOAuthClient(this.credentialsPath), redirectUri);
    client.on("tokens", (tokens) => {
      this.saving = this.writes.run(async () => {
        await this.saveTokens(tokens);
      });
    });
    return client;
  }

  private async accessToken(client: OAuth2Client): Promise<string> {
    let token: string | null | undefined;
    try {
      ({ token } = await client.getAccessToken());
    } catch (error) {
      throw refreshFailure(error);
    }
    await this.saving;
    if (!token) throw new AuthError("Token refresh returned no access token");
    return token;
  }

  // Refreshed tokens usually come without a refresh token; keep the saved one.
  private async saveTokens(tokens: Credentials): Promise<StoredToken | null> {
    const refreshToken = tokens.refresh_token ?? this.stored?.refresh_token;
    if (!refreshToken) return null;

    const token: StoredToken = {
      refresh_token: refreshToken,
      access_token: tokens.access_token ?? undefined,
      expiry_date: tokens.expiry_date ?? undefined,
      scope: tokens.scope ?? this.stored?.scope,
    };
    this.stored = token;
    await fs.mkdir(path.dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(token, null, 2), { mode: 0o600 });
    return token;
  }
}
