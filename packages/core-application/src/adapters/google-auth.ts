import path from "node:path";
import fs from "node:fs/promises";
import { authenticate } from "@google-cloud/local-auth";
import { google } from "googleapis";
import type { Credentials, OAuth2Client } from "google-auth-library";

import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { ConfigError, RemoteAuthError, errorMessage } from "../application/errors";

type GoogleTokens = {
  access_token?: string;
  refresh_token?: string;
  scope?: string;
  token_type?: string;
  expiry_date?: number;
};

const SCOPES = [
  "https://www.googleapis.com/auth/drive.file",
];

export const TOKENS_FILE_NAME = "google.tokens.json";

async function fileExists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function getString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

function getNumber(v: unknown): number | undefined {
  return typeof v === "number" ? v : undefined;
}

function getStringArray(v: unknown): string[] | undefined {
  return Array.isArray(v) && v.every((x) => typeof x === "string") ? v : undefined;
}

// null -> undefined (input may be anything)
export function normalizeTokens(t: unknown): GoogleTokens {
  if (!isRecord(t)) return {};

  return {
    access_token: getString(t["access_token"]),
    refresh_token: getString(t["refresh_token"]),
    scope: getString(t["scope"]),
    token_type: getString(t["token_type"]),
    expiry_date: getNumber(t["expiry_date"]),
  };
}

export type OAuthClientSecrets = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

/** Reads the "installed" (or "web") block of a Google OAuth client JSON. */
export function parseClientSecrets(raw: string): OAuthClientSecrets {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid credentials file: ${errorMessage(err)}`, err);
  }

  const creds = isRecord(parsed) ? parsed : {};
  const installed = creds["installed"];
  const web = creds["web"];
  const block = isRecord(installed) ? installed : isRecord(web) ? web : {};

  const clientId = getString(block["client_id"]);
  const clientSecret = getString(block["client_secret"]);
  const redirectUris = getStringArray(block["redirect_uris"]);

  if (!clientId || !clientSecret) {
    throw new ConfigError(
      `Invalid credentials. Expected JSON with "installed.client_id" and "installed.client_secret".`
    );
  }

  return { clientId, clientSecret, redirectUri: redirectUris?.[0] ?? "http://localhost" };
}

export class GoogleAuth {
  private tokenPath: string;
  private credentialsPath: string;

  constructor(
    opts: { tokenDirAbs: string; credentialsPathAbs: string },
    private readonly logger: Logger = silentLogger
  ) {
    this.tokenPath = path.join(opts.tokenDirAbs, TOKENS_FILE_NAME);
    this.credentialsPath = opts.credentialsPathAbs;
  }

  async getAuthorizedClient(): Promise<OAuth2Client> {
    let credsRaw: string;
    try {
      credsRaw = await fs.readFile(this.credentialsPath, "utf-8");
    } catch (err) {
      throw new ConfigError(`Cannot read credentials file ${this.credentialsPath}: ${errorMessage(err)}`, err);
    }
    const secrets = parseClientSecrets(credsRaw);

    const oAuth2Client: OAuth2Client = new google.auth.OAuth2(
      secrets.clientId,
      secrets.clientSecret,
      secrets.redirectUri
    );

    // 1) saved token
    if (await fileExists(this.tokenPath)) {
      const tokenRaw = await fs.readFile(this.tokenPath, "utf-8");
      oAuth2Client.setCredentials(normalizeTokens(JSON.parse(tokenRaw)));

      try {
        // make sure there is an access token (uses the refresh token when needed)
        await oAuth2Client.getAccessToken();
      } catch (err) {
        throw new RemoteAuthError(
          `Saved Google token is invalid or expired; delete ${this.tokenPath} and run again to sign in`,
          err
        );
      }

      this.attachTokenSaver(oAuth2Client);
      return oAuth2Client;
    }

    // 2) interactive consent in the browser
    type AuthenticateOptions = Parameters<typeof authenticate>[0];

    const authedClient = await authenticate(
      {
        keyfilePath: this.credentialsPath,
        scopes: SCOPES,

        // forces a refresh_token and the consent screen (accepted at runtime, unknown to the types)
        accessType: "offline",
        prompt: "consent",
      } as unknown as AuthenticateOptions
    );

    const authed = authedClient as unknown as OAuth2Client;
    await authed.getAccessToken();

    await this.saveTokens(normalizeTokens(authed.credentials));
    this.attachTokenSaver(authed);

    return authed;
  }

  async logout() {
    await fs.rm(this.tokenPath, { force: true });
  }

  private attachTokenSaver(client: OAuth2Client) {
    client.on("tokens", (t: Credentials) => {
      this.mergeTokens(t).catch((err: unknown) =>
        this.logger.warn(`Could not save refreshed Google tokens: ${errorMessage(err)}`)
      );
    });
  }

  private async mergeTokens(t: Credentials) {
    const current = (await this.safeReadTokens()) ?? {};
    await this.saveTokens(normalizeTokens({ ...current, ...t }));
  }

  private async safeReadTokens(): Promise<GoogleTokens | null> {
    try {
      const raw = await fs.readFile(this.tokenPath, "utf-8");
      return normalizeTokens(JSON.parse(raw));
    } catch {
      return null;
    }
  }

  private async saveTokens(tokens: GoogleTokens) {
    await fs.mkdir(path.dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(tokens, null, 2), "utf-8");
  }
}
