import { readFileSync } from "fs";
import { AuthError, OperationCancelledError } from "../../core/errors";
import type { HttpMethod } from "../../core/http/http.types";
import type { CredentialProvider } from "../../ports/CredentialProvider";
import type { ResilientTransport } from "../http/ResilientTransport";

export type LwaCredentials = {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
};

export const DEFAULT_LWA_TOKEN_URL = "https://api.amazon.com/auth/o2/token";
const RESTRICTED_DATA_TOKEN_PATH = "/tokens/2021-03-01/restrictedDataToken";
const DEFAULT_TOKEN_TTL_SECONDS = 3600;
const EXPIRY_MARGIN_MS = 60_000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const nonEmpty = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;

/**
 * Reads LWA credentials from `SP_API_CLIENT_ID` / `SP_API_CLIENT_SECRET` / `SP_API_REFRESH_TOKEN`,
 * falling back to the JSON file named by `SP_API_CREDENTIALS_FILE`.
 */
export const loadLwaCredentials = (
  env: NodeJS.ProcessEnv = process.env,
  readFile: (path: string) => string = (path) => readFileSync(path, "utf8")
): LwaCredentials => {
  const clientId = nonEmpty(env.SP_API_CLIENT_ID);
  const clientSecret = nonEmpty(env.SP_API_CLIENT_SECRET);
  const refreshToken = nonEmpty(env.SP_API_REFRESH_TOKEN);
  if (clientId && clientSecret && refreshToken) {
    return { clientId, clientSecret, refreshToken };
  }

  const file = nonEmpty(env.SP_API_CREDENTIALS_FILE);
  if (!file) {
    throw new AuthError({
      message: "Missing credentials: set SP_API_CLIENT_ID, SP_API_CLIENT_SECRET and SP_API_REFRESH_TOKEN, or SP_API_CREDENTIALS_FILE"
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFile(file));
  } catch (err) {
    throw new AuthError({ message: `Unable to read credentials file ${file}`, cause: err });
  }

  const record: Record<string, unknown> = isRecord(parsed) ? parsed : {};
  const fromFile: Partial<LwaCredentials> = {
    clientId: nonEmpty(record.client_id),
    clientSecret: nonEmpty(record.client_secret),
    refreshToken: nonEmpty(record.refresh_token)
  };
  if (!fromFile.clientId || !fromFile.clientSecret || !fromFile.refreshToken) {
    throw new AuthError({
      message: `Credentials file ${file} must contain client_id, client_secret and refresh_token`
    });
  }

  return { clientId: fromFile.clientId, clientSecret: fromFile.clientSecret, refreshToken: fromFile.refreshToken };
};

type CachedToken = {
  token: Promise<string>;
  expiresAt: number;
};

const toAuthError = (message: string, err: unknown): AuthError | OperationCancelledError => {
  if (err instanceof OperationCancelledError || err instanceof AuthError) return err;
  const status = isRecord(err) && typeof err.status === "number" ? err.status : undefined;
  const detail = err instanceof Error ? err.message : String(err);
  return new AuthError({ message: `${message}: ${detail}`, status, cause: err });
};

/**
 * Exchanges the refresh token for an access token once and shares it until shortly before it expires.
 */
export class LwaCredentialProvider implements CredentialProvider {
  private cached?: CachedToken;

  constructor(
    private readonly transport: ResilientTransport,
    private readonly credentials: LwaCredentials,
    private readonly apiBaseUrl: string,
    private readonly tokenUrl: string = DEFAULT_LWA_TOKEN_URL,
    private readonly now: () => number = Date.now
  ) {}

  getBearerToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt > this.now()) {
      return this.cached.token;
    }

    const pending = this.exchangeRefreshToken();
    const entry: CachedToken = {
      token: pending.then(({ accessToken }) => accessToken),
      expiresAt: Number.POSITIVE_INFINITY
    };
    void pending.then(
      ({ expiresInSeconds }) => {
        entry.expiresAt = this.now() + expiresInSeconds * 1000 - EXPIRY_MARGIN_MS;
      },
      () => {
        // A failed exchange is not cached; the next caller tries again.
        if (this.cached === entry) this.cached = undefined;
      }
    );
    this.cached = entry;
    return entry.token;
  }

  async getScopedToken(resourcePath: string, method: HttpMethod, dataElements: readonly string[]): Promise<string> {
    const accessToken = await this.getBearerToken();

    let json: unknown;
    try {
      const res = await this.transport.execute("POST", `${this.apiBaseUrl}${RESTRICTED_DATA_TOKEN_PATH}`, {
        headers: {
          "x-amz-access-token": accessToken,
          "content-type": "application/json"
        },
        body: JSON.stringify({
          restrictedResources: [{ method, path: resourcePath, dataElements: [...dataElements] }]
        })
      });
      json = await res.json();
    } catch (err) {
      throw toAuthError(`Restricted data token request failed for ${method} ${resourcePath}`, err);
    }

    const token = isRecord(json) ? nonEmpty(json.restrictedDataToken) : undefined;
    if (!token) {
      throw new AuthError({ message: "Restricted data token response has no restrictedDataToken" });
    }

    console.log(JSON.stringify({ event: "auth.scoped_token", method, path: resourcePath, dataElements }));
    return token;
  }

  private async exchangeRefreshToken(): Promise<{ accessToken: string; expiresInSeconds: number }> {
    const form = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: this.credentials.refreshToken,
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret
    });

    let json: unknown;
    try {
      const res = await this.transport.execute("POST", this.tokenUrl, {
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: form.toString()
      });
      json = await res.json();
    } catch (err) {
      throw toAuthError("Access token exchange failed", err);
    }

    const accessToken = isRecord(json) ? nonEmpty(json.access_token) : undefined;
    if (!accessToken || !isRecord(json)) {
      throw new AuthError({ message: "Access token response has no access_token" });
    }

    const expiresIn = json.expires_in;
    const expiresInSeconds =
      typeof expiresIn === "number" && Number.isFinite(expiresIn) && expiresIn > 0 ? expiresIn : DEFAULT_TOKEN_TTL_SECONDS;

    console.log(JSON.stringify({ event: "auth.token_refreshed", expiresInSeconds }));
    return { accessToken, expiresInSeconds };
  }
}
