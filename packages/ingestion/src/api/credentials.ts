import { AuthError } from "../errors";
import type { AccessToken, IngestionConfig } from "../types";
import { isRecordLike } from "./responseParser";

export interface CredentialProvider {
  acquireToken: () => Promise<AccessToken>;
  invalidate: () => void;
}

type FetchLike = typeof fetch;

export interface CredentialProviderDependencies {
  fetchImpl?: FetchLike;
  now?: () => number;
}

export type CredentialConfig = Pick<
  IngestionConfig,
  "tokenUrl" | "clientId" | "clientSecret" | "apiTimeoutMs" | "tokenRefreshSkewMs"
>;

const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export function parseTokenResponse(payload: unknown, nowMs: number): AccessToken {
  if (!isRecordLike(payload)) {
    throw new AuthError("Invalid token response: expected object");
  }

  const accessToken = payload.access_token;
  if (typeof accessToken !== "string" || accessToken.length === 0) {
    throw new AuthError("Token response missing access_token");
  }

  const expiresIn =
    typeof payload.expires_in === "number" && payload.expires_in > 0
      ? payload.expires_in
      : typeof payload.expires_in === "string" && Number(payload.expires_in) > 0
        ? Number(payload.expires_in)
        : DEFAULT_EXPIRES_IN_SECONDS;

  return {
    value: accessToken,
    expiresAtMs: nowMs + expiresIn * 1000
  };
}

async function requestToken(
  config: CredentialConfig,
  fetchImpl: FetchLike,
  nowMs: number
): Promise<AccessToken> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, config.apiTimeoutMs);

  let response: Response;

  try {
    response = await fetchImpl(config.tokenUrl, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/x-www-form-urlencoded"
      },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        client_id: config.clientId,
        client_secret: config.clientSecret
      }).toString(),
      signal: controller.signal
    });
  } catch (error) {
    const reason = controller.signal.aborted
      ? `timed out after ${config.apiTimeoutMs}ms`
      : "transport failure";
    throw new AuthError(`Token request failed: ${reason}`, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    const body = await response.text();
    throw new AuthError(
      `Token request failed with status ${response.status}${body ? `: ${body}` : ""}`,
      { status: response.status }
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new AuthError("Invalid token response: body is not JSON", { cause: error });
  }

  return parseTokenResponse(payload, nowMs);
}

export function createCredentialProvider(
  config: CredentialConfig,
  dependencies: CredentialProviderDependencies = {}
): CredentialProvider {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const now = dependencies.now ?? Date.now;
  let cachedToken: AccessToken | null = null;
  let pendingToken: Promise<AccessToken> | null = null;

  const isFresh = (token: AccessToken): boolean =>
    now() < token.expiresAtMs - Math.max(0, config.tokenRefreshSkewMs);

  return {
    async acquireToken(): Promise<AccessToken> {
      if (cachedToken && isFresh(cachedToken)) {
        return cachedToken;
      }

      if (!pendingToken) {
        pendingToken = requestToken(config, fetchImpl, now()).then((token) => {
          cachedToken = token;
          return token;
        });
      }

      try {
        return await pendingToken;
      } finally {
        pendingToken = null;
      }
    },
    invalidate(): void {
      cachedToken = null;
    }
  };
}
