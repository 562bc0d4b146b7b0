import { FetchError } from "../errors";
import type {
  AccessToken,
  IngestionConfig,
  IngestionWindow,
  SearchLogPage
} from "../types";
import { isRecordLike, parseSearchLogPage } from "./responseParser";
import {
  computeExponentialBackoffMs,
  isRetriableStatus,
  parseNumericHeaderValue,
  parseRateLimitResetMs,
  parseRetryAfterMs
} from "./retryPolicy";

export const SEARCH_LOGS_PATH = "api/archive/get-archive-search-logs";

export interface SearchLogClient {
  fetchPage: (
    window: IngestionWindow,
    token: AccessToken,
    pageToken: string | null
  ) => Promise<SearchLogPage>;
}

type FetchLike = typeof fetch;
type SleepLike = (ms: number) => Promise<void>;

export interface SearchLogClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepLike;
  now?: () => number;
  random?: () => number;
}

export type SearchLogClientConfig = Pick<
  IngestionConfig,
  | "apiBaseUrl"
  | "apiPageSize"
  | "apiTimeoutMs"
  | "apiMaxRetries"
  | "apiRetryBaseMs"
  | "apiRetryMaxMs"
>;

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Search log request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

function normalizeBaseUrl(apiBaseUrl: string): string {
  return apiBaseUrl.endsWith("/") ? apiBaseUrl : `${apiBaseUrl}/`;
}

export function buildSearchLogsUrl(apiBaseUrl: string): URL {
  return new URL(SEARCH_LOGS_PATH, normalizeBaseUrl(apiBaseUrl));
}

export function buildSearchLogsRequestBody(
  window: IngestionWindow,
  pageSize: number,
  pageToken: string | null
): Record<string, unknown> {
  const pagination: Record<string, unknown> = { pageSize };

  if (pageToken) {
    pagination.pageToken = pageToken;
  }

  return {
    meta: { pagination },
    data: [
      {
        from: window.start.toISOString(),
        to: window.end.toISOString()
      }
    ]
  };
}

function createErrorMessage(status: number, body: string): string {
  if (!body) {
    return `Search log request failed with status ${status}`;
  }

  return `Search log request failed with status ${status}: ${body}`;
}

function parseRetryAfterMsFromBody(body: string): number | null {
  if (!body) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }

  if (!isRecordLike(parsed) || !isRecordLike(parsed.rateLimit)) {
    return null;
  }

  const retryAfter = parseNumericHeaderValue(String(parsed.rateLimit.retryAfter ?? ""));
  if (retryAfter === null) {
    return null;
  }

  return Math.max(0, Math.floor(retryAfter * 1000));
}

function shouldRetryTransportError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}

async function sleepFor(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

async function fetchWithTimeout(
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, timeoutMs);

  try {
    return await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(timeoutMs);
    }

    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetches one page of archive search logs. Timeouts, transport errors, 429
 * and 5xx are retried on the same page up to `apiMaxRetries` times; any other
 * failure surfaces immediately as a {@link FetchError}.
 */
export function createSearchLogClient(
  config: SearchLogClientConfig,
  dependencies: SearchLogClientDependencies = {}
): SearchLogClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? sleepFor;
  const now = dependencies.now ?? Date.now;
  const random = dependencies.random ?? Math.random;
  const maxAttempts = Math.max(1, config.apiMaxRetries + 1);
  const url = buildSearchLogsUrl(config.apiBaseUrl);
  let nextRequestAllowedAtMs = 0;

  const waitForRateLimitWindow = async (): Promise<void> => {
    const waitMs = Math.max(0, nextRequestAllowedAtMs - now());
    if (waitMs > 0) {
      await sleep(waitMs);
    }
  };

  const applyRateLimitPacing = (headers: Headers): void => {
    const remaining = parseNumericHeaderValue(headers.get("X-RateLimit-Remaining"));
    const resetMs = parseRateLimitResetMs(headers.get("X-RateLimit-Reset"), now());

    if (remaining === null || resetMs === null) {
      return;
    }

    if (remaining <= 0) {
      nextRequestAllowedAtMs = Math.max(nextRequestAllowedAtMs, now() + resetMs);
    }
  };

  return {
    async fetchPage(
      window: IngestionWindow,
      token: AccessToken,
      pageToken: string | null
    ): Promise<SearchLogPage> {
      const requestInit: RequestInit = {
        method: "POST",
        headers: {
          Accept: "application/json",
          "Content-Type": "application/json",
          Authorization: `Bearer ${token.value}`
        },
        body: JSON.stringify(
          buildSearchLogsRequestBody(window, config.apiPageSize, pageToken)
        )
      };

      let attempt = 1;

      while (true) {
        await waitForRateLimitWindow();

        let response: Response;

        try {
          response = await fetchWithTimeout(
            fetchImpl,
            url,
            requestInit,
            config.apiTimeoutMs
          );
        } catch (error) {
          if (!shouldRetryTransportError(error)) {
            throw new FetchError("Search log request failed", { cause: error });
          }

          if (attempt >= maxAttempts) {
            throw new FetchError(
              `Search log request failed after ${attempt} attempts`,
              { cause: error }
            );
          }

          const retryDelayMs = computeExponentialBackoffMs(
            attempt,
            config.apiRetryBaseMs,
            config.apiRetryMaxMs,
            random
          );
          attempt += 1;
          await sleep(retryDelayMs);
          continue;
        }

        if (response.ok) {
          applyRateLimitPacing(response.headers);

          let payload: unknown;
          try {
            payload = await response.json();
          } catch (error) {
            throw new FetchError("Invalid search log response: body is not JSON", {
              cause: error
            });
          }

          return parseSearchLogPage(payload);
        }

        const body = await response.text();

        if (!isRetriableStatus(response.status)) {
          throw new FetchError(createErrorMessage(response.status, body), {
            status: response.status
          });
        }

        if (attempt >= maxAttempts) {
          throw new FetchError(
            `${createErrorMessage(response.status, body)} (after ${attempt} attempts)`,
            { status: response.status }
          );
        }

        const isRateLimited = response.status === 429;
        const retryAfterMs = isRateLimited
          ? parseRetryAfterMs(response.headers.get("Retry-After"), now()) ??
            parseRetryAfterMsFromBody(body) ??
            parseRateLimitResetMs(response.headers.get("X-RateLimit-Reset"), now())
          : null;
        const backoffDelayMs = computeExponentialBackoffMs(
          attempt,
          config.apiRetryBaseMs,
          config.apiRetryMaxMs,
          random
        );
        const retryDelayMs = Math.max(retryAfterMs ?? 0, backoffDelayMs);

        if (isRateLimited) {
          applyRateLimitPacing(response.headers);
        }

        attempt += 1;
        await sleep(retryDelayMs);
      }
    }
  };
}
