import type { CredentialProvider } from "../api/credentials";
import type { SearchLogClient } from "../api/searchLogClient";
import { FetchError } from "../errors";
import type { IngestionWindow, SearchLogPage, SearchLogRecord } from "../types";

export interface Fetcher {
  fetchWindow: (
    window: IngestionWindow,
    credentials: CredentialProvider
  ) => AsyncIterable<SearchLogRecord>;
}

export interface FetcherHooks {
  onPage?: (page: SearchLogPage, pageNumber: number) => void;
}

export function isWithinWindow(
  record: SearchLogRecord,
  window: IngestionWindow
): boolean {
  const timestampMs = Date.parse(record.createTime);
  return timestampMs >= window.start.getTime() && timestampMs < window.end.getTime();
}

function isUnauthorized(error: unknown): boolean {
  return error instanceof FetchError && error.status === 401;
}

/**
 * Fetches one page with a token taken from the provider, so a long window
 * picks up refreshed tokens between pages. A 401 drops the cached token and
 * the page is retried once with a new one.
 */
async function fetchPageWithToken(
  client: SearchLogClient,
  credentials: CredentialProvider,
  window: IngestionWindow,
  pageToken: string | null
): Promise<SearchLogPage> {
  const token = await credentials.acquireToken();

  try {
    return await client.fetchPage(window, token, pageToken);
  } catch (error) {
    if (!isUnauthorized(error)) {
      throw error;
    }

    credentials.invalidate();
    return client.fetchPage(window, await credentials.acquireToken(), pageToken);
  }
}

export async function* paginateWindow(
  client: SearchLogClient,
  window: IngestionWindow,
  credentials: CredentialProvider,
  hooks: FetcherHooks = {}
): AsyncGenerator<SearchLogRecord> {
  const seenPageTokens = new Set<string>();
  let pageToken: string | null = null;
  let pageNumber = 0;

  while (true) {
    const page = await fetchPageWithToken(client, credentials, window, pageToken);
    pageNumber += 1;

    hooks.onPage?.(page, pageNumber);

    for (const record of page.records) {
      if (isWithinWindow(record, window)) {
        yield record;
      }
    }

    if (!page.nextPageToken) {
      return;
    }

    if (seenPageTokens.has(page.nextPageToken)) {
      throw new FetchError(
        `Invalid pagination state: page token repeated after page ${pageNumber}`
      );
    }

    seenPageTokens.add(page.nextPageToken);
    pageToken = page.nextPageToken;
  }
}

export function createFetcher(
  client: SearchLogClient,
  hooks: FetcherHooks = {}
): Fetcher {
  return {
    fetchWindow(window: IngestionWindow, credentials: CredentialProvider) {
      return paginateWindow(client, window, credentials, hooks);
    }
  };
}
