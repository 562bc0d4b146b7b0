export interface MockSearchLog {
  createTime: string;
  emailAddr: string;
  source: string;
  searchText: string;
  searchReason: string;
  description: string;
  isAdmin: boolean;
}

export interface MockSearchLogResponse {
  meta: {
    status: number;
    pagination: {
      pageSize: number;
      totalCount: number;
      next?: string;
    };
  };
  data: Array<{ logs: MockSearchLog[] }>;
  fail: unknown[];
}

const USERS = ["alice@example.com", "bob@example.com", "carol@example.com"];
const SOURCES = ["archive", "message-tracking"];

export function buildMockSearchLogs(
  total: number,
  startMs: number,
  spacingMs: number
): MockSearchLog[] {
  const logs: MockSearchLog[] = [];

  for (let index = 0; index < total; index += 1) {
    logs.push({
      createTime: new Date(startMs + index * spacingMs).toISOString(),
      emailAddr: USERS[index % USERS.length],
      source: SOURCES[index % SOURCES.length],
      searchText: `query ${index}`,
      searchReason: index % 3 === 0 ? "legal hold" : "",
      description: `Searched archive for query ${index}`,
      isAdmin: index % 5 === 0
    });
  }

  return logs;
}

function encodePageToken(value: number): string {
  return Buffer.from(String(value), "utf8").toString("base64");
}

function decodePageToken(pageToken: string): number {
  const decoded = Buffer.from(pageToken, "base64").toString("utf8");
  const parsed = Number.parseInt(decoded, 10);

  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid page token: ${pageToken}`);
  }

  return parsed;
}

export function paginateSearchLogs(
  logs: MockSearchLog[],
  range: { from: string; to: string },
  pageSize: number,
  pageToken: string | null
): MockSearchLogResponse {
  const fromMs = Date.parse(range.from);
  const toMs = Date.parse(range.to);

  if (Number.isNaN(fromMs) || Number.isNaN(toMs)) {
    throw new Error(`Invalid range: ${range.from} - ${range.to}`);
  }

  const inRange = logs.filter((log) => {
    const createdMs = Date.parse(log.createTime);
    return createdMs >= fromMs && createdMs < toMs;
  });
  const limit = Math.max(pageSize, 1);
  const startIndex = pageToken ? decodePageToken(pageToken) : 0;
  const endIndex = Math.min(startIndex + limit, inRange.length);
  const hasMore = endIndex < inRange.length;

  return {
    meta: {
      status: 200,
      pagination: {
        pageSize: limit,
        totalCount: inRange.length,
        ...(hasMore ? { next: encodePageToken(endIndex) } : {})
      }
    },
    data: [{ logs: inRange.slice(startIndex, endIndex) }],
    fail: []
  };
}
