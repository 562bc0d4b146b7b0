import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type ServerResponse } from "node:http";

import { buildMockSearchLogs, paginateSearchLogs } from "./mockData";

const port = Number.parseInt(process.env.PORT ?? "3100", 10);
const totalLogs = Number.parseInt(process.env.MOCK_TOTAL_LOGS ?? "5000", 10);
const spanDays = Number.parseInt(process.env.MOCK_SPAN_DAYS ?? "45", 10);
const failureRate = Number.parseFloat(process.env.MOCK_FAILURE_RATE ?? "0");
const clientId = process.env.MOCK_CLIENT_ID ?? "mock-client-id";
const clientSecret = process.env.MOCK_CLIENT_SECRET ?? "mock-client-secret";

const spanMs = spanDays * 86_400_000;
const logs = buildMockSearchLogs(
  totalLogs,
  Date.now() - spanMs,
  Math.max(1, Math.floor(spanMs / Math.max(1, totalLogs)))
);
const issuedTokens = new Set<string>();

function writeJson(
  response: ServerResponse,
  statusCode: number,
  payload: unknown
): void {
  response.statusCode = statusCode;
  response.setHeader("Content-Type", "application/json");
  response.end(JSON.stringify(payload));
}

async function readBody(request: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];

  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  return Buffer.concat(chunks).toString("utf8");
}

function readSearchRequest(body: string): {
  from: string;
  to: string;
  pageSize: number;
  pageToken: string | null;
} {
  const parsed: unknown = JSON.parse(body);

  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("Request body must be an object");
  }

  const meta = "meta" in parsed && typeof parsed.meta === "object" ? parsed.meta : null;
  const pagination =
    meta !== null && "pagination" in meta && typeof meta.pagination === "object"
      ? meta.pagination
      : null;
  const data = "data" in parsed && Array.isArray(parsed.data) ? parsed.data : [];
  const range: unknown = data[0];

  if (
    typeof range !== "object" ||
    range === null ||
    !("from" in range) ||
    !("to" in range) ||
    typeof range.from !== "string" ||
    typeof range.to !== "string"
  ) {
    throw new Error("data[0] must contain from and to");
  }

  const pageSize =
    pagination !== null && "pageSize" in pagination && typeof pagination.pageSize === "number"
      ? pagination.pageSize
      : 100;
  const pageToken =
    pagination !== null && "pageToken" in pagination && typeof pagination.pageToken === "string"
      ? pagination.pageToken
      : null;

  return { from: range.from, to: range.to, pageSize, pageToken };
}

async function handleToken(request: IncomingMessage, response: ServerResponse): Promise<void> {
  const form = new URLSearchParams(await readBody(request));

  if (
    form.get("grant_type") !== "client_credentials" ||
    form.get("client_id") !== clientId ||
    form.get("client_secret") !== clientSecret
  ) {
    writeJson(response, 401, { error: "invalid_client" });
    return;
  }

  const token = randomUUID();
  issuedTokens.add(token);
  writeJson(response, 200, { access_token: token, token_type: "Bearer", expires_in: 1800 });
}

async function handleSearchLogs(
  request: IncomingMessage,
  response: ServerResponse
): Promise<void> {
  const token = request.headers.authorization?.replace(/^Bearer\s+/i, "") ?? "";

  if (!issuedTokens.has(token)) {
    writeJson(response, 401, { error: "invalid_token" });
    return;
  }

  if (failureRate > 0 && Math.random() < failureRate) {
    writeJson(response, 503, { error: "Service Unavailable" });
    return;
  }

  try {
    const search = readSearchRequest(await readBody(request));
    writeJson(
      response,
      200,
      paginateSearchLogs(logs, search, search.pageSize, search.pageToken)
    );
  } catch (error) {
    writeJson(response, 400, {
      meta: { status: 400 },
      data: [],
      fail: [
        {
          errors: [
            {
              code: "err_validation_failed",
              message: error instanceof Error ? error.message : "Invalid request"
            }
          ]
        }
      ]
    });
  }
}

const server = createServer((request, response) => {
  if (!request.url) {
    writeJson(response, 400, { error: "Missing URL" });
    return;
  }

  const url = new URL(request.url, `http://localhost:${port}`);

  if (url.pathname === "/health") {
    writeJson(response, 200, { status: "ok" });
    return;
  }

  const handler =
    request.method === "POST" && url.pathname === "/oauth/token"
      ? handleToken
      : request.method === "POST" &&
          url.pathname === "/api/archive/get-archive-search-logs"
        ? handleSearchLogs
        : null;

  if (!handler) {
    writeJson(response, 404, { error: "Not Found" });
    return;
  }

  handler(request, response).catch((error: unknown) => {
    console.error("mock api request failed", error);
    writeJson(response, 500, { error: "Internal Server Error" });
  });
});

server.listen(port, "0.0.0.0", () => {
  console.log(`mock api listening on port ${port} with ${logs.length} search logs`);
});
