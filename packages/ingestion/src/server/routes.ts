import type { SearchLogReader } from "../db/searchLogQueries";
import type { IngestionEngine } from "../ingestion/engine";

const MS_PER_DAY = 86_400_000;
const MAX_DAYS = 3650;

export interface RouteRequest {
  method: string;
  url: string;
  authorization: string | null;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

export interface RouterDependencies {
  engine: Pick<IngestionEngine, "getState" | "getLastCycle" | "reset">;
  reader: SearchLogReader;
  isStoreReachable: () => Promise<boolean>;
  defaultDays: number;
  adminToken: string | null;
  now?: () => number;
}

class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

function readIntParam(
  params: URLSearchParams,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  const raw = params.get(name);

  if (raw === null || raw.trim().length === 0) {
    return fallback;
  }

  if (!/^\d+$/.test(raw.trim())) {
    throw new BadRequestError(`Invalid ${name}: ${raw}`);
  }

  const value = Number.parseInt(raw, 10);
  if (value < min || value > max) {
    throw new BadRequestError(`${name} must be between ${min} and ${max}`);
  }

  return value;
}

function readDateParam(params: URLSearchParams): string {
  const date = params.get("date");

  if (!date || !/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new BadRequestError("date must be formatted as YYYY-MM-DD");
  }

  // Date.parse rolls impossible days over (2024-02-30 becomes March 1).
  const parsed = new Date(`${date}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== date) {
    throw new BadRequestError(`Invalid date: ${date}`);
  }

  return date;
}

function json(status: number, body: unknown): RouteResponse {
  return { status, body };
}

export function createRouter(
  dependencies: RouterDependencies
): (request: RouteRequest) => Promise<RouteResponse> {
  const now = dependencies.now ?? Date.now;

  const sinceDays = (params: URLSearchParams): { days: number; since: Date } => {
    const days = readIntParam(params, "days", dependencies.defaultDays, 1, MAX_DAYS);
    return { days, since: new Date(now() - days * MS_PER_DAY) };
  };

  const health = async (): Promise<RouteResponse> => {
    const reachable = await dependencies.isStoreReachable();
    const state = reachable ? await dependencies.engine.getState() : null;

    return json(reachable ? 200 : 503, {
      status: reachable ? "up" : "down",
      engine: {
        state,
        lastCycle: dependencies.engine.getLastCycle()
      },
      store: { reachable }
    });
  };

  const resetCursor = async (authorization: string | null): Promise<RouteResponse> => {
    if (dependencies.adminToken === null) {
      return json(403, { error: "admin endpoint disabled" });
    }

    if (authorization !== `Bearer ${dependencies.adminToken}`) {
      return json(401, { error: "unauthorized" });
    }

    await dependencies.engine.reset();
    return json(200, { status: "ok", message: "Cursor and bootstrap reset" });
  };

  const route = async (request: RouteRequest): Promise<RouteResponse> => {
    const url = new URL(request.url, "http://localhost");
    const { pathname, searchParams } = url;

    if (request.method === "GET" && pathname === "/health") {
      return health();
    }

    if (pathname === "/admin/reset-cursor") {
      if (request.method !== "POST") {
        return json(405, { error: "Method Not Allowed" });
      }

      return resetCursor(request.authorization);
    }

    if (request.method !== "GET") {
      return json(404, { error: "Not Found" });
    }

    if (pathname === "/api/users") {
      const { days, since } = sinceDays(searchParams);
      const users = await dependencies.reader.countSearchesByUser(since);
      return json(200, { days, users });
    }

    const userMatch = /^\/api\/users\/([^/]+)$/.exec(pathname);
    if (userMatch) {
      const email = decodeURIComponent(userMatch[1]).trim().toLowerCase();
      const { days, since } = sinceDays(searchParams);
      const searches = await dependencies.reader.listUserSearches(email, since);
      return json(200, { email, days, searches });
    }

    if (pathname === "/api/searches-per-day") {
      const current = new Date(now());
      const year = readIntParam(searchParams, "year", current.getUTCFullYear(), 1970, 9999);
      const month = readIntParam(searchParams, "month", current.getUTCMonth() + 1, 1, 12);
      const days = await dependencies.reader.countSearchesPerDay(year, month);
      return json(200, { year, month, days });
    }

    if (pathname === "/api/searches-by-day") {
      const date = readDateParam(searchParams);
      const users = await dependencies.reader.listSearchesByDay(date);
      return json(200, { date, users });
    }

    return json(404, { error: "Not Found" });
  };

  return async (request: RouteRequest): Promise<RouteResponse> => {
    try {
      return await route(request);
    } catch (error) {
      if (error instanceof BadRequestError || error instanceof URIError) {
        return json(400, { error: error.message });
      }

      throw error;
    }
  };
}
