import { Pool } from "pg";

import { describeError } from "../errors";
import type { Queryable } from "./queryable";

// An idle client losing its connection surfaces as a pool `error` event,
// which ends the process when nothing listens for it.
export function createPool(
  databaseUrl: string,
  logError: (message: string) => void = console.error
): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000
  });

  pool.on("error", (error) => {
    logError(`database pool error (${describeError(error)})`);
  });

  return pool;
}

export async function pingDatabase(runner: Queryable): Promise<boolean> {
  try {
    await runner.query("SELECT 1;");
    return true;
  } catch {
    return false;
  }
}
