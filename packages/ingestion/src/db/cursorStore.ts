import { StoreError } from "../errors";
import type { CursorState } from "../types";
import type { ConnectionSource, Queryable } from "./queryable";

export const LAST_POLLED_END_KEY = "last_polled_end_utc";
export const BOOTSTRAP_DONE_KEY = "bootstrap_done";

type CursorRow = {
  value: string;
};

const SELECT_CURSOR_SQL = `
SELECT value
FROM ingestion_cursor
WHERE key = $1;
`;

const UPSERT_CURSOR_SQL = `
INSERT INTO ingestion_cursor (key, value, updated_at)
VALUES ($1, $2, NOW())
ON CONFLICT (key) DO UPDATE
SET value = EXCLUDED.value,
    updated_at = EXCLUDED.updated_at;
`;

const DELETE_CURSOR_SQL = `
DELETE FROM ingestion_cursor
WHERE key = ANY($1::text[]);
`;

/**
 * Durable key/value map of ingestion progress. Every write has returned only
 * once it is committed; `setMany` and `delete` are atomic across their keys.
 */
export interface CursorStore {
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string) => Promise<void>;
  setMany: (entries: Record<string, string>) => Promise<void>;
  delete: (keys: string[]) => Promise<void>;
}

export async function getCursorValue(
  runner: Queryable<CursorRow>,
  key: string
): Promise<string | null> {
  const result = await runner.query(SELECT_CURSOR_SQL, [key]);
  return result.rows.length > 0 ? result.rows[0].value : null;
}

export async function setCursorValuesWithClient(
  client: Queryable,
  entries: Record<string, string>
): Promise<void> {
  await client.query("BEGIN");

  try {
    for (const [key, value] of Object.entries(entries)) {
      await client.query(UPSERT_CURSOR_SQL, [key, value]);
    }

    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

export async function deleteCursorValues(
  runner: Queryable,
  keys: string[]
): Promise<void> {
  await runner.query(DELETE_CURSOR_SQL, [keys]);
}

export async function readCursorState(store: CursorStore): Promise<CursorState> {
  const lastPolledEnd = await store.get(LAST_POLLED_END_KEY);
  const bootstrapDone = await store.get(BOOTSTRAP_DONE_KEY);

  let lastPolledEndUtc: Date | null = null;
  if (lastPolledEnd !== null) {
    const parsed = Date.parse(lastPolledEnd);
    if (Number.isNaN(parsed)) {
      throw new StoreError(`Invalid ${LAST_POLLED_END_KEY} value: ${lastPolledEnd}`);
    }
    lastPolledEndUtc = new Date(parsed);
  }

  return {
    lastPolledEndUtc,
    bootstrapDone: bootstrapDone === "true" || bootstrapDone === "1"
  };
}

async function wrapStoreError<T>(action: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw new StoreError(`Cursor store ${action} failed`, { cause: error });
  }
}

export function createCursorStore(
  pool: ConnectionSource & Queryable<CursorRow>
): CursorStore {
  const setMany = async (entries: Record<string, string>): Promise<void> => {
    await wrapStoreError("write", async () => {
      const client = await pool.connect();

      try {
        await setCursorValuesWithClient(client, entries);
      } finally {
        client.release();
      }
    });
  };

  return {
    get(key: string): Promise<string | null> {
      return wrapStoreError("read", () => getCursorValue(pool, key));
    },
    async set(key: string, value: string): Promise<void> {
      await setMany({ [key]: value });
    },
    setMany,
    async delete(keys: string[]): Promise<void> {
      await wrapStoreError("delete", () => deleteCursorValues(pool, keys));
    }
  };
}
