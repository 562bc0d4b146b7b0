import { describe, expect, it, vi } from "vitest";

import {
  BOOTSTRAP_DONE_KEY,
  createCursorStore,
  LAST_POLLED_END_KEY,
  readCursorState
} from "../src/db/cursorStore";
import type { QueryOutcome } from "../src/db/queryable";
import { StoreError } from "../src/errors";
import { InMemoryCursorStore } from "./helpers/fakes";

function stubPool(rows: Array<{ value: string }> = []) {
  const clientQuery = vi.fn(
    async (_text: string, _values?: unknown[]): Promise<QueryOutcome<{ value: string }>> => ({
      rowCount: 1,
      rows
    })
  );
  const release = vi.fn();
  const pool = {
    query: vi.fn(async (_text: string, _values?: unknown[]) => ({ rowCount: rows.length, rows })),
    connect: vi.fn(async () => ({ query: clientQuery, release }))
  };

  return { pool, clientQuery, release };
}

describe("createCursorStore", () => {
  it("reads a single key", async () => {
    const { pool } = stubPool([{ value: "2026-01-01T00:00:00.000Z" }]);
    const store = createCursorStore(pool);

    expect(await store.get(LAST_POLLED_END_KEY)).toBe("2026-01-01T00:00:00.000Z");
    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining("FROM ingestion_cursor"), [
      LAST_POLLED_END_KEY
    ]);
  });

  it("returns null for a missing key", async () => {
    const { pool } = stubPool();

    expect(await createCursorStore(pool).get(BOOTSTRAP_DONE_KEY)).toBeNull();
  });

  it("upserts several keys in one transaction", async () => {
    const { pool, clientQuery, release } = stubPool();

    await createCursorStore(pool).setMany({
      [LAST_POLLED_END_KEY]: "2026-01-01T00:00:00.000Z",
      [BOOTSTRAP_DONE_KEY]: "true"
    });

    expect(clientQuery.mock.calls).toEqual([
      ["BEGIN"],
      [expect.stringContaining("ON CONFLICT (key) DO UPDATE"), [LAST_POLLED_END_KEY, "2026-01-01T00:00:00.000Z"]],
      [expect.stringContaining("ON CONFLICT (key) DO UPDATE"), [BOOTSTRAP_DONE_KEY, "true"]],
      ["COMMIT"]
    ]);
    expect(release).toHaveBeenCalledOnce();
  });

  it("rolls back and reports a write failure", async () => {
    const { pool, clientQuery, release } = stubPool();
    clientQuery.mockImplementation(async (text: string) => {
      if (text.includes("INSERT INTO ingestion_cursor")) {
        throw new Error("deadlock detected");
      }
      return { rowCount: null, rows: [] };
    });

    await expect(
      createCursorStore(pool).set(LAST_POLLED_END_KEY, "2026-01-01T00:00:00.000Z")
    ).rejects.toThrow(new StoreError("Cursor store write failed"));

    expect(clientQuery).toHaveBeenLastCalledWith("ROLLBACK");
    expect(release).toHaveBeenCalledOnce();
  });

  it("deletes keys in a single statement", async () => {
    const { pool } = stubPool();

    await createCursorStore(pool).delete([LAST_POLLED_END_KEY, BOOTSTRAP_DONE_KEY]);

    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining("DELETE FROM ingestion_cursor"), [
      [LAST_POLLED_END_KEY, BOOTSTRAP_DONE_KEY]
    ]);
  });
});

describe("readCursorState", () => {
  it("reports a fresh store", async () => {
    expect(await readCursorState(new InMemoryCursorStore())).toEqual({
      lastPolledEndUtc: null,
      bootstrapDone: false
    });
  });

  it("parses the stored cursor and bootstrap flag", async () => {
    const store = new InMemoryCursorStore();
    await store.setMany({
      [LAST_POLLED_END_KEY]: "2026-01-01T00:00:00.000Z",
      [BOOTSTRAP_DONE_KEY]: "1"
    });

    expect(await readCursorState(store)).toEqual({
      lastPolledEndUtc: new Date("2026-01-01T00:00:00.000Z"),
      bootstrapDone: true
    });
  });

  it("rejects an unparseable cursor", async () => {
    const store = new InMemoryCursorStore();
    await store.set(LAST_POLLED_END_KEY, "yesterday");

    await expect(readCursorState(store)).rejects.toThrow(
      "Invalid last_polled_end_utc value: yesterday"
    );
  });
});
