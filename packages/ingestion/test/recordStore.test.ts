import { describe, expect, it, vi } from "vitest";

import {
  buildInsertStatement,
  createRecordStore,
  insertRecordsWithClient,
  MAX_INSERT_RECORDS_PER_STATEMENT,
  openWindowWriter
} from "../src/db/recordStore";
import { computeLogId } from "../src/db/recordIdentity";
import { StoreError } from "../src/errors";
import type { SearchLogRecord } from "../src/types";
import { makeRecord } from "./helpers/fakes";

function recordsFor(count: number): SearchLogRecord[] {
  return Array.from({ length: count }, (_, index) =>
    makeRecord({ createTime: "2026-01-01T00:00:00.000Z", searchText: `query ${index}` })
  );
}

describe("buildInsertStatement", () => {
  it("builds one array per column", () => {
    const record = makeRecord({
      createTime: "2026-01-01T00:00:00.000Z",
      isAdmin: true,
      raw: { emailAddr: "alice@example.com" }
    });

    const statement = buildInsertStatement([record]);

    expect(statement.sql).toContain("FROM UNNEST(");
    expect(statement.sql).toContain("ON CONFLICT (log_id) DO NOTHING");
    expect(statement.values).toEqual([
      [computeLogId(record)],
      ["2026-01-01T00:00:00.000Z"],
      ["alice@example.com"],
      ["archive"],
      ["quarterly report"],
      ["audit"],
      ["Archive search"],
      [null],
      [null],
      [true],
      ['{"emailAddr":"alice@example.com"}']
    ]);
  });

  it("throws for an empty batch", () => {
    expect(() => buildInsertStatement([])).toThrow(
      "Cannot build insert statement for empty record batch"
    );
  });
});

describe("insertRecordsWithClient", () => {
  it("returns the number of rows actually inserted", async () => {
    const query = vi.fn(async (_text: string, _values?: unknown[]) => ({ rowCount: 2, rows: [] }));

    expect(await insertRecordsWithClient({ query }, recordsFor(3))).toBe(2);
    expect(query).toHaveBeenCalledOnce();
  });

  it("splits large batches into several statements", async () => {
    const query = vi.fn(async (_text: string, values?: unknown[]) => {
      const logIds = values?.[0];
      return { rowCount: Array.isArray(logIds) ? logIds.length : null, rows: [] };
    });

    const inserted = await insertRecordsWithClient(
      { query },
      recordsFor(MAX_INSERT_RECORDS_PER_STATEMENT + 1)
    );

    expect(inserted).toBe(MAX_INSERT_RECORDS_PER_STATEMENT + 1);
    expect(query).toHaveBeenCalledTimes(2);
  });
});

function stubConnection(failOn: string | null = null) {
  const query = vi.fn(async (text: string, _values?: unknown[]) => {
    if (failOn !== null && text.includes(failOn)) {
      throw new Error(`${failOn} failed`);
    }
    return { rowCount: text.includes("INSERT INTO search_logs") ? 1 : null, rows: [] };
  });
  const release = vi.fn();

  return { query, release };
}

function firstLines(query: ReturnType<typeof stubConnection>["query"]): string[] {
  return query.mock.calls.map(([text]) => text.trim().split("\n")[0]);
}

describe("openWindowWriter", () => {
  it("keeps every chunk of a window in one transaction", async () => {
    const connection = stubConnection();

    const writer = await openWindowWriter(connection);
    await writer.insert(recordsFor(1));
    await writer.insert(recordsFor(1));
    await writer.commit();

    expect(firstLines(connection.query)).toEqual([
      "BEGIN",
      "INSERT INTO search_logs (",
      "INSERT INTO search_logs (",
      "COMMIT"
    ]);
    expect(connection.release).toHaveBeenCalledWith();
  });

  it("rolls back and releases the connection", async () => {
    const connection = stubConnection();

    const writer = await openWindowWriter(connection);
    await writer.insert(recordsFor(2));
    await writer.rollback();

    expect(firstLines(connection.query).at(-1)).toBe("ROLLBACK");
    expect(connection.release).toHaveBeenCalledOnce();
  });

  it("wraps insert failures in StoreError", async () => {
    const connection = stubConnection("INSERT INTO search_logs");

    const writer = await openWindowWriter(connection);
    const error = await writer.insert(recordsFor(2)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ message: "Failed to insert batch of 2 search logs" });
  });

  it("discards the connection when the commit fails", async () => {
    const connection = stubConnection("COMMIT");

    const writer = await openWindowWriter(connection);

    await expect(writer.commit()).rejects.toThrow("Failed to commit search log window");
    expect(connection.release).toHaveBeenCalledWith(true);
  });

  it("refuses to be used after it has finished", async () => {
    const writer = await openWindowWriter(stubConnection());
    await writer.commit();

    await expect(writer.insert(recordsFor(1))).rejects.toThrow(
      "Search log window already committed or rolled back"
    );
    await expect(writer.rollback()).rejects.toThrow(
      "Search log window already committed or rolled back"
    );
  });

  it("skips the database for an empty chunk", async () => {
    const connection = stubConnection();

    const writer = await openWindowWriter(connection);

    expect(await writer.insert([])).toBe(0);
    expect(firstLines(connection.query)).toEqual(["BEGIN"]);
  });
});

describe("createRecordStore", () => {
  it("opens each window on its own pooled connection", async () => {
    const connection = stubConnection();
    const connect = vi.fn(async () => connection);
    const store = createRecordStore({ connect });

    const writer = await store.beginWindow();
    expect(await writer.insert(recordsFor(1))).toBe(1);
    await writer.commit();

    expect(connect).toHaveBeenCalledOnce();
    expect(connection.release).toHaveBeenCalledOnce();
  });

  it("reports an unreachable database as StoreError", async () => {
    const store = createRecordStore({
      connect: vi.fn(async () => {
        throw new Error("connection refused");
      })
    });

    await expect(store.beginWindow()).rejects.toThrow(
      new StoreError("Failed to open search log window")
    );
  });
});
