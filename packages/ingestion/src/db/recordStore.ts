import { StoreError } from "../errors";
import type { SearchLogRecord } from "../types";
import type { ConnectionSource, PooledConnection, Queryable } from "./queryable";
import { computeLogId } from "./recordIdentity";

const INSERT_SEARCH_LOGS_SQL = `
INSERT INTO search_logs (
  log_id, create_time, email_addr, source, search_text, search_reason,
  description, muse_query, search_path, is_admin, raw
)
SELECT *
FROM UNNEST(
  $1::text[], $2::timestamptz[], $3::text[], $4::text[], $5::text[], $6::text[],
  $7::text[], $8::text[], $9::text[], $10::boolean[], $11::jsonb[]
)
ON CONFLICT (log_id) DO NOTHING;
`;

export const MAX_INSERT_RECORDS_PER_STATEMENT = 5000;

const WINDOW_FINISHED_MESSAGE = "Search log window already committed or rolled back";

/**
 * One open transaction spanning a whole ingestion window. Chunks inserted
 * through it become visible together on `commit`; `rollback` discards them.
 */
export interface WindowWriter {
  insert: (records: SearchLogRecord[]) => Promise<number>;
  commit: () => Promise<void>;
  rollback: () => Promise<void>;
}

export interface RecordStore {
  beginWindow: () => Promise<WindowWriter>;
}

export function buildInsertStatement(records: SearchLogRecord[]): {
  sql: string;
  values: unknown[][];
} {
  if (records.length === 0) {
    throw new Error("Cannot build insert statement for empty record batch");
  }

  const columns: unknown[][] = Array.from({ length: 11 }, () => []);

  for (const record of records) {
    const row = [
      computeLogId(record),
      record.createTime,
      record.emailAddr,
      record.source,
      record.searchText,
      record.searchReason,
      record.description,
      record.museQuery,
      record.searchPath,
      record.isAdmin,
      JSON.stringify(record.raw)
    ];

    row.forEach((value, index) => {
      columns[index].push(value);
    });
  }

  return {
    sql: INSERT_SEARCH_LOGS_SQL,
    values: columns
  };
}

/**
 * Inserts records on an already open transaction, chunked into several
 * statements when the batch is large. Rows whose `log_id` already exists are
 * skipped and not counted.
 */
export async function insertRecordsWithClient(
  client: Queryable,
  records: SearchLogRecord[]
): Promise<number> {
  let insertedCount = 0;

  for (
    let index = 0;
    index < records.length;
    index += MAX_INSERT_RECORDS_PER_STATEMENT
  ) {
    const chunk = records.slice(index, index + MAX_INSERT_RECORDS_PER_STATEMENT);
    const statement = buildInsertStatement(chunk);
    const insertResult = await client.query(statement.sql, statement.values);
    insertedCount += insertResult.rowCount ?? 0;
  }

  return insertedCount;
}

export async function openWindowWriter(client: PooledConnection): Promise<WindowWriter> {
  await client.query("BEGIN");

  let finished = false;

  const finish = (): void => {
    if (finished) {
      throw new StoreError(WINDOW_FINISHED_MESSAGE);
    }
    finished = true;
  };

  return {
    async insert(records: SearchLogRecord[]): Promise<number> {
      if (finished) {
        throw new StoreError(WINDOW_FINISHED_MESSAGE);
      }

      if (records.length === 0) {
        return 0;
      }

      try {
        return await insertRecordsWithClient(client, records);
      } catch (error) {
        throw new StoreError(
          `Failed to insert batch of ${records.length} search logs`,
          { cause: error }
        );
      }
    },
    async commit(): Promise<void> {
      finish();

      try {
        await client.query("COMMIT");
        client.release();
      } catch (error) {
        client.release(true);
        throw new StoreError("Failed to commit search log window", { cause: error });
      }
    },
    async rollback(): Promise<void> {
      finish();

      try {
        await client.query("ROLLBACK");
        client.release();
      } catch (error) {
        client.release(true);
        throw new StoreError("Failed to roll back search log window", { cause: error });
      }
    }
  };
}

export function createRecordStore(pool: ConnectionSource): RecordStore {
  return {
    async beginWindow(): Promise<WindowWriter> {
      let client: PooledConnection;

      try {
        client = await pool.connect();
      } catch (error) {
        throw new StoreError("Failed to open search log window", { cause: error });
      }

      try {
        return await openWindowWriter(client);
      } catch (error) {
        client.release(true);
        throw new StoreError("Failed to open search log window", { cause: error });
      }
    }
  };
}
