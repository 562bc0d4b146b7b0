import { createHash } from "node:crypto";

import type { SearchLogRecord } from "../types";

/**
 * Stable identity of a search log. The source has no event id, so the id is
 * a SHA-256 over every stored attribute; re-delivered copies of an event
 * hash to the same id and are dropped by the `log_id` primary key.
 */
export function computeLogId(record: SearchLogRecord): string {
  const tuple = [
    new Date(record.createTime).toISOString(),
    record.emailAddr.toLowerCase(),
    record.source,
    record.searchText,
    record.searchReason,
    record.description,
    record.museQuery,
    record.searchPath,
    record.isAdmin
  ];

  return createHash("sha256").update(JSON.stringify(tuple), "utf8").digest("hex");
}
