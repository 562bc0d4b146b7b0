import { FetchError } from "../errors";
import type { SearchLogPage, SearchLogRecord } from "../types";

interface RecordLike {
  [key: string]: unknown;
}

export function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toIsoDateFromEpoch(value: number): string | null {
  if (!Number.isFinite(value)) {
    return null;
  }

  const abs = Math.abs(value);
  let millis = value;

  if (abs >= 1e17) {
    millis = value / 1_000_000;
  } else if (abs >= 1e14) {
    millis = value / 1_000;
  } else if (abs >= 1e8 && abs < 1e11) {
    millis = value * 1_000;
  }

  const date = new Date(millis);
  if (Number.isNaN(date.getTime())) {
    return null;
  }

  return date.toISOString();
}

/**
 * Normalises a remote timestamp to a UTC ISO-8601 string. Accepts ISO
 * strings (including compact `+0000` offsets) and epoch seconds, millis or
 * micros, as numbers or numeric strings.
 */
export function normalizeTimestamp(value: unknown): string | null {
  if (typeof value === "number") {
    return toIsoDateFromEpoch(value);
  }

  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return toIsoDateFromEpoch(Number(trimmed));
  }

  const withColonOffset = trimmed.replace(/([+-]\d{2})(\d{2})$/, "$1:$2");
  const parsed = Date.parse(withColonOffset);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return new Date(parsed).toISOString();
}

function toOptionalString(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }

  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }

  return null;
}

function coerceBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") {
      return true;
    }
    if (normalized === "false") {
      return false;
    }
  }

  if (typeof value === "number") {
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
  }

  return null;
}

export function parseSearchLogRecord(value: unknown): SearchLogRecord {
  if (!isRecordLike(value)) {
    throw new FetchError("Invalid search log payload: log must be an object");
  }

  const createTime = normalizeTimestamp(value.createTime ?? value.create_time);
  if (createTime === null) {
    throw new FetchError("Invalid search log payload: missing or invalid createTime");
  }

  const emailAddr = value.emailAddr ?? value.email_addr;
  if (typeof emailAddr !== "string" || emailAddr.trim().length === 0) {
    throw new FetchError("Invalid search log payload: missing emailAddr");
  }

  return {
    createTime,
    emailAddr: emailAddr.trim().toLowerCase(),
    source: toOptionalString(value.source),
    searchText: toOptionalString(value.searchText ?? value.search_text),
    searchReason: toOptionalString(value.searchReason ?? value.search_reason),
    description: toOptionalString(value.description),
    museQuery: toOptionalString(value.museQuery ?? value.muse_query),
    searchPath: toOptionalString(value.searchPath ?? value.search_path),
    isAdmin: coerceBoolean(value.isAdmin ?? value.is_admin),
    raw: { ...value }
  };
}

function describeFailures(fail: unknown[]): string {
  const codes: string[] = [];

  for (const entry of fail) {
    if (!isRecordLike(entry) || !Array.isArray(entry.errors)) {
      continue;
    }

    for (const error of entry.errors) {
      if (isRecordLike(error) && typeof error.code === "string") {
        codes.push(error.code);
      }
    }
  }

  return codes.length > 0 ? codes.join(", ") : `${fail.length} failure(s)`;
}

function toTotalCount(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }

  return null;
}

export function parseSearchLogPage(payload: unknown): SearchLogPage {
  if (!isRecordLike(payload)) {
    throw new FetchError("Invalid search log response: expected object");
  }

  if (Array.isArray(payload.fail) && payload.fail.length > 0) {
    throw new FetchError(
      `Search log request rejected: ${describeFailures(payload.fail)}`
    );
  }

  const meta = isRecordLike(payload.meta) ? payload.meta : null;
  const pagination = meta && isRecordLike(meta.pagination) ? meta.pagination : null;
  const next = pagination?.next ?? null;

  if (!(typeof next === "string" || next === null)) {
    throw new FetchError("Invalid search log response: pagination.next must be string or null");
  }

  const data = payload.data ?? [];
  if (!Array.isArray(data)) {
    throw new FetchError("Invalid search log response: data must be an array");
  }

  const records: SearchLogRecord[] = [];

  for (const entry of data) {
    if (!isRecordLike(entry)) {
      throw new FetchError("Invalid search log response: data entries must be objects");
    }

    const logs = entry.logs ?? [];
    if (!Array.isArray(logs)) {
      throw new FetchError("Invalid search log response: logs must be an array");
    }

    for (const log of logs) {
      records.push(parseSearchLogRecord(log));
    }
  }

  return {
    records,
    nextPageToken: next && next.length > 0 ? next : null,
    totalCount: toTotalCount(pagination?.totalCount)
  };
}
