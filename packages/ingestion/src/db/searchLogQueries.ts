import type { Pool } from "pg";

import type { Queryable } from "./queryable";

export interface UserSearchCount {
  email: string;
  count: number;
}

export interface SearchLogEntry {
  createTime: string;
  emailAddr: string;
  source: string | null;
  searchText: string | null;
  searchReason: string | null;
  description: string | null;
}

export interface DailySearchCount {
  date: string;
  count: number;
}

export interface UserDaySearches {
  email: string;
  count: number;
  entries: Array<Omit<SearchLogEntry, "emailAddr">>;
}

type UserCountRow = {
  email_addr: string;
  cnt: string;
};

type SearchLogRow = {
  create_time: Date;
  email_addr: string;
  source: string | null;
  search_text: string | null;
  search_reason: string | null;
  description: string | null;
};

type DayCountRow = {
  day: string;
  cnt: string;
};

const USER_COUNTS_SQL = `
SELECT email_addr, COUNT(*) AS cnt
FROM search_logs
WHERE create_time >= $1
GROUP BY email_addr
ORDER BY cnt DESC, email_addr ASC;
`;

const USER_SEARCHES_SQL = `
SELECT create_time, email_addr, source, search_text, search_reason, description
FROM search_logs
WHERE email_addr = $1
  AND create_time >= $2
ORDER BY create_time DESC;
`;

const SEARCHES_PER_DAY_SQL = `
SELECT to_char(create_time AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day, COUNT(*) AS cnt
FROM search_logs
WHERE create_time >= $1
  AND create_time < $2
GROUP BY day
ORDER BY day;
`;

const SEARCHES_BY_DAY_SQL = `
SELECT create_time, email_addr, source, search_text, search_reason, description
FROM search_logs
WHERE create_time >= $1
  AND create_time < $2
ORDER BY email_addr ASC, create_time DESC;
`;

function rowToEntry(row: SearchLogRow): SearchLogEntry {
  return {
    createTime: row.create_time.toISOString(),
    emailAddr: row.email_addr,
    source: row.source,
    searchText: row.search_text,
    searchReason: row.search_reason,
    description: row.description
  };
}

export async function countSearchesByUser(
  runner: Queryable<UserCountRow>,
  since: Date
): Promise<UserSearchCount[]> {
  const result = await runner.query(USER_COUNTS_SQL, [since.toISOString()]);

  return result.rows.map((row) => ({
    email: row.email_addr,
    count: Number.parseInt(row.cnt, 10)
  }));
}

export async function listUserSearches(
  runner: Queryable<SearchLogRow>,
  email: string,
  since: Date
): Promise<SearchLogEntry[]> {
  const result = await runner.query(USER_SEARCHES_SQL, [
    email.trim().toLowerCase(),
    since.toISOString()
  ]);

  return result.rows.map(rowToEntry);
}

export async function countSearchesPerDay(
  runner: Queryable<DayCountRow>,
  year: number,
  month: number
): Promise<DailySearchCount[]> {
  const start = new Date(Date.UTC(year, month - 1, 1));
  const end = new Date(Date.UTC(year, month, 1));
  const result = await runner.query(SEARCHES_PER_DAY_SQL, [
    start.toISOString(),
    end.toISOString()
  ]);

  return result.rows.map((row) => ({
    date: row.day,
    count: Number.parseInt(row.cnt, 10)
  }));
}

export async function listSearchesByDay(
  runner: Queryable<SearchLogRow>,
  date: string
): Promise<UserDaySearches[]> {
  const start = new Date(`${date}T00:00:00.000Z`);
  const end = new Date(start.getTime() + 86_400_000);
  const result = await runner.query(SEARCHES_BY_DAY_SQL, [
    start.toISOString(),
    end.toISOString()
  ]);

  const grouped = new Map<string, UserDaySearches>();

  for (const row of result.rows) {
    const { emailAddr, ...entry } = rowToEntry(row);
    const group: UserDaySearches = grouped.get(emailAddr) ?? {
      email: emailAddr,
      count: 0,
      entries: []
    };
    group.entries.push(entry);
    group.count += 1;
    grouped.set(emailAddr, group);
  }

  return [...grouped.values()];
}

export interface SearchLogReader {
  countSearchesByUser: (since: Date) => Promise<UserSearchCount[]>;
  listUserSearches: (email: string, since: Date) => Promise<SearchLogEntry[]>;
  countSearchesPerDay: (year: number, month: number) => Promise<DailySearchCount[]>;
  listSearchesByDay: (date: string) => Promise<UserDaySearches[]>;
}

export function createSearchLogReader(pool: Pool): SearchLogReader {
  return {
    countSearchesByUser: (since) => countSearchesByUser(pool, since),
    listUserSearches: (email, since) => listUserSearches(pool, email, since),
    countSearchesPerDay: (year, month) => countSearchesPerDay(pool, year, month),
    listSearchesByDay: (date) => listSearchesByDay(pool, date)
  };
}
