import { describe, expect, it, vi } from "vitest";

import {
  countSearchesByUser,
  countSearchesPerDay,
  listSearchesByDay,
  listUserSearches
} from "../src/db/searchLogQueries";

function stubRunner<Row>(rows: Row[]) {
  return {
    query: vi.fn(async (_text: string, _values?: unknown[]) => ({ rowCount: rows.length, rows }))
  };
}

function logRow(createTime: string, email: string, searchText: string) {
  return {
    create_time: new Date(createTime),
    email_addr: email,
    source: "archive",
    search_text: searchText,
    search_reason: null,
    description: null
  };
}

describe("countSearchesByUser", () => {
  it("converts bigint counts to numbers", async () => {
    const runner = stubRunner([
      { email_addr: "alice@example.com", cnt: "12" },
      { email_addr: "bob@example.com", cnt: "3" }
    ]);

    const counts = await countSearchesByUser(runner, new Date("2026-01-01T00:00:00.000Z"));

    expect(counts).toEqual([
      { email: "alice@example.com", count: 12 },
      { email: "bob@example.com", count: 3 }
    ]);
    expect(runner.query).toHaveBeenCalledWith(expect.stringContaining("GROUP BY email_addr"), [
      "2026-01-01T00:00:00.000Z"
    ]);
  });
});

describe("listUserSearches", () => {
  it("looks the user up by normalised email", async () => {
    const runner = stubRunner([logRow("2026-01-02T09:30:00.000Z", "alice@example.com", "budget")]);

    const searches = await listUserSearches(
      runner,
      " Alice@Example.com ",
      new Date("2026-01-01T00:00:00.000Z")
    );

    expect(runner.query).toHaveBeenCalledWith(expect.any(String), [
      "alice@example.com",
      "2026-01-01T00:00:00.000Z"
    ]);
    expect(searches).toEqual([
      {
        createTime: "2026-01-02T09:30:00.000Z",
        emailAddr: "alice@example.com",
        source: "archive",
        searchText: "budget",
        searchReason: null,
        description: null
      }
    ]);
  });
});

describe("countSearchesPerDay", () => {
  it("queries the UTC month range", async () => {
    const runner = stubRunner([{ day: "2026-12-24", cnt: "5" }]);

    const days = await countSearchesPerDay(runner, 2026, 12);

    expect(runner.query).toHaveBeenCalledWith(expect.any(String), [
      "2026-12-01T00:00:00.000Z",
      "2027-01-01T00:00:00.000Z"
    ]);
    expect(days).toEqual([{ date: "2026-12-24", count: 5 }]);
  });
});

describe("listSearchesByDay", () => {
  it("groups the day's searches per user", async () => {
    const runner = stubRunner([
      logRow("2026-01-02T18:00:00.000Z", "alice@example.com", "second"),
      logRow("2026-01-02T08:00:00.000Z", "alice@example.com", "first"),
      logRow("2026-01-02T12:00:00.000Z", "bob@example.com", "only")
    ]);

    const users = await listSearchesByDay(runner, "2026-01-02");

    expect(runner.query).toHaveBeenCalledWith(expect.any(String), [
      "2026-01-02T00:00:00.000Z",
      "2026-01-03T00:00:00.000Z"
    ]);
    expect(users.map((user) => [user.email, user.count])).toEqual([
      ["alice@example.com", 2],
      ["bob@example.com", 1]
    ]);
    expect(users[0].entries.map((entry) => entry.searchText)).toEqual(["second", "first"]);
    expect(users[0].entries[0]).not.toHaveProperty("emailAddr");
  });
});
