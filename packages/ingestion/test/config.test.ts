import { afterEach, describe, expect, it } from "vitest";

import { loadConfig } from "../src/config";

const MANAGED_VARIABLES = [
  "INITIAL_BACKFILL_DAYS",
  "OVERLAP_SECONDS",
  "POLL_INTERVAL_SECONDS",
  "API_PAGE_SIZE",
  "ADMIN_TOKEN"
];

const originalValues = new Map(
  MANAGED_VARIABLES.map((name) => [name, process.env[name]] as const)
);

afterEach(() => {
  for (const [name, value] of originalValues) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
});

function clearManagedVariables(): void {
  for (const name of MANAGED_VARIABLES) {
    delete process.env[name];
  }
}

describe("loadConfig", () => {
  it("uses polling defaults when nothing is set", () => {
    clearManagedVariables();

    const config = loadConfig();

    expect(config.backfillDays).toBe(30);
    expect(config.overlapSeconds).toBe(7200);
    expect(config.pollIntervalSeconds).toBe(3600);
    expect(config.apiPageSize).toBe(100);
    expect(config.adminToken).toBeNull();
  });

  it("reads overrides from the environment", () => {
    clearManagedVariables();
    process.env.INITIAL_BACKFILL_DAYS = "1";
    process.env.OVERLAP_SECONDS = "3600";
    process.env.ADMIN_TOKEN = " test-admin-token ";

    const config = loadConfig();

    expect(config.backfillDays).toBe(1);
    expect(config.overlapSeconds).toBe(3600);
    expect(config.adminToken).toBe("test-admin-token");
  });

  it("rejects non-numeric integers", () => {
    clearManagedVariables();
    process.env.POLL_INTERVAL_SECONDS = "hourly";

    expect(() => loadConfig()).toThrow("Invalid integer for POLL_INTERVAL_SECONDS: hourly");
  });

  it("rejects an overlap that covers the whole backfill depth", () => {
    clearManagedVariables();
    process.env.INITIAL_BACKFILL_DAYS = "1";
    process.env.OVERLAP_SECONDS = "86400";

    expect(() => loadConfig()).toThrow(
      "OVERLAP_SECONDS (86400) must be shorter than the backfill depth (1 days)"
    );
  });

  it("rejects a zero page size", () => {
    clearManagedVariables();
    process.env.API_PAGE_SIZE = "0";

    expect(() => loadConfig()).toThrow("API_PAGE_SIZE must be greater than zero: 0");
  });
});
