import { describe, expect, it } from "vitest";

import { createProgressLogger } from "../src/ingestion/progressLogger";

describe("createProgressLogger", () => {
  it("logs at configured intervals using aggregated counters", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      intervalMs: 1000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.begin("backfill");
    logger.onPage(100, 250);
    logger.onFlush(90);
    expect(messages).toHaveLength(0);

    nowMs = 2000;
    logger.onPage(100, 250);

    expect(messages).toEqual([
      "ingestion progress (phase=backfill, pages=2, records=200/250, inserted=90, flushes=1, rps=100.0)"
    ]);
  });

  it("flushes a final progress line on demand", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      intervalMs: 5000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.begin("delta");
    logger.onPage(10, null);
    logger.onFlush(4);
    expect(messages).toHaveLength(0);

    nowMs = 500;
    logger.flush();

    expect(messages).toEqual([
      "ingestion progress (phase=delta, pages=1, records=10, inserted=4, flushes=1, rps=20.0)"
    ]);
  });

  it("resets counters when a new cycle begins", () => {
    let nowMs = 0;
    const messages: string[] = [];

    const logger = createProgressLogger({
      intervalMs: 5000,
      now: () => nowMs,
      log: (message) => messages.push(message)
    });

    logger.begin("backfill");
    logger.onPage(50, 50);
    logger.onFlush(50);

    nowMs = 1000;
    logger.begin("delta");
    nowMs = 2000;
    logger.flush();

    expect(messages).toEqual([
      "ingestion progress (phase=delta, pages=0, records=0, inserted=0, flushes=0, rps=0.0)"
    ]);
  });
});
