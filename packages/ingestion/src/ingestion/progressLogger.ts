import type { CyclePhase } from "../types";

export interface ProgressLoggerOptions {
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  begin: (phase: CyclePhase) => void;
  onPage: (pageSize: number, totalCount: number | null) => void;
  onFlush: (insertedCount: number) => void;
  flush: () => void;
}

export function createProgressLogger(options: ProgressLoggerOptions): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const intervalMs = Math.max(1, options.intervalMs);

  let phase: CyclePhase | null = null;
  let startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let pagesFetched = 0;
  let recordsFetched = 0;
  let insertedCount = 0;
  let flushes = 0;
  let expectedTotal: number | null = null;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();

    if (!force && currentMs - lastLoggedAtMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const recordsPerSecond = recordsFetched / elapsedSeconds;

    log(
      `ingestion progress (phase=${phase ?? "none"}, pages=${pagesFetched}, records=${recordsFetched}${expectedTotal === null ? "" : `/${expectedTotal}`}, inserted=${insertedCount}, flushes=${flushes}, rps=${recordsPerSecond.toFixed(1)})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    begin(cyclePhase: CyclePhase): void {
      phase = cyclePhase;
      startedAtMs = now();
      lastLoggedAtMs = startedAtMs;
      pagesFetched = 0;
      recordsFetched = 0;
      insertedCount = 0;
      flushes = 0;
      expectedTotal = null;
    },
    onPage(pageSize: number, totalCount: number | null): void {
      pagesFetched += 1;
      recordsFetched += pageSize;
      expectedTotal = totalCount ?? expectedTotal;
      maybeLog(false);
    },
    onFlush(batchInsertedCount: number): void {
      flushes += 1;
      insertedCount += batchInsertedCount;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}
