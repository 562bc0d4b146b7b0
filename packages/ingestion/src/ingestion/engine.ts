import type { CredentialProvider } from "../api/credentials";
import {
  BOOTSTRAP_DONE_KEY,
  LAST_POLLED_END_KEY,
  readCursorState,
  type CursorStore
} from "../db/cursorStore";
import type { RecordStore } from "../db/recordStore";
import { describeError, FetchError } from "../errors";
import type {
  CursorState,
  CyclePhase,
  CycleResult,
  EngineState,
  IngestionWindow,
  SearchLogRecord
} from "../types";
import type { Fetcher } from "./fetcher";

const MS_PER_SECOND = 1000;
const MS_PER_DAY = 86_400_000;

export interface IngestionEngineHooks {
  onCycleStart?: (phase: CyclePhase, window: IngestionWindow) => void;
  onFlush?: (details: {
    batchSize: number;
    insertedCount: number;
    flushNumber: number;
  }) => void;
  onCycleEnd?: (result: CycleResult) => void;
  onCycleError?: (error: unknown, phase: CyclePhase | null) => void;
}

export interface IngestionEngineOptions {
  credentials: CredentialProvider;
  fetcher: Fetcher;
  cursorStore: CursorStore;
  recordStore: RecordStore;
  backfillDays: number;
  overlapSeconds: number;
  writeBatchSize: number;
  now?: () => number;
  log?: (message: string) => void;
  hooks?: IngestionEngineHooks;
}

export interface LastCycleOutcome {
  ok: boolean;
  phase: CyclePhase | null;
  startedAt: string;
  finishedAt: string;
  window: { start: string; end: string } | null;
  recordsFetched: number;
  insertedCount: number;
  error: string | null;
}

export interface IngestionEngine {
  runCycle: () => Promise<CycleResult>;
  reset: () => Promise<void>;
  getState: () => Promise<EngineState>;
  getLastCycle: () => LastCycleOutcome | null;
}

export function computeBackfillWindow(
  nowMs: number,
  backfillDays: number,
  overlapSeconds: number
): IngestionWindow {
  return {
    start: new Date(nowMs - backfillDays * MS_PER_DAY),
    end: new Date(nowMs - overlapSeconds * MS_PER_SECOND)
  };
}

export function computeDeltaWindow(
  lastPolledEndUtc: Date | null,
  nowMs: number,
  overlapSeconds: number
): IngestionWindow {
  const anchorMs = lastPolledEndUtc ? lastPolledEndUtc.getTime() : nowMs;

  return {
    start: new Date(anchorMs - overlapSeconds * MS_PER_SECOND),
    end: new Date(nowMs)
  };
}

function toIsoWindow(window: IngestionWindow): { start: string; end: string } {
  return { start: window.start.toISOString(), end: window.end.toISOString() };
}

/**
 * Drives backfill and delta polling. The engine is the only writer of the
 * cursor and of ingested rows: a cycle writes its whole window inside one
 * store transaction, commits it once the fetch has finished, and only then
 * moves the cursor, so an aborted cycle leaves the persisted state exactly
 * as it found it. Cycles and resets run one at a
 * time in call order.
 */
export function createIngestionEngine(options: IngestionEngineOptions): IngestionEngine {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.log;
  const batchSize = Math.max(1, options.writeBatchSize);

  let tail: Promise<void> = Promise.resolve();
  let backfillInProgress = false;
  let lastCycle: LastCycleOutcome | null = null;

  const serialize = <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task);
    tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  const ingestWindow = async (
    phase: CyclePhase,
    window: IngestionWindow,
    state: CursorState
  ): Promise<CycleResult> => {
    if (window.end.getTime() <= window.start.getTime()) {
      log(
        `poll cycle skipped: empty window (phase=${phase}, start=${window.start.toISOString()}, end=${window.end.toISOString()})`
      );
      return {
        phase,
        window,
        skipped: true,
        recordsFetched: 0,
        insertedCount: 0,
        flushes: 0,
        cursor: state.lastPolledEndUtc
      };
    }

    // Fail fast on rejected credentials before opening a transaction.
    await options.credentials.acquireToken();

    const writer = await options.recordStore.beginWindow();

    let buffer: SearchLogRecord[] = [];
    let recordsFetched = 0;
    let insertedCount = 0;
    let flushes = 0;

    const flush = async (): Promise<void> => {
      if (buffer.length === 0) {
        return;
      }

      const batch = buffer;
      buffer = [];

      const inserted = await writer.insert(batch);
      insertedCount += inserted;
      flushes += 1;

      options.hooks?.onFlush?.({
        batchSize: batch.length,
        insertedCount: inserted,
        flushNumber: flushes
      });
    };

    try {
      for await (const record of options.fetcher.fetchWindow(window, options.credentials)) {
        buffer.push(record);
        recordsFetched += 1;

        if (buffer.length >= batchSize) {
          await flush();
        }
      }

      await flush();
    } catch (error) {
      await writer.rollback().catch((rollbackError: unknown) => {
        log(`window rollback failed (${describeError(rollbackError)})`);
      });
      throw error;
    }

    await writer.commit();

    // Never move the cursor backwards, even if the clock did.
    const priorMs = state.lastPolledEndUtc?.getTime() ?? Number.NEGATIVE_INFINITY;
    const cursor = new Date(Math.max(priorMs, window.end.getTime()));

    if (phase === "backfill") {
      await options.cursorStore.setMany({
        [LAST_POLLED_END_KEY]: cursor.toISOString(),
        [BOOTSTRAP_DONE_KEY]: "true"
      });
    } else {
      await options.cursorStore.set(LAST_POLLED_END_KEY, cursor.toISOString());
    }

    return {
      phase,
      window,
      skipped: false,
      recordsFetched,
      insertedCount,
      flushes,
      cursor
    };
  };

  const executeCycle = async (): Promise<CycleResult> => {
    const startedAtMs = now();
    let phase: CyclePhase | null = null;
    let window: IngestionWindow | null = null;

    try {
      const state = await readCursorState(options.cursorStore);
      phase = state.bootstrapDone ? "delta" : "backfill";
      window =
        phase === "backfill"
          ? computeBackfillWindow(startedAtMs, options.backfillDays, options.overlapSeconds)
          : computeDeltaWindow(state.lastPolledEndUtc, startedAtMs, options.overlapSeconds);

      if (phase === "backfill") {
        backfillInProgress = true;
      }

      log(
        `poll cycle started (phase=${phase}, start=${window.start.toISOString()}, end=${window.end.toISOString()})`
      );
      options.hooks?.onCycleStart?.(phase, window);

      const result = await ingestWindow(phase, window, state);

      if (phase === "backfill" && !result.skipped) {
        backfillInProgress = false;
      }

      lastCycle = {
        ok: true,
        phase,
        startedAt: new Date(startedAtMs).toISOString(),
        finishedAt: new Date(now()).toISOString(),
        window: toIsoWindow(window),
        recordsFetched: result.recordsFetched,
        insertedCount: result.insertedCount,
        error: null
      };

      options.hooks?.onCycleEnd?.(result);
      log(
        `poll cycle complete (phase=${phase}, fetched=${result.recordsFetched}, inserted=${result.insertedCount}, flushes=${result.flushes}, cursor=${result.cursor?.toISOString() ?? "null"})`
      );

      return result;
    } catch (error) {
      if (error instanceof FetchError && error.status === 401) {
        options.credentials.invalidate();
      }

      lastCycle = {
        ok: false,
        phase,
        startedAt: new Date(startedAtMs).toISOString(),
        finishedAt: new Date(now()).toISOString(),
        window: window ? toIsoWindow(window) : null,
        recordsFetched: 0,
        insertedCount: 0,
        error: describeError(error)
      };

      options.hooks?.onCycleError?.(error, phase);
      throw error;
    }
  };

  return {
    runCycle(): Promise<CycleResult> {
      return serialize(executeCycle);
    },
    reset(): Promise<void> {
      return serialize(async () => {
        await options.cursorStore.delete([LAST_POLLED_END_KEY, BOOTSTRAP_DONE_KEY]);
        backfillInProgress = false;
        log("ingestion cursor reset; next cycle re-runs backfill");
      });
    },
    async getState(): Promise<EngineState> {
      const state = await readCursorState(options.cursorStore);

      if (state.bootstrapDone) {
        return "STEADY_POLLING";
      }

      return backfillInProgress ? "BACKFILLING" : "UNINITIALIZED";
    },
    getLastCycle(): LastCycleOutcome | null {
      return lastCycle;
    }
  };
}
