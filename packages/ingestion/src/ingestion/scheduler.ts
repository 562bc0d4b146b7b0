import { describeError } from "../errors";

export interface PollSchedulerOptions<T> {
  intervalMs: number;
  runCycle: () => Promise<T>;
  onError?: (error: unknown) => void;
  log?: (message: string) => void;
}

export interface PollScheduler<T> {
  readonly isRunning: boolean;
  readonly isCycleInFlight: boolean;
  start: () => void;
  stop: () => Promise<void>;
  runOnce: () => Promise<T | null>;
}

/**
 * Runs `runCycle` once on start and then on every interval tick. A tick that
 * fires while a cycle is still in flight is skipped, so cycles never overlap.
 * Cycle failures are reported and never escape the timer.
 */
export function createPollScheduler<T>(
  options: PollSchedulerOptions<T>
): PollScheduler<T> {
  const log = options.log ?? console.log;
  const onError =
    options.onError ??
    ((error: unknown) => {
      console.error(`poll cycle failed (${describeError(error)})`, error);
    });

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<T | null> | null = null;
  let skippedTicks = 0;

  const execute = (): Promise<T | null> => {
    const run = options.runCycle().then(
      (result) => result,
      (error: unknown) => {
        onError(error);
        return null;
      }
    );

    inFlight = run;
    void run.finally(() => {
      if (inFlight === run) {
        inFlight = null;
      }
    });

    return run;
  };

  const tick = (): void => {
    if (inFlight !== null) {
      skippedTicks += 1;
      log(`poll tick skipped: previous cycle still running (skipped=${skippedTicks})`);
      return;
    }

    void execute();
  };

  return {
    get isRunning(): boolean {
      return timer !== null;
    },
    get isCycleInFlight(): boolean {
      return inFlight !== null;
    },
    start(): void {
      if (timer !== null) {
        return;
      }

      timer = setInterval(tick, Math.max(1, options.intervalMs));
      log(`scheduler started (intervalMs=${options.intervalMs})`);
      tick();
    },
    async stop(): Promise<void> {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }

      if (inFlight !== null) {
        await inFlight;
      }
    },
    runOnce(): Promise<T | null> {
      return inFlight ?? execute();
    }
  };
}
