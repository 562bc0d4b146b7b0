import { createCredentialProvider } from "./api/credentials";
import { createSearchLogClient } from "./api/searchLogClient";
import { loadConfig } from "./config";
import { createCursorStore, readCursorState } from "./db/cursorStore";
import { runMigrations } from "./db/migrations";
import { createPool, pingDatabase } from "./db/pool";
import { createRecordStore } from "./db/recordStore";
import { createSearchLogReader } from "./db/searchLogQueries";
import { createIngestionEngine } from "./ingestion/engine";
import { createFetcher } from "./ingestion/fetcher";
import { createProgressLogger } from "./ingestion/progressLogger";
import { createPollScheduler } from "./ingestion/scheduler";
import { closeServer, createHttpServer, listen } from "./server/httpServer";
import { createRouter } from "./server/routes";

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);
  const debug = config.logLevel === "debug";

  const applied = await runMigrations(pool);
  console.log(
    `search log ingestion starting (migrationsApplied=${applied.length}, backfillDays=${config.backfillDays}, pollIntervalSeconds=${config.pollIntervalSeconds}, overlapSeconds=${config.overlapSeconds})`
  );

  const cursorStore = createCursorStore(pool);
  const resumeState = await readCursorState(cursorStore);
  console.log(
    `resume state loaded (bootstrapDone=${resumeState.bootstrapDone}, lastPolledEnd=${resumeState.lastPolledEndUtc?.toISOString() ?? "null"})`
  );

  const progressLogger = createProgressLogger({
    intervalMs: config.progressLogIntervalMs
  });

  const fetcher = createFetcher(createSearchLogClient(config), {
    onPage(page, pageNumber) {
      progressLogger.onPage(page.records.length, page.totalCount);
      if (debug) {
        console.log(
          `page fetched (page=${pageNumber}, size=${page.records.length}, totalCount=${page.totalCount ?? "null"}, hasNext=${page.nextPageToken !== null})`
        );
      }
    }
  });

  const engine = createIngestionEngine({
    credentials: createCredentialProvider(config),
    fetcher,
    cursorStore,
    recordStore: createRecordStore(pool),
    backfillDays: config.backfillDays,
    overlapSeconds: config.overlapSeconds,
    writeBatchSize: config.writeBatchSize,
    hooks: {
      onCycleStart(phase) {
        progressLogger.begin(phase);
      },
      onFlush(details) {
        progressLogger.onFlush(details.insertedCount);
        if (debug) {
          console.log(
            `batch flushed (flush=${details.flushNumber}, batchSize=${details.batchSize}, inserted=${details.insertedCount})`
          );
        }
      },
      onCycleEnd() {
        progressLogger.flush();
      },
      onCycleError(_error, phase) {
        if (phase !== null) {
          progressLogger.flush();
        }
      }
    }
  });

  const scheduler = createPollScheduler({
    intervalMs: config.pollIntervalSeconds * 1000,
    runCycle: engine.runCycle
  });

  const server = createHttpServer(
    createRouter({
      engine,
      reader: createSearchLogReader(pool),
      isStoreReachable: () => pingDatabase(pool),
      defaultDays: config.defaultDays,
      adminToken: config.adminToken
    })
  );

  await listen(server, config.httpPort);
  console.log(`read api listening (port=${config.httpPort})`);

  scheduler.start();

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`shutdown requested (signal=${signal})`);
    await closeServer(server);
    await scheduler.stop();
    await pool.end();
    console.log("shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("shutdown failed", error);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((error: unknown) => {
  console.error("search log ingestion failed to start", error);
  process.exit(1);
});
