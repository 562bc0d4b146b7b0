import { loadConfig } from "../config";
import {
  BOOTSTRAP_DONE_KEY,
  LAST_POLLED_END_KEY,
  createCursorStore
} from "../db/cursorStore";
import { createPool } from "../db/pool";

// Out-of-band reset for when the service is down. A running service should
// be reset through POST /admin/reset-cursor so the reset queues behind any
// in-flight cycle.
async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);

  try {
    await createCursorStore(pool).delete([LAST_POLLED_END_KEY, BOOTSTRAP_DONE_KEY]);
    console.log("ingestion cursor reset; next cycle re-runs backfill");
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error("cursor reset failed", error);
  process.exit(1);
});
