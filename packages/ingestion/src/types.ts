export interface SearchLogRecord {
  createTime: string;
  emailAddr: string;
  source: string | null;
  searchText: string | null;
  searchReason: string | null;
  description: string | null;
  museQuery: string | null;
  searchPath: string | null;
  isAdmin: boolean | null;
  raw: Record<string, unknown>;
}

export interface SearchLogPage {
  records: SearchLogRecord[];
  nextPageToken: string | null;
  totalCount: number | null;
}

export interface IngestionWindow {
  start: Date;
  end: Date;
}

export interface AccessToken {
  value: string;
  expiresAtMs: number;
}

export interface CursorState {
  lastPolledEndUtc: Date | null;
  bootstrapDone: boolean;
}

export type EngineState = "UNINITIALIZED" | "BACKFILLING" | "STEADY_POLLING";

export type CyclePhase = "backfill" | "delta";

export interface CycleResult {
  phase: CyclePhase;
  window: IngestionWindow;
  skipped: boolean;
  recordsFetched: number;
  insertedCount: number;
  flushes: number;
  cursor: Date | null;
}

export interface IngestionConfig {
  databaseUrl: string;
  tokenUrl: string;
  apiBaseUrl: string;
  clientId: string;
  clientSecret: string;
  apiPageSize: number;
  apiTimeoutMs: number;
  apiMaxRetries: number;
  apiRetryBaseMs: number;
  apiRetryMaxMs: number;
  tokenRefreshSkewMs: number;
  backfillDays: number;
  pollIntervalSeconds: number;
  overlapSeconds: number;
  writeBatchSize: number;
  progressLogIntervalMs: number;
  httpPort: number;
  defaultDays: number;
  adminToken: string | null;
  logLevel: string;
}
