import { readdir, readFile } from "node:fs/promises";
import path from "node:path";

import type { ConnectionSource, Queryable } from "./queryable";

export interface MigrationFile {
  name: string;
  sql: string;
}

export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../../migrations");

const CREATE_MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  name TEXT PRIMARY KEY,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const SELECT_APPLIED_SQL = `
SELECT name
FROM schema_migrations;
`;

const INSERT_APPLIED_SQL = `
INSERT INTO schema_migrations (name)
VALUES ($1);
`;

export async function discoverMigrations(
  migrationsDir: string
): Promise<MigrationFile[]> {
  const files = await readdir(migrationsDir);
  const sqlFiles = files
    .filter((name) => name.endsWith(".sql"))
    .sort((left, right) => left.localeCompare(right, "en"));

  const migrations: MigrationFile[] = [];

  for (const fileName of sqlFiles) {
    const sql = await readFile(path.join(migrationsDir, fileName), "utf8");
    migrations.push({ name: fileName, sql });
  }

  return migrations;
}

export async function getAppliedMigrationNames(
  runner: Queryable<{ name: string }>
): Promise<Set<string>> {
  await runner.query(CREATE_MIGRATIONS_TABLE_SQL);
  const result = await runner.query(SELECT_APPLIED_SQL);
  return new Set(result.rows.map((row) => row.name));
}

export async function applyMigration(
  client: Queryable,
  migration: MigrationFile
): Promise<void> {
  await client.query("BEGIN");

  try {
    await client.query(migration.sql);
    await client.query(INSERT_APPLIED_SQL, [migration.name]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
}

/** Applies pending migrations in file-name order and returns their names. */
export async function runMigrations(
  pool: ConnectionSource<{ name: string }>,
  migrationsDir: string = DEFAULT_MIGRATIONS_DIR
): Promise<string[]> {
  const migrations = await discoverMigrations(migrationsDir);
  const client = await pool.connect();

  try {
    const appliedNames = await getAppliedMigrationNames(client);
    const newlyApplied: string[] = [];

    for (const migration of migrations) {
      if (appliedNames.has(migration.name)) {
        continue;
      }

      await applyMigration(client, migration);
      appliedNames.add(migration.name);
      newlyApplied.push(migration.name);
    }

    return newlyApplied;
  } finally {
    client.release();
  }
}
