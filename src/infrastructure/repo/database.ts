import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { JOB_STAGES } from "../../domain/types";

const SCHEMA_VERSION = 1;

const stageList = JOB_STAGES.map((stage) => `'${stage}'`).join(", ");

const MIGRATIONS: Record<number, string> = {
  1: `
    CREATE TABLE IF NOT EXISTS jobs (
      id TEXT PRIMARY KEY,
      stage TEXT NOT NULL CHECK (stage IN (${stageList})),
      failure_stage TEXT CHECK (failure_stage IS NULL OR failure_stage IN (${stageList})),
      last_error TEXT,
      attempt_count INTEGER NOT NULL DEFAULT 0,
      payload TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL,
      available_at INTEGER NOT NULL,
      lease_holder TEXT,
      lease_expires_at INTEGER,
      CHECK ((stage = 'FAILED') = (failure_stage IS NOT NULL))
    ) STRICT;

    CREATE INDEX IF NOT EXISTS idx_jobs_runnable ON jobs (stage, available_at, updated_at);

    CREATE TABLE IF NOT EXISTS job_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      job_id TEXT NOT NULL REFERENCES jobs (id),
      at INTEGER NOT NULL,
      type TEXT NOT NULL,
      from_stage TEXT,
      to_stage TEXT NOT NULL,
      detail TEXT
    ) STRICT;

    CREATE INDEX IF NOT EXISTS idx_job_events_job ON job_events (job_id, id);
  `
};

/**
 * Opens the pipeline database and brings its schema up to date.
 *
 * `synchronous = FULL` makes every committed transaction durable before
 * better-sqlite3 returns, so a resolved store call survives a crash.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = FULL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  runMigrations(db);
  return db;
}

function runMigrations(db: Database.Database) {
  const migrate = db.transaction(() => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER PRIMARY KEY,
        applied_at TEXT DEFAULT CURRENT_TIMESTAMP
      ) STRICT
    `);
    const row = db
      .prepare<[], { version: number }>("SELECT version FROM schema_version ORDER BY version DESC LIMIT 1")
      .get();
    const current = row?.version ?? 0;
    for (let version = current + 1; version <= SCHEMA_VERSION; version += 1) {
      db.exec(MIGRATIONS[version]);
      db.prepare<[number]>("INSERT INTO schema_version (version) VALUES (?)").run(version);
    }
  });
  migrate.immediate();
}
