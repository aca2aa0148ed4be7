import type Database from "better-sqlite3"
import { StoreError } from "../errors.js"

export const SCHEMA_VERSION = 5

const BASE_SCHEMA = `
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS batches (
      batch_id TEXT PRIMARY KEY,
      created_at REAL NOT NULL,
      started_at REAL,
      ended_at REAL,
      user_request TEXT NOT NULL,
      n_runs INTEGER NOT NULL,
      recipes_per_run INTEGER NOT NULL,
      status TEXT NOT NULL,
      config_json TEXT NOT NULL,
      error TEXT
    );
    CREATE TABLE IF NOT EXISTS runs (
      run_id TEXT PRIMARY KEY,
      batch_id TEXT NOT NULL,
      run_index INTEGER NOT NULL,
      created_at REAL NOT NULL,
      started_at REAL,
      ended_at REAL,
      status TEXT NOT NULL,
      error TEXT,
      FOREIGN KEY (batch_id) REFERENCES batches(batch_id) ON DELETE CASCADE
    );
    CREATE TABLE IF NOT EXISTS events (
      event_id TEXT PRIMARY KEY,
      run_id TEXT NOT NULL,
      created_at REAL NOT NULL,
      event_type TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
    );
    CREATE TABLE IF NOT EXISTS cancel_requests (
      cancel_id TEXT PRIMARY KEY,
      created_at REAL NOT NULL,
      target_type TEXT NOT NULL,
      target_id TEXT NOT NULL,
      status TEXT NOT NULL,
      reason TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_events_run_ts ON events(run_id, created_at);
    CREATE INDEX IF NOT EXISTS idx_runs_batch ON runs(batch_id, run_index);
    CREATE INDEX IF NOT EXISTS idx_runs_status_ts ON runs(status, created_at);
    CREATE INDEX IF NOT EXISTS idx_cancel_target ON cancel_requests(target_type, target_id, created_at);
`

type Migration = (db: Database.Database) => void

/** Keyed by the version being migrated from. */
const MIGRATIONS: Record<number, Migration> = {
    1: (db) => {
        db.exec(`
        CREATE TABLE IF NOT EXISTS idempotency_keys (
          key TEXT PRIMARY KEY,
          created_at REAL NOT NULL,
          request_hash TEXT NOT NULL,
          response_json TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_batches_created ON batches(created_at, batch_id);
        CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at, run_id);
      `)
    },
    2: (db) => {
        db.exec(`
        CREATE TABLE IF NOT EXISTS feedback (
          feedback_id TEXT PRIMARY KEY,
          run_id TEXT NOT NULL UNIQUE,
          created_at REAL NOT NULL,
          updated_at REAL NOT NULL,
          score REAL,
          pros TEXT NOT NULL DEFAULT '',
          cons TEXT NOT NULL DEFAULT '',
          other TEXT NOT NULL DEFAULT '',
          schema_version INTEGER NOT NULL DEFAULT 1,
          extra_json TEXT NOT NULL DEFAULT '{}',
          FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
        );
      `)
    },
    3: (db) => {
        db.exec(`
        CREATE TABLE IF NOT EXISTS rb_jobs (
          rb_job_id TEXT PRIMARY KEY,
          run_id TEXT NOT NULL,
          kind TEXT NOT NULL,
          created_at REAL NOT NULL,
          started_at REAL,
          ended_at REAL,
          status TEXT NOT NULL,
          error TEXT,
          schema_version INTEGER NOT NULL DEFAULT 1,
          extra_json TEXT NOT NULL DEFAULT '{}',
          FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
        );
        CREATE INDEX IF NOT EXISTS idx_rb_jobs_status_ts ON rb_jobs(status, created_at);
        CREATE INDEX IF NOT EXISTS idx_rb_jobs_run ON rb_jobs(run_id, created_at);
        CREATE TABLE IF NOT EXISTS rb_deltas (
          delta_id TEXT PRIMARY KEY,
          run_id TEXT NOT NULL,
          created_at REAL NOT NULL,
          status TEXT NOT NULL,
          rolled_back_at REAL,
          rolled_back_reason TEXT,
          ops_json TEXT NOT NULL,
          schema_version INTEGER NOT NULL DEFAULT 1,
          extra_json TEXT NOT NULL DEFAULT '{}',
          FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
        );
        CREATE INDEX IF NOT EXISTS idx_rb_deltas_run ON rb_deltas(run_id, created_at);
        CREATE TABLE IF NOT EXISTS mem_edit_log (
          edit_id TEXT PRIMARY KEY,
          mem_id TEXT NOT NULL,
          created_at REAL NOT NULL,
          actor TEXT NOT NULL,
          reason TEXT,
          before_json TEXT NOT NULL,
          after_json TEXT NOT NULL,
          schema_version INTEGER NOT NULL DEFAULT 1,
          extra_json TEXT NOT NULL DEFAULT '{}'
        );
        CREATE INDEX IF NOT EXISTS idx_mem_edit_log_mem ON mem_edit_log(mem_id, created_at);
      `)
    },
    4: (db) => {
        db.exec(`
        CREATE TABLE IF NOT EXISTS mem_index (
          mem_id TEXT PRIMARY KEY,
          created_at REAL NOT NULL,
          updated_at REAL NOT NULL,
          status TEXT NOT NULL,
          role TEXT NOT NULL,
          type TEXT NOT NULL,
          source_run_id TEXT,
          schema_version INTEGER NOT NULL DEFAULT 1
        );
        CREATE INDEX IF NOT EXISTS idx_mem_index_updated ON mem_index(updated_at, mem_id);
      `)
    },
}

export function readSchemaVersion(db: Database.Database): number {
    const row = db
        .prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?")
        .get("schema_version")
    const parsed = Number(row?.value)
    return Number.isInteger(parsed) ? parsed : 0
}

function writeSchemaVersion(db: Database.Database, version: number) {
    db.prepare(
        `INSERT INTO meta(key, value) VALUES('schema_version', @value)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
    ).run({ value: String(version) })
}

/**
 * Creates the v1 tables on a fresh database, then applies forward-only steps
 * up to SCHEMA_VERSION inside one transaction.
 */
export function migrate(db: Database.Database) {
    db.exec(BASE_SCHEMA)
    db.prepare("INSERT OR IGNORE INTO meta(key, value) VALUES('schema_version', '1')").run()

    const current = readSchemaVersion(db)
    if (current === SCHEMA_VERSION) return
    if (current > SCHEMA_VERSION) {
        throw new StoreError(
            `DB schema_version=${current} is newer than this build supports (${SCHEMA_VERSION}).`,
        )
    }

    db.transaction(() => {
        for (let version = current; version < SCHEMA_VERSION; version += 1) {
            const step = MIGRATIONS[version]
            if (!step) {
                throw new StoreError(
                    `Missing migration step for schema_version=${version} -> ${version + 1}`,
                )
            }
            step(db)
            writeSchemaVersion(db, version + 1)
        }
    }).immediate()
}
