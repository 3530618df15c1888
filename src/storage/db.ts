import Database from "better-sqlite3";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS vector_records (
  channel_id   TEXT NOT NULL,
  message_id   TEXT NOT NULL,
  content      TEXT NOT NULL,
  author       TEXT,
  embedding    TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  timestamp    INTEGER NOT NULL,
  indexed_at   INTEGER NOT NULL,
  PRIMARY KEY (channel_id, message_id)
);
CREATE INDEX IF NOT EXISTS idx_vector_records_channel_ts
  ON vector_records(channel_id, timestamp);

CREATE TABLE IF NOT EXISTS embedding_cache (
  hash        TEXT PRIMARY KEY,
  model       TEXT NOT NULL,
  embedding   TEXT NOT NULL,
  created_at  INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS scheduled_tasks (
  id            TEXT PRIMARY KEY,
  kind          TEXT NOT NULL CHECK(kind IN ('reminder','recurring-message')),
  trigger_at    INTEGER,
  cron          TEXT,
  timezone      TEXT,
  payload       TEXT NOT NULL,
  status        TEXT NOT NULL CHECK(status IN ('active','completed','cancelled','failed')),
  next_fire_at  INTEGER,
  last_fired_at INTEGER,
  attempts      INTEGER NOT NULL DEFAULT 0,
  last_error    TEXT,
  created_by    TEXT,
  created_at    INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_scheduled_tasks_due
  ON scheduled_tasks(next_fire_at) WHERE status = 'active';

CREATE TABLE IF NOT EXISTS task_firings (
  task_id         TEXT NOT NULL,
  trigger_instant INTEGER NOT NULL,
  status          TEXT NOT NULL CHECK(status IN ('claimed','delivered','interrupted')),
  claimed_at      INTEGER NOT NULL,
  settled_at      INTEGER,
  PRIMARY KEY (task_id, trigger_instant)
);

CREATE TABLE IF NOT EXISTS tool_audit (
  id              INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp       INTEGER NOT NULL,
  conversation_id TEXT,
  tool            TEXT NOT NULL,
  args            TEXT,
  success         INTEGER NOT NULL,
  error           TEXT,
  duration_ms     INTEGER
);
CREATE INDEX IF NOT EXISTS idx_tool_audit_timestamp ON tool_audit(timestamp);
`;

type Migration = (db: Database.Database) => void;

// Index n upgrades a database at user_version n to n + 1.
const MIGRATIONS: readonly Migration[] = [
  (db) => {
    db.exec(SCHEMA_SQL);
  },
];

export class StorageDB {
  private db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  /** Forward-only migrations keyed by `PRAGMA user_version`. */
  private migrate(): void {
    const current = Number(this.db.pragma("user_version", { simple: true }));
    for (let version = current; version < MIGRATIONS.length; version++) {
      const step = MIGRATIONS[version];
      if (!step) break;
      this.db.transaction(() => {
        step(this.db);
        this.db.pragma(`user_version = ${version + 1}`);
      })();
    }
  }

  schemaVersion(): number {
    return Number(this.db.pragma("user_version", { simple: true }));
  }

  raw(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
