import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export const NOTES_TABLE = "notes";
export const VAULT_ITEMS_TABLE = "vault_items";
export const SYNC_STATE_TABLE = "sync_state";

export type LocalDb = Database.Database;

export interface Migration {
  version: number;
  name: string;
  up: string;
}

// Append only. `syncedAt` holds the updatedAt of the last version the remote
// has seen; a row is dirty whenever the two differ.
export const migrations: Migration[] = [
  {
    version: 1,
    name: "initial_schema",
    up: `
      CREATE TABLE ${NOTES_TABLE} (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        tags TEXT NOT NULL DEFAULT '[]',
        updatedAt TEXT NOT NULL,
        deletedAt TEXT,
        syncedAt TEXT
      );

      CREATE TABLE ${VAULT_ITEMS_TABLE} (
        id TEXT PRIMARY KEY,
        titleEnc TEXT NOT NULL,
        usernameEnc TEXT,
        secretEnc TEXT,
        urlEnc TEXT,
        noteEnc TEXT,
        updatedAt TEXT NOT NULL,
        deletedAt TEXT,
        syncedAt TEXT
      );

      CREATE TABLE ${SYNC_STATE_TABLE} (
        collection TEXT PRIMARY KEY,
        pushCursor TEXT,
        pullCursor TEXT
      );

      CREATE INDEX idx_notes_updated ON ${NOTES_TABLE}(updatedAt);
      CREATE INDEX idx_notes_deleted ON ${NOTES_TABLE}(deletedAt);
      CREATE INDEX idx_vault_items_updated ON ${VAULT_ITEMS_TABLE}(updatedAt);
      CREATE INDEX idx_vault_items_deleted ON ${VAULT_ITEMS_TABLE}(deletedAt);
    `,
  },
];

function ensureMigrationsTable(db: LocalDb): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

export function getSchemaVersion(db: LocalDb): number {
  ensureMigrationsTable(db);
  const row = db
    .prepare<[], { version: number | null }>(
      "SELECT MAX(version) AS version FROM schema_migrations",
    )
    .get();
  return row?.version ?? 0;
}

/** Each pending migration runs in its own transaction. Returns how many ran. */
export function migrate(db: LocalDb): number {
  const currentVersion = getSchemaVersion(db);
  const pending = migrations.filter((m) => m.version > currentVersion);
  if (pending.length === 0) return 0;

  const insertMigration = db.prepare<[number, string]>(
    "INSERT INTO schema_migrations (version, name) VALUES (?, ?)",
  );
  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.up);
      insertMigration.run(migration.version, migration.name);
    })();
  }
  return pending.length;
}

/**
 * Opens (creating if needed) and migrates the local database.
 * Pass ":memory:" for a throwaway database.
 */
export function openLocalDb(dbPath: string): LocalDb {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  migrate(db);
  return db;
}
