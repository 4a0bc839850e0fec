// ============================================================================
// Workbench MCP Server - Schema Migration System
// ============================================================================

import type { Database as DatabaseType } from "better-sqlite3";
import { log } from "./logger.js";

interface Migration {
  version: number;
  description: string;
  up: (db: DatabaseType) => void;
}

// ─── Migration Definitions ───────────────────────────────────────────

const migrations: Migration[] = [
  // ─── V1: Baseline Schema ───────────────────────────────────────────
  {
    version: 1,
    description: "Baseline schema - tasks",
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS tasks (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL UNIQUE,
          description TEXT,
          status TEXT NOT NULL CHECK (status IN ('complete', 'not complete')),
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_tasks_name ON tasks(name);
        CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
      `);
    },
  },
];

// ─── Migration Runner ────────────────────────────────────────────────

export function runMigrations(db: DatabaseType): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_meta (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);

  const currentVersion = getCurrentSchemaVersion(db);
  const pendingMigrations = migrations.filter(m => m.version > currentVersion);

  if (pendingMigrations.length === 0) {
    return;
  }

  const target = pendingMigrations[pendingMigrations.length - 1].version;
  log.info(`Running ${pendingMigrations.length} migration(s) from v${currentVersion} → v${target}`);

  for (const migration of pendingMigrations) {
    log.info(`  v${migration.version}: ${migration.description}`);

    const runMigration = db.transaction(() => {
      migration.up(db);
      db.prepare(
        "INSERT OR REPLACE INTO schema_meta (key, value) VALUES ('version', ?)"
      ).run(String(migration.version));
    });

    runMigration();
  }

  log.info(`Migrations complete. Schema at v${target}`);
}

export function getCurrentSchemaVersion(db: DatabaseType): number {
  try {
    const row = db.prepare("SELECT value FROM schema_meta WHERE key = 'version'").get() as { value: string } | undefined;
    return row ? parseInt(row.value, 10) : 0;
  } catch {
    return 0;
  }
}
