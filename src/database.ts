// ============================================================================
// Workbench MCP Server - Database Layer (better-sqlite3 - native, WAL mode)
// ============================================================================

import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { errnoCode } from "./errors.js";
import { log } from "./logger.js";
import { runMigrations } from "./migrations.js";

const IN_MEMORY = ":memory:";
const CORRUPTION_CODES = new Set(["SQLITE_CORRUPT", "SQLITE_NOTADB"]);

/**
 * Open the task store. busy_timeout is set before any other pragma so a
 * second process holding the file makes us wait instead of failing with
 * SQLITE_BUSY. A corrupt file is renamed to a timestamped backup and a fresh
 * database is created in its place.
 */
function openWithRecovery(dbPath: string): DatabaseType {
  const db = new Database(dbPath);
  try {
    db.pragma("busy_timeout = 5000");
    db.pragma("journal_mode = WAL");
    return db;
  } catch (err: unknown) {
    db.close();
    // A locked-but-healthy database is not corrupt.
    if (!CORRUPTION_CODES.has(errnoCode(err))) throw err;
  }

  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  const backupPath = `${dbPath}.corrupt.${ts}.bak`;
  fs.renameSync(dbPath, backupPath);
  log.warn(`Task database was corrupt - renamed to ${backupPath}, starting fresh.`);

  const fresh = new Database(dbPath);
  fresh.pragma("busy_timeout = 5000");
  fresh.pragma("journal_mode = WAL");
  return fresh;
}

/**
 * Open (creating if needed) the SQLite file at `dbPath` and bring its schema
 * up to date. better-sqlite3 is synchronous throughout.
 */
export function openDatabase(dbPath: string): DatabaseType {
  let db: DatabaseType;
  if (dbPath === IN_MEMORY) {
    db = new Database(IN_MEMORY);
  } else {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    db = openWithRecovery(dbPath);
    db.pragma("synchronous = NORMAL");
  }
  db.pragma("foreign_keys = ON");

  runMigrations(db);
  return db;
}
