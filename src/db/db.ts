/**
 * Giveaway Bot — src/db/db.ts
 * WHAT: SQLite connection bootstrap.
 * WHY: Centralizes better-sqlite3 setup and PRAGMAs; the handle is passed to the store
 *      by index.ts rather than imported as a module singleton.
 * DOCS:
 *  - better-sqlite3 API: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 *  - SQLite PRAGMA: https://sqlite.org/pragma.html
 *
 * NOTE: better-sqlite3 is synchronous by design; keep statements small and quick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

const DB_BUSY_TIMEOUT_MS = 5000;

export type Db = Database.Database;

/**
 * Open (creating if needed) the database at `dbPath` and apply connection PRAGMAs.
 * ":memory:" is accepted for tests.
 */
export function openDatabase(dbPath: string): Db {
  const inMemory = dbPath === ":memory:";
  if (!inMemory) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, { fileMustExist: false });
  // WAL is meaningless for :memory: and sqlite answers "memory" anyway
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  // participants/winners reference giveaways
  db.pragma("foreign_keys = ON");
  // Fail-soft during brief contention rather than throwing SQLITE_BUSY immediately
  db.pragma(`busy_timeout = ${DB_BUSY_TIMEOUT_MS}`);
  logger.info({ evt: "db_open", dbPath }, "[db] SQLite opened");
  return db;
}

/** Close the handle on shutdown. Safe to call twice. */
export function closeDatabase(db: Db): void {
  if (!db.open) return;
  try {
    db.close();
    logger.info({ evt: "db_close" }, "[db] SQLite closed");
  } catch (err) {
    logger.error({ evt: "db_close_error", err }, "[db] failed to close SQLite");
  }
}
