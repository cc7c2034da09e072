/**
 * Giveaway Bot — src/db/ensure.ts
 * WHAT: On-start schema self-heal for the giveaway tables.
 * WHY: We run on existing data without migrations tooling; CREATE IF NOT EXISTS plus
 *      additive ALTERs keep older databases working.
 * FLOWS:
 *  - create tables → PRAGMA table_info → ALTER missing columns → indexes
 * DOCS:
 *  - SQLite PRAGMA table_info: https://sqlite.org/pragma.html#pragma_table_info
 *  - SQLite ALTER TABLE: https://sqlite.org/lang_altertable.html
 *
 * NOTE: Small, synchronous queries only. No awaits; better-sqlite3 is sync.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Db } from "./db.js";
import { logger } from "../lib/logger.js";

/**
 * Columns added after the first release. A database created by an older build
 * gets them via ALTER; a fresh one gets them from CREATE TABLE.
 */
const GIVEAWAY_ADDED_COLUMNS: ReadonlyArray<[name: string, ddl: string]> = [
  ["guild_id", "guild_id TEXT"],
  ["title", "title TEXT NOT NULL DEFAULT ''"],
  ["sponsor", "sponsor TEXT NOT NULL DEFAULT ''"],
  ["outcome", "outcome TEXT"],
  ["ended_at", "ended_at INTEGER"],
  ["announced", "announced INTEGER NOT NULL DEFAULT 0"],
  ["created_at", "created_at INTEGER NOT NULL DEFAULT 0"],
];

const PARTICIPANT_ADDED_COLUMNS: ReadonlyArray<[name: string, ddl: string]> = [
  ["joined_at", "joined_at INTEGER NOT NULL DEFAULT 0"],
];

function columnNames(db: Db, table: string): Set<string> {
  const names = new Set<string>();
  // PRAGMA table_info introspects column names; no schema change here
  for (const col of db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all()) {
    names.add(col.name);
  }
  return names;
}

/** @returns the names of the columns it added */
function addMissingColumns(
  db: Db,
  table: string,
  columns: ReadonlyArray<[name: string, ddl: string]>
): Set<string> {
  const existing = columnNames(db, table);
  const added = new Set<string>();
  for (const [name, ddl] of columns) {
    if (existing.has(name)) continue;
    logger.info({ evt: "schema_add_column", table, column: name }, `[ensure] adding ${table}.${name} column`);
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${ddl}`);
    added.add(name);
  }
  return added;
}

export function ensureGiveawaySchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS giveaways (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      message_id TEXT,
      channel_id TEXT NOT NULL,
      guild_id TEXT,
      title TEXT NOT NULL DEFAULT '',
      sponsor TEXT NOT NULL DEFAULT '',
      end_time INTEGER NOT NULL,
      prize TEXT NOT NULL,
      winners_count INTEGER NOT NULL CHECK (winners_count >= 1),
      host_id TEXT NOT NULL,
      ended INTEGER NOT NULL DEFAULT 0,
      outcome TEXT CHECK (outcome IN ('winners', 'insufficient_participants')),
      ended_at INTEGER,
      announced INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS participants (
      giveaway_id INTEGER NOT NULL REFERENCES giveaways(id),
      user_id TEXT NOT NULL,
      joined_at INTEGER NOT NULL DEFAULT 0,
      UNIQUE (giveaway_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS giveaway_winners (
      giveaway_id INTEGER NOT NULL REFERENCES giveaways(id),
      user_id TEXT NOT NULL,
      position INTEGER NOT NULL,
      PRIMARY KEY (giveaway_id, user_id)
    );
  `);

  const addedGiveawayColumns = addMissingColumns(db, "giveaways", GIVEAWAY_ADDED_COLUMNS);
  if (addedGiveawayColumns.has("announced")) {
    // Older builds edited the result in the same step as closing; their ended rows are done
    const backfilled = db.prepare(`UPDATE giveaways SET announced = ended`).run();
    logger.info(
      { evt: "schema_backfill_announced", rows: backfilled.changes },
      "[ensure] marked closed legacy giveaways as announced"
    );
  }
  addMissingColumns(db, "participants", PARTICIPANT_ADDED_COLUMNS);

  // ON CONFLICT (giveaway_id, user_id) needs this even on tables created before the UNIQUE clause
  db.exec(`CREATE UNIQUE INDEX IF NOT EXISTS ux_participants_entry ON participants(giveaway_id, user_id)`);
  // Scanner hot path: open giveaways ordered by deadline
  db.exec(`CREATE INDEX IF NOT EXISTS idx_giveaways_open_end ON giveaways(ended, end_time)`);
  logger.debug({ evt: "schema_ready" }, "[ensure] giveaway schema ready");
}
