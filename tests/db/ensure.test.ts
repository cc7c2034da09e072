/**
 * Giveaway Bot — tests/db/ensure.test.ts
 * WHAT: Schema creation and self-heal of databases made by older builds.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  redact: (value: string) => value,
}));

import { openDatabase, type Db } from "../../src/db/db.js";
import { ensureGiveawaySchema } from "../../src/db/ensure.js";
import { GiveawayStore } from "../../src/features/giveaway/store.js";
import { GiveawayEngine } from "../../src/features/giveaway/engine.js";
import { GiveawayScanner } from "../../src/scheduler/giveawayScanner.js";
import { logger } from "../../src/lib/logger.js";
import { FakePresenter, TestClock } from "../utils/giveawayHarness.js";

const LEGACY_SCHEMA = `
  CREATE TABLE giveaways (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    message_id TEXT,
    channel_id TEXT NOT NULL,
    end_time INTEGER NOT NULL,
    prize TEXT NOT NULL,
    winners_count INTEGER NOT NULL,
    host_id TEXT NOT NULL,
    ended INTEGER NOT NULL DEFAULT 0
  );
  CREATE TABLE participants (
    giveaway_id INTEGER NOT NULL,
    user_id TEXT NOT NULL
  );
`;

function columns(db: Db, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
    .map((c) => c.name);
}

function indexes(db: Db, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`PRAGMA index_list(${table})`)
    .all()
    .map((i) => i.name);
}

describe("ensureGiveawaySchema", () => {
  it("creates all three tables on an empty database", () => {
    const db = openDatabase(":memory:");
    ensureGiveawaySchema(db);

    expect(columns(db, "giveaways")).toEqual([
      "id",
      "message_id",
      "channel_id",
      "guild_id",
      "title",
      "sponsor",
      "end_time",
      "prize",
      "winners_count",
      "host_id",
      "ended",
      "outcome",
      "ended_at",
      "announced",
      "created_at",
    ]);
    expect(columns(db, "participants")).toEqual(["giveaway_id", "user_id", "joined_at"]);
    expect(columns(db, "giveaway_winners")).toEqual(["giveaway_id", "user_id", "position"]);
    expect(indexes(db, "giveaways")).toContain("idx_giveaways_open_end");
    expect(indexes(db, "participants")).toContain("ux_participants_entry");
  });

  it("is idempotent", () => {
    const db = openDatabase(":memory:");
    ensureGiveawaySchema(db);
    expect(() => ensureGiveawaySchema(db)).not.toThrow();
  });

  it("upgrades a legacy database in place, keeping its rows", () => {
    const db = openDatabase(":memory:");
    db.exec(LEGACY_SCHEMA);
    db.exec(`
      INSERT INTO giveaways (message_id, channel_id, end_time, prize, winners_count, host_id)
        VALUES ('m-old', 'c-old', 1700000000, 'Old Prize', 1, 'h-old');
      INSERT INTO participants (giveaway_id, user_id) VALUES (1, 'u-old');
    `);

    ensureGiveawaySchema(db);

    expect(columns(db, "giveaways")).toEqual(
      expect.arrayContaining(["guild_id", "title", "sponsor", "outcome", "ended_at", "announced", "created_at"])
    );
    expect(columns(db, "participants")).toContain("joined_at");
    expect(logger.info).toHaveBeenCalledWith(
      { evt: "schema_add_column", table: "participants", column: "joined_at" },
      "[ensure] adding participants.joined_at column"
    );

    const store = new GiveawayStore(db);
    expect(store.get(1)).toMatchObject({
      messageId: "m-old",
      prize: "Old Prize",
      title: "",
      sponsor: "",
      ended: false,
      announced: false,
      outcome: null,
    });
    expect(store.participantIds(1)).toEqual(["u-old"]);
    // The unique index makes a repeat join a no-op on the legacy table too
    expect(store.addParticipant(1, "u-old", 1700000001)).toBe(false);
    expect(store.addParticipant(1, "u-new", 1700000002)).toBe(true);
  });

  it("treats giveaways an older build already closed as announced", async () => {
    const db = openDatabase(":memory:");
    db.exec(LEGACY_SCHEMA);
    db.exec(`
      INSERT INTO giveaways (message_id, channel_id, end_time, prize, winners_count, host_id, ended)
        VALUES ('m-done', 'c-old', 1700000000, 'Done Prize', 1, 'h-old', 1);
      INSERT INTO giveaways (message_id, channel_id, end_time, prize, winners_count, host_id, ended)
        VALUES ('m-open', 'c-old', 1800000000, 'Open Prize', 1, 'h-old', 0);
    `);

    ensureGiveawaySchema(db);

    const store = new GiveawayStore(db);
    expect(store.get(1)).toMatchObject({ ended: true, announced: true });
    expect(store.get(2)).toMatchObject({ ended: false, announced: false });
    expect(store.listUnannounced()).toEqual([]);

    const presenter = new FakePresenter();
    const clock = new TestClock();
    const engine = new GiveawayEngine(store, presenter, { now: clock.now });
    const scanner = new GiveawayScanner(store, engine, { intervalMs: 1000, now: clock.now });
    await scanner.tick();

    expect(presenter.updates).toEqual([]);
    expect(store.get(1)?.outcome).toBeNull();
  });

  it("does not touch announced flags on a database that already has the column", () => {
    const db = openDatabase(":memory:");
    ensureGiveawaySchema(db);
    db.exec(`
      INSERT INTO giveaways (message_id, channel_id, end_time, prize, winners_count, host_id, ended, outcome)
        VALUES ('m-1', 'c-1', 1700000000, 'Prize', 1, 'h-1', 1, 'winners');
    `);

    ensureGiveawaySchema(db);

    expect(new GiveawayStore(db).get(1)?.announced).toBe(false);
  });
});
