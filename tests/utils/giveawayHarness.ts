/**
 * Giveaway Bot -- tests/utils/giveawayHarness.ts
 * WHAT: In-memory store, controllable clock, and a recording presenter.
 * WHY: Engine/collector/scanner tests run the real SQL against :memory: SQLite
 *      and never touch Discord.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { openDatabase, type Db } from "../../src/db/db.js";
import { ensureGiveawaySchema } from "../../src/db/ensure.js";
import { GiveawayStore } from "../../src/features/giveaway/store.js";
import type {
  Announcement,
  AnnouncementPresenter,
  CreateGiveawayInput,
  ResultView,
  UpdateOutcome,
} from "../../src/features/giveaway/types.js";

/** 2026-01-01T00:00:00Z */
export const T0 = 1_767_225_600;

export class TestClock {
  constructor(public current: number = T0) {}
  now = (): number => this.current;
  advanceMinutes(minutes: number): void {
    this.current += minutes * 60;
  }
}

type UpdateCall = { channelId: string; messageId: string; result: ResultView };

/**
 * Records every publish/update. Behavior is switched per test through
 * `publishError`, `updateErrors` (consumed one per call) and `missing`.
 */
export class FakePresenter implements AnnouncementPresenter {
  published: Array<{ channelId: string; announcement: Announcement; messageId: string }> = [];
  updates: UpdateCall[] = [];
  publishError: Error | null = null;
  updateErrors: Error[] = [];
  /** message ids that "no longer exist" */
  missing = new Set<string>();
  private nextMessage = 1000;

  async publish(channelId: string, announcement: Announcement): Promise<string> {
    if (this.publishError) throw this.publishError;
    const messageId = String(this.nextMessage++);
    this.published.push({ channelId, announcement, messageId });
    return messageId;
  }

  async update(channelId: string, messageId: string, result: ResultView): Promise<UpdateOutcome> {
    this.updates.push({ channelId, messageId, result });
    const err = this.updateErrors.shift();
    if (err) throw err;
    if (this.missing.has(messageId)) return { ok: false, reason: "not_found" };
    return { ok: true };
  }
}

export function createTestStore(): { db: Db; store: GiveawayStore } {
  const db = openDatabase(":memory:");
  ensureGiveawaySchema(db);
  return { db, store: new GiveawayStore(db) };
}

export function giveawayInput(overrides: Partial<CreateGiveawayInput> = {}): CreateGiveawayInput {
  return {
    title: "Launch Party",
    sponsor: "Test Sponsor",
    durationMinutes: 10,
    item: "Nitro",
    winnersCount: 1,
    hostId: "host-1",
    hostDisplayName: "Host One",
    channelId: "channel-1",
    guildId: "guild-1",
    ...overrides,
  };
}

export function countRows(db: Db, table: "giveaways" | "participants" | "giveaway_winners"): number {
  const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
  return row?.n ?? 0;
}
