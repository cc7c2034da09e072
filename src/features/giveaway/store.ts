/**
 * Giveaway Bot — src/features/giveaway/store.ts
 * WHAT: SQLite access for giveaways, participants and winners.
 * WHY: The only place SQL lives; the engine, collector and scanner go through here.
 * FLOWS:
 *  - insert → setMessageId (two-phase create) | delete (publish failed)
 *  - addParticipant (ON CONFLICT DO NOTHING)
 *  - close: UPDATE ... WHERE ended = 0 + winner rows in one transaction
 *  - listDue / listUnannounced → scanner
 * DOCS:
 *  - better-sqlite3 transactions: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md#transactionfunction---function
 *  - SQLite UPSERT: https://sqlite.org/lang_UPSERT.html
 *
 * NOTE: Synchronous by design. Callers must not await between a read and the
 * write that depends on it; the ended = 0 guard covers other processes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Db } from "../../db/db.js";
import type { Giveaway, GiveawayId, GiveawayOutcome, NewGiveaway } from "./types.js";

type GiveawayRow = {
  id: number;
  message_id: string | null;
  channel_id: string;
  guild_id: string | null;
  title: string;
  sponsor: string;
  end_time: number;
  prize: string;
  winners_count: number;
  host_id: string;
  ended: number;
  outcome: string | null;
  ended_at: number | null;
  announced: number;
  created_at: number;
};

const GIVEAWAY_COLUMNS = `id, message_id, channel_id, guild_id, title, sponsor, end_time, prize,
  winners_count, host_id, ended, outcome, ended_at, announced, created_at`;

function toOutcome(value: string | null): GiveawayOutcome | null {
  return value === "winners" || value === "insufficient_participants" ? value : null;
}

function toGiveaway(row: GiveawayRow): Giveaway {
  return {
    id: row.id,
    messageId: row.message_id,
    channelId: row.channel_id,
    guildId: row.guild_id,
    title: row.title,
    sponsor: row.sponsor,
    endTime: row.end_time,
    prize: row.prize,
    winnersCount: row.winners_count,
    hostId: row.host_id,
    ended: row.ended === 1,
    outcome: toOutcome(row.outcome),
    endedAt: row.ended_at,
    announced: row.announced === 1,
    createdAt: row.created_at,
  };
}

export class GiveawayStore {
  constructor(private readonly db: Db) {}

  /** Inserts with message_id NULL; the record is not due until setMessageId. */
  insert(input: NewGiveaway): GiveawayId {
    const result = this.db
      .prepare(
        `INSERT INTO giveaways (channel_id, guild_id, title, sponsor, end_time, prize, winners_count, host_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        input.channelId,
        input.guildId,
        input.title,
        input.sponsor,
        input.endTime,
        input.prize,
        input.winnersCount,
        input.hostId,
        input.createdAt
      );
    return Number(result.lastInsertRowid);
  }

  setMessageId(id: GiveawayId, messageId: string): void {
    this.db.prepare(`UPDATE giveaways SET message_id = ? WHERE id = ?`).run(messageId, id);
  }

  /**
   * Removes a giveaway that never got an announcement. Only unpublished rows are
   * eligible; anything with a message_id is history and stays.
   */
  deleteUnpublished(id: GiveawayId): boolean {
    const tx = this.db.transaction((giveawayId: GiveawayId) => {
      const row = this.db
        .prepare<[GiveawayId], { id: number }>(`SELECT id FROM giveaways WHERE id = ? AND message_id IS NULL`)
        .get(giveawayId);
      if (!row) return false;
      this.db.prepare(`DELETE FROM participants WHERE giveaway_id = ?`).run(giveawayId);
      this.db.prepare(`DELETE FROM giveaways WHERE id = ?`).run(giveawayId);
      return true;
    });
    return tx(id);
  }

  get(id: GiveawayId): Giveaway | undefined {
    const row = this.db
      .prepare<[GiveawayId], GiveawayRow>(`SELECT ${GIVEAWAY_COLUMNS} FROM giveaways WHERE id = ?`)
      .get(id);
    return row ? toGiveaway(row) : undefined;
  }

  /** Open, published, and past the deadline. Oldest deadline first. */
  listDue(now: number): Giveaway[] {
    return this.db
      .prepare<[number], GiveawayRow>(
        `SELECT ${GIVEAWAY_COLUMNS} FROM giveaways
         WHERE ended = 0 AND end_time <= ? AND message_id IS NOT NULL
         ORDER BY end_time ASC, id ASC`
      )
      .all(now)
      .map(toGiveaway);
  }

  /** Closed giveaways whose result announcement has not landed yet. */
  listUnannounced(): Giveaway[] {
    return this.db
      .prepare<[], GiveawayRow>(
        `SELECT ${GIVEAWAY_COLUMNS} FROM giveaways
         WHERE ended = 1 AND announced = 0 AND message_id IS NOT NULL
         ORDER BY ended_at ASC, id ASC`
      )
      .all()
      .map(toGiveaway);
  }

  /** @returns true if a new row was written, false for a duplicate join. */
  addParticipant(giveawayId: GiveawayId, userId: string, joinedAt: number): boolean {
    const result = this.db
      .prepare(
        `INSERT INTO participants (giveaway_id, user_id, joined_at) VALUES (?, ?, ?)
         ON CONFLICT (giveaway_id, user_id) DO NOTHING`
      )
      .run(giveawayId, userId, joinedAt);
    return result.changes === 1;
  }

  /** Join order. */
  participantIds(giveawayId: GiveawayId): string[] {
    return this.db
      .prepare<[GiveawayId], { user_id: string }>(
        `SELECT user_id FROM participants WHERE giveaway_id = ? ORDER BY joined_at ASC, rowid ASC`
      )
      .all(giveawayId)
      .map((r) => r.user_id);
  }

  countParticipants(giveawayId: GiveawayId): number {
    const row = this.db
      .prepare<[GiveawayId], { n: number }>(`SELECT COUNT(*) AS n FROM participants WHERE giveaway_id = ?`)
      .get(giveawayId);
    return row?.n ?? 0;
  }

  /**
   * Flips ended 0→1 and writes winners atomically. Returns false (and writes
   * nothing) when the giveaway was already closed or does not exist.
   */
  close(giveawayId: GiveawayId, outcome: GiveawayOutcome, winners: readonly string[], endedAt: number): boolean {
    const tx = this.db.transaction(() => {
      const updated = this.db
        .prepare(`UPDATE giveaways SET ended = 1, outcome = ?, ended_at = ? WHERE id = ? AND ended = 0`)
        .run(outcome, endedAt, giveawayId);
      if (updated.changes !== 1) return false;
      const insertWinner = this.db.prepare(
        `INSERT INTO giveaway_winners (giveaway_id, user_id, position) VALUES (?, ?, ?)`
      );
      winners.forEach((userId, index) => {
        insertWinner.run(giveawayId, userId, index + 1);
      });
      return true;
    });
    return tx();
  }

  /** Draw order. */
  winnersOf(giveawayId: GiveawayId): string[] {
    return this.db
      .prepare<[GiveawayId], { user_id: string }>(
        `SELECT user_id FROM giveaway_winners WHERE giveaway_id = ? ORDER BY position ASC`
      )
      .all(giveawayId)
      .map((r) => r.user_id);
  }

  markAnnounced(giveawayId: GiveawayId): void {
    this.db.prepare(`UPDATE giveaways SET announced = 1 WHERE id = ? AND ended = 1`).run(giveawayId);
  }
}
