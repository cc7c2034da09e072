/**
 * Giveaway Bot — src/features/giveaway/types.ts
 * WHAT: Domain types shared by the store, engine, collector, scanner and presenter.
 * WHY: The engine speaks these types only; discord.js stays behind the presenter.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type GiveawayId = number;

export type GiveawayOutcome = "winners" | "insufficient_participants";

/** A giveaway row as the rest of the app sees it. Timestamps are Unix seconds. */
export interface Giveaway {
  id: GiveawayId;
  /** null only between row insert and publish */
  messageId: string | null;
  channelId: string;
  guildId: string | null;
  title: string;
  sponsor: string;
  endTime: number;
  prize: string;
  winnersCount: number;
  hostId: string;
  ended: boolean;
  outcome: GiveawayOutcome | null;
  endedAt: number | null;
  announced: boolean;
  createdAt: number;
}

export interface NewGiveaway {
  channelId: string;
  guildId: string | null;
  title: string;
  sponsor: string;
  endTime: number;
  prize: string;
  winnersCount: number;
  hostId: string;
  createdAt: number;
}

export interface CreateGiveawayInput {
  title: string;
  sponsor: string;
  durationMinutes: number;
  item: string;
  winnersCount: number;
  hostId: string;
  /** Shown in the announcement footer; not persisted */
  hostDisplayName: string;
  channelId: string;
  guildId: string | null;
}

export type DrawResult =
  | { status: "winners"; giveawayId: GiveawayId; winners: string[] }
  | { status: "insufficient_participants"; giveawayId: GiveawayId }
  | { status: "already_closed"; giveawayId: GiveawayId }
  | { status: "not_found"; giveawayId: GiveawayId }
  | { status: "not_due"; giveawayId: GiveawayId };

export type JoinResult = "joined" | "already_joined" | "closed" | "not_found";

export type AnnounceResult = "announced" | "message_gone" | "failed" | "skipped";

// ===== Presenter contract =====

/** Everything the presenter needs to render the opening announcement. */
export interface Announcement {
  giveawayId: GiveawayId;
  title: string;
  sponsor: string;
  prize: string;
  winnersCount: number;
  endTime: number;
  hostDisplayName: string;
}

export type ResultView =
  | { outcome: "winners"; prize: string; winners: string[] }
  | { outcome: "insufficient_participants"; prize: string };

export type UpdateOutcome = { ok: true } | { ok: false; reason: "not_found" };

/**
 * Renders giveaways to wherever they are shown. The engine depends only on this.
 * Errors other than a missing channel/message are thrown.
 */
export interface AnnouncementPresenter {
  publish(channelId: string, announcement: Announcement): Promise<string>;
  update(channelId: string, messageId: string, result: ResultView): Promise<UpdateOutcome>;
}
