/**
 * Giveaway Bot — src/features/giveaway/engine.ts
 * WHAT: Giveaway lifecycle: create, draw, announce.
 * WHY: One place owns the state machine Open → Due → Closed, so the scanner,
 *      commands and tests all get the same guarantees.
 * FLOWS:
 *  - create(): validate → store.insert (message_id NULL) → presenter.publish → store.setMessageId
 *              publish throws → store.deleteUnpublished → rethrow
 *  - draw(): load → guard (not_found / already_closed / not_due) → sample → store.close (CAS) → announce
 *  - announce(): presenter.update → store.markAnnounced on success or message gone
 *
 * NOTE: draw() does every read and the closing write without awaiting in between.
 * The ended = 0 guard in store.close makes a second draw a no-op regardless.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { logger, redact } from "../../lib/logger.js";
import { InvalidParametersError } from "../../lib/errors.js";
import { GIVEAWAY_MAX_DURATION_MINUTES, GIVEAWAY_MAX_WINNERS } from "../../lib/constants.js";
import { MINUTE_SECONDS, nowUtc, type Clock } from "../../lib/time.js";
import { cryptoRandomIndex, sampleWithoutReplacement, type RandomIndex } from "./draw.js";
import type { GiveawayStore } from "./store.js";
import type {
  AnnounceResult,
  AnnouncementPresenter,
  CreateGiveawayInput,
  DrawResult,
  Giveaway,
  GiveawayId,
  ResultView,
} from "./types.js";

export interface GiveawayEngineOptions {
  now?: Clock;
  random?: RandomIndex;
}

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new InvalidParametersError(field, "must not be empty", value);
  }
  return trimmed;
}

function requireIntInRange(field: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidParametersError(field, `must be a whole number between ${min} and ${max}`, value);
  }
  return value;
}

export class GiveawayEngine {
  private readonly now: Clock;
  private readonly random: RandomIndex;

  constructor(
    private readonly store: GiveawayStore,
    private readonly presenter: AnnouncementPresenter,
    opts: GiveawayEngineOptions = {}
  ) {
    this.now = opts.now ?? nowUtc;
    this.random = opts.random ?? cryptoRandomIndex;
  }

  /**
   * Creates the record and posts its announcement. Invalid input throws
   * InvalidParametersError before anything is written.
   */
  async create(input: CreateGiveawayInput): Promise<GiveawayId> {
    const durationMinutes = requireIntInRange("duration", input.durationMinutes, 1, GIVEAWAY_MAX_DURATION_MINUTES);
    const winnersCount = requireIntInRange("winners", input.winnersCount, 1, GIVEAWAY_MAX_WINNERS);
    const prize = requireText("item", input.item);
    const title = requireText("title", input.title);
    const sponsor = input.sponsor.trim();

    const createdAt = this.now();
    const endTime = createdAt + durationMinutes * MINUTE_SECONDS;

    const id = this.store.insert({
      channelId: input.channelId,
      guildId: input.guildId,
      title,
      sponsor,
      endTime,
      prize,
      winnersCount,
      hostId: input.hostId,
      createdAt,
    });

    let messageId: string;
    try {
      messageId = await this.presenter.publish(input.channelId, {
        giveawayId: id,
        title,
        sponsor,
        prize,
        winnersCount,
        endTime,
        hostDisplayName: input.hostDisplayName,
      });
    } catch (err) {
      const removed = this.store.deleteUnpublished(id);
      logger.warn(
        { evt: "giveaway_publish_failed", giveawayId: id, channelId: input.channelId, removed, err },
        "[giveaway] announcement publish failed; record removed"
      );
      throw err;
    }

    this.store.setMessageId(id, messageId);
    logger.info(
      {
        evt: "giveaway_created",
        giveawayId: id,
        guildId: input.guildId,
        channelId: input.channelId,
        messageId,
        title: redact(title),
        endTime,
        winnersCount,
        hostId: input.hostId,
      },
      "[giveaway] created"
    );
    return id;
  }

  /**
   * Closes a due giveaway and picks winners. At most one call per giveaway
   * ever returns "winners" or "insufficient_participants".
   */
  async draw(giveawayId: GiveawayId): Promise<DrawResult> {
    const giveaway = this.store.get(giveawayId);
    if (!giveaway) return { status: "not_found", giveawayId };
    if (giveaway.ended) return { status: "already_closed", giveawayId };
    const now = this.now();
    if (giveaway.endTime > now) return { status: "not_due", giveawayId };

    const participants = this.store.participantIds(giveawayId);
    const insufficient = participants.length < giveaway.winnersCount;
    const winners = insufficient ? [] : sampleWithoutReplacement(participants, giveaway.winnersCount, this.random);
    const outcome = insufficient ? "insufficient_participants" : "winners";

    if (!this.store.close(giveawayId, outcome, winners, now)) {
      logger.info({ evt: "giveaway_close_lost", giveawayId }, "[giveaway] already closed by another draw");
      return { status: "already_closed", giveawayId };
    }

    logger.info(
      {
        evt: "giveaway_closed",
        giveawayId,
        outcome,
        participants: participants.length,
        winners: winners.length,
      },
      `[giveaway] closed: ${outcome}`
    );

    // Closed is final from here on; announce failures are retried by the scanner.
    await this.announce(giveawayId);

    return insufficient
      ? { status: "insufficient_participants", giveawayId }
      : { status: "winners", giveawayId, winners };
  }

  /**
   * Rewrites the announcement with the result. Never throws: a failure leaves
   * `announced` unset for the scanner to retry.
   */
  async announce(giveawayId: GiveawayId): Promise<AnnounceResult> {
    const giveaway = this.store.get(giveawayId);
    if (!giveaway || !giveaway.ended || giveaway.announced || giveaway.messageId === null) {
      return "skipped";
    }

    try {
      const outcome = await this.presenter.update(giveaway.channelId, giveaway.messageId, this.resultView(giveaway));
      this.store.markAnnounced(giveawayId);
      if (!outcome.ok) {
        logger.warn(
          { evt: "giveaway_message_gone", giveawayId, channelId: giveaway.channelId, messageId: giveaway.messageId },
          "[giveaway] announcement message no longer exists; result not shown"
        );
        return "message_gone";
      }
      logger.info({ evt: "giveaway_announced", giveawayId }, "[giveaway] result announced");
      return "announced";
    } catch (err) {
      logger.error(
        { evt: "giveaway_announce_failed", giveawayId, channelId: giveaway.channelId, err },
        "[giveaway] result announcement failed; will retry"
      );
      return "failed";
    }
  }

  private resultView(giveaway: Giveaway): ResultView {
    if (giveaway.outcome === "winners") {
      return { outcome: "winners", prize: giveaway.prize, winners: this.store.winnersOf(giveaway.id) };
    }
    return { outcome: "insufficient_participants", prize: giveaway.prize };
  }
}
