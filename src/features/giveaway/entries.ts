/**
 * Giveaway Bot — src/features/giveaway/entries.ts
 * WHAT: Records a user's entry into a giveaway.
 * WHY: Button clicks arrive in bursts and users double-click; the unique
 *      (giveaway_id, user_id) index makes joins idempotent.
 * FLOWS:
 *  - join(): lookup → closed? reject → INSERT ... ON CONFLICT DO NOTHING → joined | already_joined
 *
 * NOTE: Entries after end_time are still accepted until the scanner closes the
 * giveaway. The deadline shown is "on or after", not a hard cutoff.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { logger } from "../../lib/logger.js";
import { nowUtc, type Clock } from "../../lib/time.js";
import type { GiveawayStore } from "./store.js";
import type { GiveawayId, JoinResult } from "./types.js";

export class EntryCollector {
  constructor(
    private readonly store: GiveawayStore,
    private readonly now: Clock = nowUtc
  ) {}

  join(giveawayId: GiveawayId, userId: string): JoinResult {
    const giveaway = this.store.get(giveawayId);
    if (!giveaway) return "not_found";
    if (giveaway.ended) return "closed";

    const inserted = this.store.addParticipant(giveawayId, userId, this.now());
    logger.debug(
      { evt: "giveaway_join", giveawayId, userId, inserted },
      inserted ? "[giveaway] entry recorded" : "[giveaway] duplicate entry ignored"
    );
    return inserted ? "joined" : "already_joined";
  }
}
