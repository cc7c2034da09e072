/**
 * Giveaway Bot — src/features/giveaway/buttons.ts
 * WHAT: Button interaction handler for the giveaway join button.
 * WHY: Thin transport glue: parse the custom id, call the collector, reply ephemerally.
 * DOCS:
 *  - ButtonInteraction: https://discord.js.org/#/docs/discord.js/main/class/ButtonInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ButtonInteraction } from "discord.js";
import { replyOrEdit, wrapCommand } from "../../lib/cmdWrap.js";
import { GIVEAWAY_JOIN_PREFIX } from "../../lib/constants.js";
import { logger } from "../../lib/logger.js";
import type { EntryCollector } from "./entries.js";
import type { JoinResult } from "./types.js";

// Format: giveaway:join:<giveawayId>. The prefix has no regex metacharacters.
export const GIVEAWAY_JOIN_RE = new RegExp(`^${GIVEAWAY_JOIN_PREFIX}(\\d+)$`);

/** joined and already_joined read the same: a double click is not an error. */
const JOIN_REPLIES: Record<JoinResult, string> = {
  joined: "✅ You're in!",
  already_joined: "✅ You're in!",
  closed: "⌛ This giveaway has already ended.",
  not_found: "This giveaway no longer exists.",
};

export function parseJoinCustomId(customId: string): number | null {
  const match = GIVEAWAY_JOIN_RE.exec(customId);
  if (!match) return null;
  const id = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(id) ? id : null;
}

export function makeJoinButtonHandler(collector: EntryCollector): (interaction: ButtonInteraction) => Promise<void> {
  return wrapCommand<ButtonInteraction>("giveaway:join", async ({ interaction, step }) => {
    step("parse");
    const giveawayId = parseJoinCustomId(interaction.customId);
    if (giveawayId === null) {
      logger.warn({ evt: "giveaway_join_invalid", customId: interaction.customId }, "[giveaway] invalid join button id");
      await replyOrEdit(interaction, { content: JOIN_REPLIES.not_found });
      return;
    }

    step("join");
    const result = collector.join(giveawayId, interaction.user.id);

    step("reply");
    await replyOrEdit(interaction, { content: JOIN_REPLIES[result] });
  });
}
