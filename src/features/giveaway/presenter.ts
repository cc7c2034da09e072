/**
 * Giveaway Bot — src/features/giveaway/presenter.ts
 * WHAT: discord.js implementation of AnnouncementPresenter.
 * WHY: Keeps every discord.js call for giveaways behind the interface the engine uses.
 * FLOWS:
 *  - publish(): fetch channel → send(announcement embed + join button) → message id
 *  - update(): fetch channel → fetch message → edit(result embed, no components)
 *    Unknown Channel / Unknown Message / not a text channel → { ok: false, reason: "not_found" }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Client, Message, TextBasedChannel } from "discord.js";
import { classifyError, InvalidParametersError, isUnknownResource } from "../../lib/errors.js";
import { SAFE_ALLOWED_MENTIONS, WINNER_ALLOWED_MENTIONS } from "../../lib/constants.js";
import { logger } from "../../lib/logger.js";
import { buildAnnouncementEmbed, buildJoinRow, buildResultEmbed } from "./embeds.js";
import type { Announcement, AnnouncementPresenter, ResultView, UpdateOutcome } from "./types.js";

export class DiscordAnnouncementPresenter implements AnnouncementPresenter {
  constructor(
    private readonly client: Client,
    private readonly displayTimeZone: string
  ) {}

  async publish(channelId: string, announcement: Announcement): Promise<string> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isSendable()) {
      throw new InvalidParametersError("channel", "must be a text channel the bot can post in", channelId);
    }
    const message = await channel.send({
      embeds: [buildAnnouncementEmbed(announcement, this.displayTimeZone)],
      components: [buildJoinRow(announcement.giveawayId)],
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return message.id;
  }

  async update(channelId: string, messageId: string, result: ResultView): Promise<UpdateOutcome> {
    const channel = await this.fetchTextChannel(channelId);
    if (!channel) return { ok: false, reason: "not_found" };

    const message = await this.fetchMessage(channel, messageId);
    if (!message) return { ok: false, reason: "not_found" };

    try {
      await message.edit({
        embeds: [buildResultEmbed(result)],
        components: [],
        allowedMentions: WINNER_ALLOWED_MENTIONS,
      });
    } catch (err) {
      // Deleted between fetch and edit
      if (isUnknownResource(classifyError(err))) return { ok: false, reason: "not_found" };
      throw err;
    }
    return { ok: true };
  }

  private async fetchMessage(channel: TextBasedChannel, messageId: string): Promise<Message | null> {
    try {
      return await channel.messages.fetch(messageId);
    } catch (err) {
      if (isUnknownResource(classifyError(err))) return null;
      throw err;
    }
  }

  private async fetchTextChannel(channelId: string): Promise<TextBasedChannel | null> {
    try {
      const channel = await this.client.channels.fetch(channelId);
      if (channel && channel.isTextBased()) return channel;
      logger.warn({ evt: "giveaway_channel_not_text", channelId }, "[giveaway] channel missing or not text-based");
      return null;
    } catch (err) {
      if (isUnknownResource(classifyError(err))) return null;
      throw err;
    }
  }
}
