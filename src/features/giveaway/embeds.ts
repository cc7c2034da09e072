/**
 * Giveaway Bot — src/features/giveaway/embeds.ts
 * WHAT: Embed and component builders for giveaway announcements.
 * WHY: Pure functions, so tests can assert the exact fields without a client.
 * DOCS:
 *  - EmbedBuilder: https://discord.js.org/docs/packages/builders/main/EmbedBuilder:Class
 *  - Embed limits: https://discord.com/developers/docs/resources/message#embed-object-embed-limits
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ActionRowBuilder, ButtonBuilder, ButtonStyle, Colors, EmbedBuilder } from "discord.js";
import { EMBED_FIELD_MAX_LENGTH, GIVEAWAY_JOIN_PREFIX } from "../../lib/constants.js";
import { formatDateTime, toDiscordRel } from "../../lib/timefmt.js";
import type { Announcement, GiveawayId, ResultView } from "./types.js";

function clip(value: string, max = EMBED_FIELD_MAX_LENGTH): string {
  return value.length <= max ? value : `${value.slice(0, max - 1)}…`;
}

/**
 * Packs mentions into field-sized chunks, splitting only between mentions.
 * 50 winners with 19-digit ids is ~1.2k characters, more than one field holds.
 */
export function chunkMentions(userIds: readonly string[], max = EMBED_FIELD_MAX_LENGTH): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const id of userIds) {
    const mention = `<@${id}>`;
    if (current && current.length + 2 + mention.length > max) {
      chunks.push(current);
      current = mention;
    } else {
      current = current ? `${current}, ${mention}` : mention;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export function joinButtonCustomId(giveawayId: GiveawayId): string {
  return `${GIVEAWAY_JOIN_PREFIX}${giveawayId}`;
}

export function buildJoinRow(giveawayId: GiveawayId): ActionRowBuilder<ButtonBuilder> {
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(joinButtonCustomId(giveawayId))
      .setLabel("Enter Giveaway")
      .setEmoji("🎉")
      .setStyle(ButtonStyle.Success)
  );
}

/**
 * Opening announcement. Ends shows the server's zone for humans plus a relative
 * timestamp each viewer's client renders locally.
 */
export function buildAnnouncementEmbed(
  announcement: Announcement,
  displayTimeZone: string,
  now: Date = new Date()
): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(clip(`🎉 ${announcement.title} 🎉`, 256))
    .setColor(Colors.Blurple)
    .addFields(
      { name: "🎁 Item", value: clip(announcement.prize), inline: false },
      { name: "🏆 Winners", value: String(announcement.winnersCount), inline: true },
      {
        name: "🕒 Ends",
        value: `${formatDateTime(announcement.endTime, displayTimeZone)}\n${toDiscordRel(announcement.endTime)}`,
        inline: true,
      },
      { name: "👤 Hosted by", value: clip(announcement.sponsor || "—"), inline: false }
    )
    .setFooter({ text: clip(`Started by ${announcement.hostDisplayName}`, 2048) })
    .setTimestamp(now);
}

export function buildResultEmbed(result: ResultView): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle("🎉 Giveaway Ended!")
    .setColor(Colors.Red)
    .addFields({ name: "🎁 Prize", value: clip(result.prize || "Unknown"), inline: false });

  if (result.outcome === "winners") {
    embed.addFields(
      chunkMentions(result.winners).map((value) => ({ name: "🏆 Winner(s)", value, inline: false }))
    );
  } else {
    embed.addFields({ name: "❌ Result", value: "Not enough participants", inline: false });
  }

  return embed.setFooter({ text: "Ended via auto-check" });
}

/** /post-test-embed payload: checks the bot can post embeds in a channel. */
export function buildTestEmbed(): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle("📢 Dummy Embed")
    .setDescription("This is a test embed.")
    .setColor(Colors.Orange);
}
