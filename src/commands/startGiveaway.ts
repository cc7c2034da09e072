/**
 * Giveaway Bot — src/commands/startGiveaway.ts
 * WHAT: /start-giveaway: staff post a timed giveaway with a join button.
 * WHY: Only entry point for creating giveaways.
 * FLOWS:
 *  - role gate → defer (ephemeral) → read options → engine.create() → "Giveaway started in #channel"
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 *  - ChatInputCommandInteraction: https://discord.js.org/#/docs/discord.js/main/class/ChatInputCommandInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, MessageFlags, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { requireManagerRole } from "../lib/roles.js";
import { GIVEAWAY_MAX_DURATION_MINUTES, GIVEAWAY_MAX_WINNERS, GIVEAWAY_TEXT_MAX_LENGTH } from "../lib/constants.js";
import type { GiveawayEngine } from "../features/giveaway/engine.js";

export const data = new SlashCommandBuilder()
  .setName("start-giveaway")
  .setDescription("Start a giveaway 🎁")
  .setDMPermission(false)
  .addStringOption((option) =>
    option.setName("title").setDescription("Giveaway title").setRequired(true).setMaxLength(GIVEAWAY_TEXT_MAX_LENGTH)
  )
  .addStringOption((option) =>
    option.setName("sponsor").setDescription("Sponsor name").setRequired(true).setMaxLength(GIVEAWAY_TEXT_MAX_LENGTH)
  )
  .addIntegerOption((option) =>
    option
      .setName("duration")
      .setDescription("Duration in minutes")
      .setRequired(true)
      .setMinValue(1)
      .setMaxValue(GIVEAWAY_MAX_DURATION_MINUTES)
  )
  .addStringOption((option) =>
    option.setName("item").setDescription("Giveaway item").setRequired(true).setMaxLength(GIVEAWAY_TEXT_MAX_LENGTH)
  )
  .addIntegerOption((option) =>
    option
      .setName("winners")
      .setDescription("Number of winners")
      .setRequired(true)
      .setMinValue(1)
      .setMaxValue(GIVEAWAY_MAX_WINNERS)
  )
  .addChannelOption((option) =>
    option
      .setName("channel")
      .setDescription("Channel to post the giveaway")
      .setRequired(true)
      .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
  );

export type StartGiveawayDeps = {
  engine: Pick<GiveawayEngine, "create">;
  managerRoles: readonly string[];
};

export async function execute(ctx: CommandContext, deps: StartGiveawayDeps): Promise<void> {
  const { interaction } = ctx;

  ctx.step("permission");
  if (!(await requireManagerRole(interaction, deps.managerRoles))) return;

  // Publishing can take longer than the 3s response window
  ctx.step("defer");
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  ctx.step("options");
  const channel = interaction.options.getChannel("channel", true);
  const hostDisplayName = interaction.inCachedGuild()
    ? interaction.member.displayName
    : interaction.user.displayName;

  ctx.step("create");
  await deps.engine.create({
    title: interaction.options.getString("title", true),
    sponsor: interaction.options.getString("sponsor", true),
    durationMinutes: interaction.options.getInteger("duration", true),
    item: interaction.options.getString("item", true),
    winnersCount: interaction.options.getInteger("winners", true),
    hostId: interaction.user.id,
    hostDisplayName,
    channelId: channel.id,
    guildId: interaction.guildId,
  });

  ctx.step("reply");
  await replyOrEdit(interaction, { content: `🎉 Giveaway started in <#${channel.id}>!` });
}
