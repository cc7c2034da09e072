/**
 * Giveaway Bot — src/commands/testEmbed.ts
 * WHAT: /post-test-embed: posts a dummy embed to a channel.
 * WHY: Lets staff confirm the bot can post embeds there before starting a giveaway.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, SlashCommandBuilder } from "discord.js";
import { replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { requireManagerRole } from "../lib/roles.js";
import { InvalidParametersError } from "../lib/errors.js";
import { SAFE_ALLOWED_MENTIONS } from "../lib/constants.js";
import { buildTestEmbed } from "../features/giveaway/embeds.js";

export const data = new SlashCommandBuilder()
  .setName("post-test-embed")
  .setDescription("Send a dummy embed to a channel")
  .setDMPermission(false)
  .addChannelOption((option) =>
    option
      .setName("channel")
      .setDescription("Channel to send the embed to")
      .setRequired(true)
      .addChannelTypes(ChannelType.GuildText, ChannelType.GuildAnnouncement)
  );

export type TestEmbedDeps = {
  managerRoles: readonly string[];
};

export async function execute(ctx: CommandContext, deps: TestEmbedDeps): Promise<void> {
  const { interaction } = ctx;

  ctx.step("permission");
  if (!(await requireManagerRole(interaction, deps.managerRoles))) return;

  ctx.step("resolve_channel");
  const target = interaction.options.getChannel("channel", true);
  const channel = await interaction.client.channels.fetch(target.id);
  if (!channel || !channel.isSendable()) {
    throw new InvalidParametersError("channel", "must be a text channel the bot can post in", target.id);
  }

  ctx.step("send");
  await channel.send({ embeds: [buildTestEmbed()], allowedMentions: SAFE_ALLOWED_MENTIONS });

  ctx.step("reply");
  await replyOrEdit(interaction, { content: `✅ Sent to <#${channel.id}>` });
}
