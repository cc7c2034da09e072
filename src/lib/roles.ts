/**
 * Giveaway Bot — src/lib/roles.ts
 * WHAT: Role-name gate for staff commands.
 * WHY: Servers name their staff roles ("root", "mod") but role ids differ per guild,
 *      so the allow list is configured by name and matched case-insensitively.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit } from "./cmdWrap.js";
import { logger } from "./logger.js";

/**
 * The slice of a GuildMember we read: role names. A cached GuildMember
 * satisfies it; tests pass plain objects.
 */
export type RoleNamed = { roles: { cache: { some(fn: (role: { name: string }) => boolean): boolean } } };

/**
 * True if the member holds at least one role whose name (case-insensitive)
 * is in `allowed`. `allowed` is expected lowercased (env parsing does that).
 */
export function hasAllowedRole(member: RoleNamed | null, allowed: readonly string[]): boolean {
  if (!member || allowed.length === 0) return false;
  const set = new Set(allowed);
  return member.roles.cache.some((role) => set.has(role.name.toLowerCase()));
}

/**
 * Gate for staff commands. Replies ephemerally and returns false when the
 * invoker lacks every allowed role; DMs and uncached guilds fail closed.
 */
export async function requireManagerRole(
  interaction: ChatInputCommandInteraction,
  allowed: readonly string[]
): Promise<boolean> {
  const member = interaction.inCachedGuild() ? interaction.member : null;
  if (hasAllowedRole(member, allowed)) return true;

  logger.info(
    { evt: "permission_denied", cmd: interaction.commandName, userId: interaction.user.id, guildId: interaction.guildId },
    "[roles] command denied: missing manager role"
  );
  await replyOrEdit(interaction, { content: "❌ You don't have permission to use this command." });
  return false;
}
