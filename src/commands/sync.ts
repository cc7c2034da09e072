/**
 * Giveaway Bot — src/commands/sync.ts
 * WHAT: Slash-command sync for guild-scoped commands.
 * WHY: Guild commands update instantly; bulk overwrite also removes stale ones.
 * FLOWS:
 *  - syncCommandsToGuild: serialize commands → REST PUT to guild endpoint → log
 *  - syncCommandsToAllGuilds: loop guild ids sequentially with a rate-limit delay
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Routes, type REST } from "discord.js";
import { buildCommands } from "./buildCommands.js";
import { logger } from "../lib/logger.js";
import { DISCORD_COMMAND_SYNC_DELAY_MS } from "../lib/constants.js";

/** The client's own REST instance works; tests pass a stub. */
export type CommandRest = Pick<REST, "put">;

/**
 * Bulk-overwrites this guild's commands. Failures are logged, not thrown:
 * one guild with broken permissions must not block the others.
 */
export async function syncCommandsToGuild(rest: CommandRest, applicationId: string, guildId: string): Promise<boolean> {
  const body = buildCommands();
  try {
    await rest.put(Routes.applicationGuildCommands(applicationId, guildId), { body });
    logger.info({ evt: "cmd_sync", guildId, count: body.length }, "[cmdsync] synced commands to guild");
    return true;
  } catch (err) {
    logger.warn({ evt: "cmd_sync_failed", guildId, err }, "[cmdsync] failed to sync guild");
    return false;
  }
}

export async function syncCommandsToAllGuilds(
  rest: CommandRest,
  applicationId: string,
  guildIds: readonly string[],
  delayMs: number = DISCORD_COMMAND_SYNC_DELAY_MS
): Promise<number> {
  let synced = 0;
  for (const [index, guildId] of guildIds.entries()) {
    if (await syncCommandsToGuild(rest, applicationId, guildId)) synced++;
    // Guild command PUTs are limited to ~2/sec per route
    if (index < guildIds.length - 1) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }
  return synced;
}
