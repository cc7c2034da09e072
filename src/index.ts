/**
 * Giveaway Bot — src/index.ts
 * WHAT: Main process entrypoint. Builds every service, boots the Discord client,
 *       routes interactions, and starts the schedulers.
 * WHY: All wiring lives here; nothing below this file reaches for a global store or client.
 * FLOWS:
 *  - Boot: env → Sentry → SQLite + schema → store/engine/collector → client → login
 *  - Ready: presence → heartbeat + scanner → per-guild command sync
 *  - Interaction: slash → command map; button giveaway:join:<id> → collector
 *  - Shutdown: stop schedulers → destroy client → close db → flush Sentry
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  ActivityType,
  Client,
  Events,
  GatewayIntentBits,
  type ChatInputCommandInteraction,
  type Guild,
  type Interaction,
} from "discord.js";
import { loadEnvOrExit } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { flushSentry, initializeSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { wrapCommand } from "./lib/cmdWrap.js";
import { runWithCtx } from "./lib/reqctx.js";
import { closeDatabase, openDatabase } from "./db/db.js";
import { ensureGiveawaySchema } from "./db/ensure.js";
import { GiveawayStore } from "./features/giveaway/store.js";
import { GiveawayEngine } from "./features/giveaway/engine.js";
import { EntryCollector } from "./features/giveaway/entries.js";
import { DiscordAnnouncementPresenter } from "./features/giveaway/presenter.js";
import { GIVEAWAY_JOIN_RE, makeJoinButtonHandler } from "./features/giveaway/buttons.js";
import { GiveawayScanner } from "./scheduler/giveawayScanner.js";
import { UptimeHeartbeat } from "./scheduler/uptimeHeartbeat.js";
import { syncCommandsToAllGuilds, syncCommandsToGuild } from "./commands/sync.js";
import * as startGiveaway from "./commands/startGiveaway.js";
import * as testEmbed from "./commands/testEmbed.js";

// ===== Process-Level Error Handlers =====
// Registered before anything async so nothing slips through during boot.

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  // The logger's error hook reports it to Sentry
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  // Don't exit - discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

// interactionCreate may publish an announcement; give it more than the default 10s
const INTERACTION_EVENT_TIMEOUT_MS = 30_000;

async function main(): Promise<void> {
  const env = loadEnvOrExit();

  initializeSentry({
    dsn: env.SENTRY_DSN,
    environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
    tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
    release: process.env.npm_package_version ?? "dev",
  });

  // ===== Storage =====
  const db = openDatabase(env.DB_PATH);
  ensureGiveawaySchema(db);
  const store = new GiveawayStore(db);

  // ===== Discord client + services =====
  // Slash commands and buttons only need the Guilds intent; roles come with it.
  const client = new Client({ intents: [GatewayIntentBits.Guilds] });

  const presenter = new DiscordAnnouncementPresenter(client, env.DISPLAY_TIMEZONE);
  const engine = new GiveawayEngine(store, presenter);
  const collector = new EntryCollector(store);
  const scanner = new GiveawayScanner(store, engine, {
    intervalMs: env.GIVEAWAY_CHECK_INTERVAL_SECONDS * 1000,
  });
  const heartbeat = new UptimeHeartbeat(client, {
    channelId: env.STATUS_CHANNEL_ID,
    messageId: env.STATUS_MESSAGE_ID,
    serverName: env.SERVER_NAME,
    timeZone: env.DISPLAY_TIMEZONE,
    intervalMs: env.UPTIME_INTERVAL_SECONDS * 1000,
  });

  const managerRoles = env.GIVEAWAY_MANAGER_ROLES;
  const commands = new Map<string, (interaction: ChatInputCommandInteraction) => Promise<void>>([
    [
      startGiveaway.data.name,
      wrapCommand<ChatInputCommandInteraction>(startGiveaway.data.name, (ctx) =>
        startGiveaway.execute(ctx, { engine, managerRoles })
      ),
    ],
    [
      testEmbed.data.name,
      wrapCommand<ChatInputCommandInteraction>(testEmbed.data.name, (ctx) =>
        testEmbed.execute(ctx, { managerRoles })
      ),
    ],
  ]);
  const handleJoin = makeJoinButtonHandler(collector);

  // ===== Events =====

  client.once(
    Events.ClientReady,
    wrapEvent("clientReady", async (ready: Client<true>) => {
      logger.info({ evt: "ready", tag: ready.user.tag, id: ready.user.id, guilds: ready.guilds.cache.size }, "Bot ready");

      if (env.BOT_ACTIVITY) {
        ready.user.setPresence({ activities: [{ name: env.BOT_ACTIVITY, type: ActivityType.Playing }] });
      }

      heartbeat.markConnected();
      heartbeat.start();
      scanner.start();

      await syncCommandsToAllGuilds(ready.rest, ready.application.id, [...ready.guilds.cache.keys()]);
    })
  );

  // Uptime counts from the latest gateway session
  client.on(
    Events.ShardReady,
    wrapEvent("shardReady", () => heartbeat.markConnected())
  );
  client.on(
    Events.ShardResume,
    wrapEvent("shardResume", () => heartbeat.markConnected())
  );

  client.on(
    Events.GuildCreate,
    wrapEvent("guildCreate", async (guild: Guild) => {
      logger.info({ evt: "guild_join", guildId: guild.id, name: guild.name }, "[guild] joined guild");
      if (!client.application) return;
      await syncCommandsToGuild(client.rest, client.application.id, guild.id);
    })
  );

  client.on(
    Events.InteractionCreate,
    wrapEvent(
      "interactionCreate",
      async (interaction: Interaction) => {
        if (interaction.isChatInputCommand()) {
          const handler = commands.get(interaction.commandName);
          if (!handler) {
            logger.warn({ evt: "cmd_unknown", cmd: interaction.commandName }, "[router] unknown command");
            return;
          }
          await runWithCtx(
            { kind: "slash", cmd: interaction.commandName, userId: interaction.user.id, guildId: interaction.guildId },
            () => handler(interaction)
          );
          return;
        }

        if (interaction.isButton() && GIVEAWAY_JOIN_RE.test(interaction.customId)) {
          await runWithCtx(
            { kind: "button", cmd: interaction.customId, userId: interaction.user.id, guildId: interaction.guildId },
            () => handleJoin(interaction)
          );
        }
      },
      INTERACTION_EVENT_TIMEOUT_MS
    )
  );

  client.on(Events.Error, (err) => {
    logger.error({ evt: "client_error", err }, "[client] discord.js client error");
  });

  // ===== Coordinated Graceful Shutdown =====
  // ORDER: stop schedulers → remove listeners → destroy client → close DB → flush Sentry
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    try {
      scanner.stop();
      heartbeat.stop();
      client.removeAllListeners();
      await client.destroy();
      closeDatabase(db);
      await flushSentry();
      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => {
    gracefulShutdown("SIGTERM").catch((err) => logger.error({ err }, "[shutdown] failed"));
  });
  process.on("SIGINT", () => {
    gracefulShutdown("SIGINT").catch((err) => logger.error({ err }, "[shutdown] failed"));
  });

  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot outside the test runner
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
