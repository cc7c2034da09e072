/**
 * Giveaway Bot — src/scheduler/uptimeHeartbeat.ts
 * WHAT: Keeps a pinned status message updated with start time and uptime.
 * WHY: Staff glance at one message to see whether the bot (and its giveaway checks) are alive.
 * FLOWS:
 *  - markConnected() on every gateway (re)connect → resets the start time
 *  - every N seconds → beat(): fetch status message once (cached) → edit embed
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Colors, EmbedBuilder, type Client, type Message } from "discord.js";
import { logger } from "../lib/logger.js";
import { classifyError, isUnknownResource } from "../lib/errors.js";
import { getSchedulerHealthByName, recordSchedulerRun, type SchedulerHealth } from "../lib/schedulerHealth.js";
import { formatClock, formatClockWithSeconds, formatUptime } from "../lib/timefmt.js";
import { nowUtc, type Clock } from "../lib/time.js";
import { GIVEAWAY_SCANNER_NAME } from "./giveawayScanner.js";

export const UPTIME_HEARTBEAT_NAME = "uptimeHeartbeat";

export interface UptimeHeartbeatOptions {
  channelId?: string;
  messageId?: string;
  serverName: string;
  timeZone: string;
  intervalMs: number;
  now?: Clock;
}

export type HeartbeatView = {
  serverName: string;
  timeZone: string;
  startedAt: number;
  now: number;
  scanner?: SchedulerHealth;
};

function scannerLine(health: SchedulerHealth | undefined): string {
  if (!health) return "Giveaway checks: not run yet";
  if (health.consecutiveFailures > 0) {
    return `Giveaway checks: ${health.consecutiveFailures} consecutive failure(s)`;
  }
  return "Giveaway checks: ok";
}

export function buildHeartbeatEmbed(view: HeartbeatView): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(`🎉 ${view.serverName} Giveaway Bot`)
    .setColor(Colors.Green)
    .addFields(
      { name: "START", value: "```" + formatClock(view.startedAt, view.timeZone) + "```", inline: false },
      { name: "UPTIME", value: "```" + formatUptime(view.now - view.startedAt) + "```", inline: false },
      { name: "LAST UPDATE", value: "```" + formatClockWithSeconds(view.now, view.timeZone) + "```", inline: false }
    )
    .setFooter({ text: scannerLine(view.scanner) });
}

export class UptimeHeartbeat {
  private timer: NodeJS.Timeout | null = null;
  private statusMessage: Message | null = null;
  private inFlight = false;
  private startedAt: number;
  private readonly now: Clock;

  constructor(
    private readonly client: Client,
    private readonly opts: UptimeHeartbeatOptions
  ) {
    this.now = opts.now ?? nowUtc;
    this.startedAt = this.now();
  }

  get configured(): boolean {
    return Boolean(this.opts.channelId && this.opts.messageId);
  }

  /** Uptime counts from the latest gateway connect, not process start. */
  markConnected(): void {
    this.startedAt = this.now();
  }

  start(): void {
    if (!this.configured) {
      logger.info("[heartbeat] STATUS_CHANNEL_ID/STATUS_MESSAGE_ID not set; uptime heartbeat skipped");
      return;
    }
    if (this.timer) return;
    logger.info({ intervalMs: this.opts.intervalMs }, "[heartbeat] starting uptime heartbeat");
    this.timer = setInterval(() => {
      this.beat().catch((err) => {
        logger.error({ err }, "[heartbeat] beat crashed");
      });
    }, this.opts.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Edit the status message once. Returns whether the edit landed.
   * Failures are logged and never thrown.
   */
  async beat(): Promise<boolean> {
    const { channelId, messageId } = this.opts;
    if (!channelId || !messageId) return false;
    // A slow edit must not overlap the next one
    if (this.inFlight) return false;
    this.inFlight = true;
    try {
      const message = this.statusMessage ?? (await this.fetchStatusMessage(channelId, messageId));
      if (!message) {
        recordSchedulerRun(UPTIME_HEARTBEAT_NAME, false);
        return false;
      }
      this.statusMessage = message;
      const embed = buildHeartbeatEmbed({
        serverName: this.opts.serverName,
        timeZone: this.opts.timeZone,
        startedAt: this.startedAt,
        now: this.now(),
        scanner: getSchedulerHealthByName(GIVEAWAY_SCANNER_NAME),
      });
      await message.edit({ content: null, embeds: [embed] });
      recordSchedulerRun(UPTIME_HEARTBEAT_NAME, true);
      return true;
    } catch (err) {
      const classified = classifyError(err);
      // Message deleted: drop the cache so the next beat refetches and logs clearly
      if (isUnknownResource(classified)) this.statusMessage = null;
      recordSchedulerRun(UPTIME_HEARTBEAT_NAME, false);
      logger.warn({ evt: "heartbeat_failed", channelId, messageId, err }, `[heartbeat] update failed: ${classified.message}`);
      return false;
    } finally {
      this.inFlight = false;
    }
  }

  private async fetchStatusMessage(channelId: string, messageId: string): Promise<Message | null> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased()) {
      logger.warn({ channelId }, "[heartbeat] status channel missing or not text-based");
      return null;
    }
    return channel.messages.fetch(messageId);
  }
}
