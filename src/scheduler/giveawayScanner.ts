/**
 * Giveaway Bot — src/scheduler/giveawayScanner.ts
 * WHAT: Periodic sweep that closes due giveaways and retries pending result announcements.
 * WHY: Nothing else ends a giveaway; if this stops, winners are never drawn.
 * FLOWS:
 *  - start() → (initial delay) → tick() → wait interval → tick() → ...
 *  - tick(): store.listDue(now) → engine.draw(id) one at a time, each isolated
 *            → store.listUnannounced() → engine.announce(id)
 * DOCS:
 *  - setTimeout: https://nodejs.org/api/timers.html#settimeoutcallback-delay-args
 *
 * NOTE: setTimeout chaining, not setInterval: the next tick is armed only after the
 * current one finishes, so a slow Discord API never stacks ticks.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { logger } from "../lib/logger.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import { SCANNER_INITIAL_DELAY_MS } from "../lib/constants.js";
import { nowUtc, type Clock } from "../lib/time.js";
import type { GiveawayEngine } from "../features/giveaway/engine.js";
import type { GiveawayStore } from "../features/giveaway/store.js";

export const GIVEAWAY_SCANNER_NAME = "giveawayScanner";

export interface GiveawayScannerOptions {
  intervalMs: number;
  initialDelayMs?: number;
  now?: Clock;
}

export type TickSummary = {
  due: number;
  closed: number;
  /** draw() returned already_closed / not_due / not_found */
  skipped: number;
  failed: number;
  reannounced: number;
};

export class GiveawayScanner {
  private timer: NodeJS.Timeout | null = null;
  private started = false;
  private readonly now: Clock;

  constructor(
    private readonly store: GiveawayStore,
    private readonly engine: GiveawayEngine,
    private readonly opts: GiveawayScannerOptions
  ) {
    this.now = opts.now ?? nowUtc;
  }

  get running(): boolean {
    return this.started;
  }

  /**
   * One sweep. A failure on one giveaway is logged and skipped; it stays due
   * and is retried next tick.
   */
  async tick(): Promise<TickSummary> {
    const summary: TickSummary = { due: 0, closed: 0, skipped: 0, failed: 0, reannounced: 0 };
    const due = this.store.listDue(this.now());
    summary.due = due.length;
    const attempted = new Set<number>();

    for (const giveaway of due) {
      attempted.add(giveaway.id);
      try {
        const result = await this.engine.draw(giveaway.id);
        if (result.status === "winners" || result.status === "insufficient_participants") {
          summary.closed++;
        } else {
          summary.skipped++;
        }
      } catch (err) {
        summary.failed++;
        logger.error(
          { evt: "giveaway_draw_failed", giveawayId: giveaway.id, err },
          "[giveaway:scanner] draw failed; will retry next tick"
        );
      }
    }

    // Closed on an earlier tick but the result edit never landed.
    // draw() already tried once for anything closed just now.
    for (const giveaway of this.store.listUnannounced()) {
      if (attempted.has(giveaway.id)) continue;
      const outcome = await this.engine.announce(giveaway.id);
      if (outcome === "announced" || outcome === "message_gone") summary.reannounced++;
    }

    if (summary.due > 0 || summary.reannounced > 0) {
      logger.info({ evt: "giveaway_scan", ...summary }, "[giveaway:scanner] tick complete");
    }
    return summary;
  }

  start(): void {
    // Opt-out for tests; a live timer keeps vitest from exiting.
    if (process.env.GIVEAWAY_SCANNER_DISABLED === "1") {
      logger.debug("[giveaway:scanner] scanner disabled via env flag");
      return;
    }
    if (this.started) return;
    this.started = true;
    logger.info({ intervalMs: this.opts.intervalMs }, "[giveaway:scanner] starting giveaway scanner");
    this.schedule(this.opts.initialDelayMs ?? SCANNER_INITIAL_DELAY_MS);
  }

  stop(): void {
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.info("[giveaway:scanner] scanner stopped");
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.runAndReschedule().catch((err) => {
        logger.error({ err }, "[giveaway:scanner] scheduler loop failed");
      });
    }, delayMs);
    // Don't hold the process open for the scanner alone
    this.timer.unref();
  }

  private async runAndReschedule(): Promise<void> {
    try {
      await this.tick();
      recordSchedulerRun(GIVEAWAY_SCANNER_NAME, true);
    } catch (err) {
      recordSchedulerRun(GIVEAWAY_SCANNER_NAME, false);
      logger.error({ evt: "giveaway_scan_failed", err }, "[giveaway:scanner] tick failed");
    }
    // stop() then start() during a tick may already have armed a timer
    if (this.started && this.timer === null) this.schedule(this.opts.intervalMs);
  }
}
