/**
 * Giveaway Bot — src/lib/schedulerHealth.ts
 * WHAT: Health tracking for scheduled background tasks.
 * WHY: A scanner that silently fails every tick means giveaways never end;
 *      consecutive failures must be loud.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update health state → alert if threshold exceeded
 *  - getSchedulerHealth() → all states
 *  - getSchedulerHealthByName(name) → single state (heartbeat embed reads the scanner's)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  /** e.g. "giveawayScanner", "uptimeHeartbeat" */
  name: string;
  /** ms timestamps; null if never happened */
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since the last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

/**
 * Record a run result. Call once per tick, success or failure.
 *
 * @example
 * try {
 *   await tick();
 *   recordSchedulerRun("giveawayScanner", true);
 * } catch (err) {
 *   recordSchedulerRun("giveawayScanner", false);
 * }
 */
export function recordSchedulerRun(name: string, success: boolean): void {
  const now = Date.now();

  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures >= CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        evt: "scheduler_degraded",
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
        totalRuns: health.totalRuns,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

export function getSchedulerHealth(): Map<string, SchedulerHealth> {
  return new Map(schedulerHealth);
}

/** Copy of one scheduler's state, or undefined if it never ran. */
export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/** Test helper: clean slate between tests. */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
