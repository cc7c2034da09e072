/**
 * Giveaway Bot — src/lib/time.ts
 * WHAT: Unix epoch helpers. Every timestamp in the database is INTEGER seconds.
 * WHY: SQLite's datetime('now') can't be mocked; explicit seconds keep tests deterministic.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Source of "now" in Unix seconds. Injected into the engine, collector and scanner. */
export type Clock = () => number;

// Floor, not round: a sub-second timestamp must never land in the future.
export const nowUtc: Clock = () => Math.floor(Date.now() / 1000);

export const MINUTE_SECONDS = 60;
