/**
 * Giveaway Bot — src/lib/constants.ts
 * WHAT: Centralized application constants for timeouts, delays, and limits
 * WHY: Single source of truth for magic numbers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/** Suppresses all @mentions (users, roles, everyone/here). */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

/**
 * Result announcements ping winners and nobody else.
 */
export const WINNER_ALLOWED_MENTIONS: MessageMentionOptions = { parse: ["users"] };

// ===== Discord API Rate Limits & Constraints =====

/** Command sync rate limit buffer between guilds (keeps us under 2 req/sec) */
export const DISCORD_COMMAND_SYNC_DELAY_MS = 650;

/** Embed field values are capped at 1024 characters */
export const EMBED_FIELD_MAX_LENGTH = 1024;

// ===== Giveaway Limits =====

/** 28 days */
export const GIVEAWAY_MAX_DURATION_MINUTES = 40_320;

export const GIVEAWAY_MAX_WINNERS = 50;

/** Slash command string option cap; also bounds what we store */
export const GIVEAWAY_TEXT_MAX_LENGTH = 256;

/** customId prefix for the join button: giveaway:join:<id> */
export const GIVEAWAY_JOIN_PREFIX = "giveaway:join:";

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** Scanner runs its first tick this long after start, so the gateway has settled */
export const SCANNER_INITIAL_DELAY_MS = 5000;
