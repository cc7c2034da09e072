/**
 * Giveaway Bot — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers.
 * WHY: An event handler must never crash the process; failures are classified and logged.
 * USAGE:
 *  client.on(Events.InteractionCreate, wrapEvent("interactionCreate", async (i) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { classifyError, errorContext } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

const DEFAULT_EVENT_TIMEOUT_MS = 10_000;

/**
 * Probe common identifiers (guildId, user.id, channelId) from event args so
 * error logs carry them without the handler passing them explicitly.
 */
export function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;
    if ("guildId" in arg && typeof arg.guildId === "string") {
      context.guildId = arg.guildId;
    }
    if ("channelId" in arg && typeof arg.channelId === "string") {
      context.channelId = arg.channelId;
    }
    if ("user" in arg && arg.user && typeof arg.user === "object" && "id" in arg.user) {
      context.userId = arg.user.id;
    }
  }
  return context;
}

export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
          timer.unref();
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        { evt: "event_error", event: eventName, ...errorContext(classified, contextIds), err },
        `[${eventName}] event handler failed: ${classified.message}`
      );
      // Never re-throw: the emitter has no one to hand it to.
    } finally {
      clearTimeout(timer);
    }
  };
}
