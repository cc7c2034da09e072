/**
 * Giveaway Bot — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * WHY: Error tracking that stays a no-op when no DSN is configured.
 * FLOWS: initializeSentry(opts) → isSentryEnabled → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { logger } from "./logger.js";

let sentryEnabled = false;

export type SentryOptions = {
  dsn?: string;
  environment: string;
  tracesSampleRate: number;
  release: string;
};

/**
 * Structural DSN check (https://{key}@{host}/{project}) so typos are caught
 * without a network round-trip.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

export function initializeSentry(opts: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(opts.dsn)) {
    logger.info("[sentry] DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: opts.dsn,
      environment: opts.environment,
      release: opts.release,
      tracesSampleRate: opts.tracesSampleRate,
      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(
            /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g,
            "[REDACTED_TOKEN]"
          );
        }
        return event;
      },
      ignoreErrors: ["AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });
    sentryEnabled = true;
    logger.info({ environment: opts.environment }, "[sentry] initialized");
  } catch (err) {
    logger.error({ err }, "[sentry] failed to initialize");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;
  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.setContext(name, context);
}

/** Flush pending events before exit. */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.flush(timeout);
  } catch (err) {
    logger.warn({ err }, "[sentry] flush failed");
    return false;
  }
}
