/**
 * Giveaway Bot — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 *       This hook is the only path from the wrappers' failure logs to Sentry.
 * WHY: One structured logger for commands, schedulers and the store.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io/#/docs/api
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";
import { classifyError, shouldReportToSentry } from "./errors.js";

/**
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * Mention pattern: @everyone/@here must never be echoed raw from user input.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const mentionRe = /@(everyone|here)/gi;

// Warn once per process if the Sentry module cannot be loaded.
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled data
 * (giveaway titles, prize text). Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Vitest runs stay quiet unless LOG_LEVEL asks otherwise; tests that care
 * about log calls mock this module anyway.
 */
const isVitest = !!process.env.VITEST_WORKER_ID;
const logLevel = process.env.LOG_LEVEL ?? (isVitest ? "silent" : "info");
const wantPretty = !isVitest && process.env.LOG_PRETTY === "true" && process.stdout.isTTY;

function serializeErr(e: unknown) {
  if (!(e instanceof Error)) return e;
  const code = "code" in e ? e.code : undefined;
  return { name: e.name, code, message: e.message, stack: e.stack };
}

function findError(first: unknown): Error | undefined {
  if (first instanceof Error) return first;
  if (first && typeof first === "object" && "err" in first && first.err instanceof Error) {
    return first.err;
  }
  return undefined;
}

/** Primitive fields of the log object become the Sentry context; `err` is the event itself. */
function logContext(first: unknown): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  if (!first || typeof first !== "object") return context;
  for (const [key, value] of Object.entries(first)) {
    if (key === "err") continue;
    if (value === null || ["string", "number", "boolean"].includes(typeof value)) {
      context[key] = value;
    }
  }
  return context;
}

/**
 * Forwards the Error carried by an error-level log to Sentry, unless it is
 * noise (user input, expired interactions, deleted messages).
 */
export async function reportErrorLog(first: unknown, message: string | undefined, level: string): Promise<void> {
  const errorCandidate = findError(first);
  if (!errorCandidate || !shouldReportToSentry(classifyError(errorCandidate))) return;
  try {
    // Dynamic import keeps Sentry optional and avoids a logger <-> sentry cycle.
    const { captureException, isSentryEnabled } = await import("./sentry.js");
    if (isSentryEnabled()) {
      captureException(errorCandidate, { ...logContext(first), message, level });
    }
  } catch (importErr) {
    if (!sentryImportWarned) {
      sentryImportWarned = true;
      console.warn("[logger] Failed to import Sentry module:", String(importErr));
    }
  }
}

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
  base: undefined,
  serializers: { err: serializeErr },
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const message = typeof args[1] === "string" ? args[1] : undefined;
        void reportErrorLog(args[0], message, pino.levels.labels[level]);
      }

      return method.apply(this, args);
    },
  },
});
