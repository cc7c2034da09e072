/**
 * Giveaway Bot — src/lib/errors.ts
 * WHAT: Error classes thrown by the bot plus a discriminated union for classifying anything caught.
 * WHY: Command and scheduler failure boundaries need to decide what to log, report, and show users.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - userFriendlyMessage(err) → ephemeral reply text
 * USAGE:
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10008) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown errors =====

/**
 * Invalid input to a giveaway operation (duration, winner count, prize text).
 * `field` names the offending parameter so the reply can point at it.
 */
export class InvalidParametersError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, message: string, value?: unknown) {
    super(message);
    this.name = "InvalidParametersError";
    this.field = field;
    this.value = value;
  }
}

/** Environment/configuration problem. Fatal at startup. */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.key = key;
  }
}

// ===== Classified union =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * SQLite errors from better-sqlite3.
 * SQLITE_BUSY/SQLITE_LOCKED are transient; SQLITE_CONSTRAINT_* are logic errors.
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/**
 * Discord API errors. Codes that matter here:
 * - 10003 Unknown Channel / 10008 Unknown Message (announcement deleted)
 * - 10062 Unknown Interaction (3s window expired)
 * - 50001 Missing Access / 50013 Missing Permissions
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface ValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/** Node system errors: the request never reached Discord. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface ConfigErrorInfo extends AppError {
  kind: "config";
  key: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | ValidationError
  | PermissionError
  | NetworkError
  | ConfigErrorInfo
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught error. Ordered from most specific to least:
 * our own classes, SQLite, Discord, network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof InvalidParametersError) {
    return { kind: "validation", field: err.field, value: err.value, message: err.message, cause: err };
  }
  if (err instanceof ConfigError) {
    return { kind: "config", key: err.key, message: err.message, cause: err };
  }
  if (!isRecord(err)) {
    return { kind: "unknown", message: err == null ? "Unknown error (null/undefined)" : String(err) };
  }

  const message = optionalString(err.message) ?? String(err);
  const code = err.code;
  const name = optionalString(err.name);
  const cause = err instanceof Error ? err : undefined;

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return { kind: "db_error", code: typeof code === "string" ? code : "UNKNOWN", message, cause };
  }

  // Permission codes come before the generic Discord branch so they get their own kind.
  if (code === 50013) {
    return { kind: "permission", needed: ["SendMessages", "EmbedLinks"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: optionalNumber(err.status) ?? optionalNumber(err.httpStatus),
      method: optionalString(err.method),
      path: optionalString(err.url) ?? optionalString(err.path),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optionalString(err.hostname) ?? optionalString(err.host),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Predicates =====

/** Announcement (or its channel) no longer exists on Discord's side. */
export function isUnknownResource(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && (err.code === 10003 || err.code === 10008);
}

/**
 * Sentry alerts should mean "something is broken", not "Discord had a hiccup"
 * or "a moderator typed 0 winners".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message (announcement deleted)
        10003, // Unknown channel
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
    case "validation":
    case "permission":
      return false;
    default:
      return true;
  }
}

// ===== Context helpers =====

export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code };
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed };
    case "validation":
      return { ...base, field: err.field };
    case "config":
      return { ...base, key: err.key };
    default:
      return base;
  }
}

export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "db_error":
      if (err.code === "SQLITE_BUSY") {
        return "Database is temporarily busy. Please try again.";
      }
      return "A database error occurred.";

    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try the command again.";
      }
      if (isUnknownResource(err)) {
        return "That channel or message no longer exists.";
      }
      return "Discord API error occurred.";

    case "network":
      return "Network error. Please try again in a moment.";

    case "permission":
      return `I'm missing permissions: ${err.needed.join(", ")}`;

    case "validation":
      return `Invalid ${err.field}: ${err.message}`;

    case "config":
      return `Configuration error: ${err.key} is not set correctly.`;

    default:
      return "An unexpected error occurred.";
  }
}
