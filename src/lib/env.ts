/**
 * Giveaway Bot — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on a missing token or database path before any network activity starts.
 * FLOWS: load .env → trim raw values → parse/validate → typed Env
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

/**
 * Role names are matched case-insensitively, so they get lowercased here once
 * instead of on every command invocation.
 */
function parseRoleNames(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

// Snowflakes are numeric strings. An empty value means "not configured".
const optionalSnowflake = z
  .string()
  .optional()
  .transform((val) => (val ? val : undefined))
  .refine((val) => val === undefined || /^\d{5,25}$/.test(val), {
    message: "must be a numeric Discord id",
  });

const schema = z.object({
  // Core credentials - bot won't start without these
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  DB_PATH: z.string().min(1, "Missing DB_PATH"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  SERVER_NAME: z.string().min(1).default("MyServer"),
  DISPLAY_TIMEZONE: z
    .string()
    .default("Asia/Kolkata")
    .refine(isValidTimeZone, { message: "DISPLAY_TIMEZONE is not a valid IANA time zone" }),

  // Heartbeat target. Both unset = heartbeat skipped.
  STATUS_CHANNEL_ID: optionalSnowflake,
  STATUS_MESSAGE_ID: optionalSnowflake,

  GIVEAWAY_MANAGER_ROLES: z
    .string()
    .default("root,mod")
    .transform(parseRoleNames)
    .refine((roles) => roles.length > 0, { message: "GIVEAWAY_MANAGER_ROLES must name at least one role" }),

  GIVEAWAY_CHECK_INTERVAL_SECONDS: z.coerce.number().int().min(5).max(3600).default(30),
  UPTIME_INTERVAL_SECONDS: z.coerce.number().int().min(5).max(3600).default(20),

  BOT_ACTIVITY: z.string().optional(),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.output<typeof schema>;

const KEYS = Object.keys(schema.shape);

/**
 * Validates an environment-shaped record. Every value is trimmed and empty
 * strings are treated as unset, since copy-pasted .env files love trailing spaces.
 * Throws ConfigError with all issues at once (safeParse, not parse).
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const raw: Record<string, string | undefined> = {};
  for (const key of KEYS) {
    const value = source[key]?.trim();
    raw[key] = value ? value : undefined;
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`);
    const firstKey = parsed.error.issues[0]?.path.join(".") ?? "unknown";
    throw new ConfigError(firstKey, `Environment validation failed:\n${issues.join("\n")}`);
  }
  return parsed.data;
}

/**
 * Entry point helper for src/index.ts: load .env from the working directory,
 * validate, and exit(1) on failure. Nothing has touched the network yet at this point.
 */
export function loadEnvOrExit(): Env {
  const isTest = process.env.NODE_ENV === "test";
  dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

  try {
    return parseEnv(process.env);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}
