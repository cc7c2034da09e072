/**
 * Giveaway Bot — tests/lib/errors.test.ts
 * WHAT: classifyError and the helpers built on it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  InvalidParametersError,
  classifyError,
  errorContext,
  isUnknownResource,
  shouldReportToSentry,
  userFriendlyMessage,
} from "../../src/lib/errors.js";
import { createDiscordAPIError, createSqliteError } from "../utils/discordMocks.js";

describe("classifyError", () => {
  it("keeps the field of an InvalidParametersError", () => {
    const err = new InvalidParametersError("winners", "must be a whole number between 1 and 50", 0);
    expect(classifyError(err)).toMatchObject({ kind: "validation", field: "winners", value: 0 });
  });

  it("recognizes config errors", () => {
    expect(classifyError(new ConfigError("DB_PATH", "missing"))).toMatchObject({ kind: "config", key: "DB_PATH" });
  });

  it("recognizes SQLite errors by name or code", () => {
    expect(classifyError(createSqliteError("SQLITE_BUSY", "database is locked"))).toMatchObject({
      kind: "db_error",
      code: "SQLITE_BUSY",
    });
    expect(classifyError(Object.assign(new Error("x"), { code: "SQLITE_CONSTRAINT_UNIQUE" }))).toMatchObject({
      kind: "db_error",
      code: "SQLITE_CONSTRAINT_UNIQUE",
    });
  });

  it("recognizes Discord API errors with their HTTP status", () => {
    expect(classifyError(createDiscordAPIError(10008, "Unknown Message", 404))).toMatchObject({
      kind: "discord_api",
      code: 10008,
      httpStatus: 404,
      message: "Unknown Message",
    });
  });

  it("maps missing permissions to the permission kind", () => {
    expect(classifyError(createDiscordAPIError(50013, "Missing Permissions", 403))).toMatchObject({
      kind: "permission",
      needed: ["SendMessages", "EmbedLinks"],
    });
    expect(classifyError(createDiscordAPIError(50001, "Missing Access", 403))).toMatchObject({
      kind: "permission",
      needed: ["ViewChannel"],
    });
  });

  it("recognizes network errors", () => {
    const err = Object.assign(new Error("socket hang up"), { code: "ECONNRESET", hostname: "discord.com" });
    expect(classifyError(err)).toMatchObject({ kind: "network", code: "ECONNRESET", host: "discord.com" });
  });

  it("falls back to unknown for anything else", () => {
    expect(classifyError(new Error("plain"))).toMatchObject({ kind: "unknown", message: "plain" });
    expect(classifyError("a string")).toEqual({ kind: "unknown", message: "a string" });
    expect(classifyError(null)).toEqual({ kind: "unknown", message: "Unknown error (null/undefined)" });
  });
});

describe("predicates", () => {
  it("isUnknownResource matches Unknown Channel and Unknown Message only", () => {
    expect(isUnknownResource(classifyError(createDiscordAPIError(10003, "Unknown Channel", 404)))).toBe(true);
    expect(isUnknownResource(classifyError(createDiscordAPIError(10008, "Unknown Message", 404)))).toBe(true);
    expect(isUnknownResource(classifyError(createDiscordAPIError(10062, "Unknown interaction", 404)))).toBe(false);
  });

  it("shouldReportToSentry skips user input and Discord noise", () => {
    expect(shouldReportToSentry(classifyError(new InvalidParametersError("item", "must not be empty")))).toBe(false);
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(10008, "Unknown Message", 404)))).toBe(false);
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(30001, "Maximum guilds", 400)))).toBe(true);
    expect(shouldReportToSentry(classifyError(createSqliteError("SQLITE_CORRUPT", "malformed")))).toBe(true);
    expect(shouldReportToSentry(classifyError(new Error("bug")))).toBe(true);
  });
});

describe("errorContext", () => {
  it("adds kind-specific fields to the extra context", () => {
    const ctx = errorContext(classifyError(createDiscordAPIError(10008, "Unknown Message", 404)), { giveawayId: 4 });
    expect(ctx).toEqual({
      errorKind: "discord_api",
      errorMessage: "Unknown Message",
      giveawayId: 4,
      discordCode: 10008,
      httpStatus: 404,
      method: undefined,
      path: undefined,
    });
  });
});

describe("userFriendlyMessage", () => {
  it.each([
    [new InvalidParametersError("duration", "must be a whole number between 1 and 40320"), "Invalid duration: must be a whole number between 1 and 40320"],
    [createSqliteError("SQLITE_BUSY", "locked"), "Database is temporarily busy. Please try again."],
    [createDiscordAPIError(10062, "Unknown interaction", 404), "This interaction has expired. Please try the command again."],
    [createDiscordAPIError(10003, "Unknown Channel", 404), "That channel or message no longer exists."],
    [createDiscordAPIError(50013, "Missing Permissions", 403), "I'm missing permissions: SendMessages, EmbedLinks"],
    [new ConfigError("DB_PATH", "missing"), "Configuration error: DB_PATH is not set correctly."],
    [new Error("bug"), "An unexpected error occurred."],
  ])("%s → %s", (err, expected) => {
    expect(userFriendlyMessage(classifyError(err))).toBe(expected);
  });
});
