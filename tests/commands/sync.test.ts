/**
 * Giveaway Bot — tests/commands/sync.test.ts
 * WHAT: Guild command sync: payload, per-guild failure isolation, pacing.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { Routes } from "discord.js";
import { buildCommands } from "../../src/commands/buildCommands.js";
import { syncCommandsToAllGuilds, syncCommandsToGuild, type CommandRest } from "../../src/commands/sync.js";
import { logger } from "../../src/lib/logger.js";

function fakeRest(): CommandRest & { put: ReturnType<typeof vi.fn> } {
  return { put: vi.fn().mockResolvedValue([]) };
}

describe("buildCommands", () => {
  it("registers exactly the two giveaway commands", () => {
    expect(buildCommands().map((c) => c.name)).toEqual(["start-giveaway", "post-test-embed"]);
  });
});

describe("syncCommandsToGuild", () => {
  it("bulk-overwrites the guild's commands", async () => {
    const rest = fakeRest();

    await expect(syncCommandsToGuild(rest, "app-1", "guild-1")).resolves.toBe(true);
    expect(rest.put).toHaveBeenCalledWith(Routes.applicationGuildCommands("app-1", "guild-1"), {
      body: buildCommands(),
    });
  });

  it("logs and returns false instead of throwing", async () => {
    const rest = fakeRest();
    rest.put.mockRejectedValueOnce(new Error("Missing Access"));

    await expect(syncCommandsToGuild(rest, "app-1", "guild-1")).resolves.toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_sync_failed", guildId: "guild-1" }),
      "[cmdsync] failed to sync guild"
    );
  });
});

describe("syncCommandsToAllGuilds", () => {
  it("keeps going past a failing guild and counts successes", async () => {
    const rest = fakeRest();
    rest.put.mockRejectedValueOnce(new Error("Missing Access"));

    await expect(syncCommandsToAllGuilds(rest, "app-1", ["g1", "g2", "g3"], 0)).resolves.toBe(2);
    expect(rest.put).toHaveBeenCalledTimes(3);
  });

  it("waits between guilds but not after the last", async () => {
    vi.useFakeTimers();
    const rest = fakeRest();

    const done = syncCommandsToAllGuilds(rest, "app-1", ["g1", "g2"], 650);
    await vi.advanceTimersByTimeAsync(0);
    expect(rest.put).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(649);
    expect(rest.put).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    await expect(done).resolves.toBe(2);
    expect(vi.getTimerCount()).toBe(0);
  });
});
