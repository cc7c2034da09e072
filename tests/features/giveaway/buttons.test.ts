/**
 * Giveaway Bot — tests/features/giveaway/buttons.test.ts
 * WHAT: Join button handler: custom id parsing and ephemeral replies.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  redact: (value: string) => value,
}));

import { MessageFlags } from "discord.js";
import {
  GIVEAWAY_JOIN_RE,
  makeJoinButtonHandler,
  parseJoinCustomId,
} from "../../../src/features/giveaway/buttons.js";
import { joinButtonCustomId } from "../../../src/features/giveaway/embeds.js";
import { EntryCollector } from "../../../src/features/giveaway/entries.js";
import { GiveawayEngine } from "../../../src/features/giveaway/engine.js";
import type { GiveawayStore } from "../../../src/features/giveaway/store.js";
import { FakePresenter, TestClock, createTestStore, giveawayInput } from "../../utils/giveawayHarness.js";
import { createMockButtonInteraction, createMockUser } from "../../utils/discordMocks.js";

describe("parseJoinCustomId", () => {
  it("extracts the giveaway id", () => {
    expect(parseJoinCustomId("giveaway:join:15")).toBe(15);
  });

  it.each(["giveaway:join:", "giveaway:join:abc", "giveaway:join:-1", "giveaway:leave:3", "other:join:3"])(
    "rejects %s",
    (customId) => {
      expect(parseJoinCustomId(customId)).toBeNull();
    }
  );

  it("reads back the custom id the join button is built with", () => {
    expect(joinButtonCustomId(42)).toBe("giveaway:join:42");
    expect(GIVEAWAY_JOIN_RE.test(joinButtonCustomId(42))).toBe(true);
    expect(parseJoinCustomId(joinButtonCustomId(42))).toBe(42);
  });

  it("rejects ids beyond the safe integer range", () => {
    expect(parseJoinCustomId("giveaway:join:99999999999999999999")).toBeNull();
  });
});

describe("join button handler", () => {
  let store: GiveawayStore;
  let clock: TestClock;
  let engine: GiveawayEngine;
  let collector: EntryCollector;
  let handle: ReturnType<typeof makeJoinButtonHandler>;

  beforeEach(() => {
    ({ store } = createTestStore());
    clock = new TestClock();
    engine = new GiveawayEngine(store, new FakePresenter(), { now: clock.now });
    collector = new EntryCollector(store, clock.now);
    handle = makeJoinButtonHandler(collector);
  });

  it("records the entry and confirms privately", async () => {
    const id = await engine.create(giveawayInput());
    const interaction = createMockButtonInteraction(`giveaway:join:${id}`, createMockUser({ id: "u-1" }));

    await handle(interaction);

    expect(interaction.reply).toHaveBeenCalledWith({ content: "✅ You're in!", flags: MessageFlags.Ephemeral });
    expect(store.participantIds(id)).toEqual(["u-1"]);
  });

  it("answers a second click the same way without a second entry", async () => {
    const id = await engine.create(giveawayInput());
    const user = createMockUser({ id: "u-1" });
    await handle(createMockButtonInteraction(`giveaway:join:${id}`, user));

    const again = createMockButtonInteraction(`giveaway:join:${id}`, user);
    await handle(again);

    expect(again.reply).toHaveBeenCalledWith({ content: "✅ You're in!", flags: MessageFlags.Ephemeral });
    expect(store.countParticipants(id)).toBe(1);
  });

  it("tells the user a closed giveaway has ended", async () => {
    const id = await engine.create(giveawayInput());
    clock.advanceMinutes(10);
    await engine.draw(id);
    const interaction = createMockButtonInteraction(`giveaway:join:${id}`);

    await handle(interaction);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: "⌛ This giveaway has already ended.",
      flags: MessageFlags.Ephemeral,
    });
    expect(store.countParticipants(id)).toBe(0);
  });

  it("handles a button for a giveaway that no longer exists", async () => {
    const interaction = createMockButtonInteraction("giveaway:join:999");
    await handle(interaction);
    expect(interaction.reply).toHaveBeenCalledWith({
      content: "This giveaway no longer exists.",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("handles a malformed custom id", async () => {
    const interaction = createMockButtonInteraction("giveaway:join:nope");
    await handle(interaction);
    expect(interaction.reply).toHaveBeenCalledWith({
      content: "This giveaway no longer exists.",
      flags: MessageFlags.Ephemeral,
    });
  });

  it("replies with an error and a trace id when the store fails", async () => {
    vi.spyOn(collector, "join").mockImplementation(() => {
      throw new Error("disk I/O error");
    });
    const interaction = createMockButtonInteraction("giveaway:join:1");

    await handle(interaction);

    expect(interaction.reply).toHaveBeenCalledWith({
      content: expect.stringMatching(/^❌ An unexpected error occurred\.\n-# trace `[^`]+`$/),
      flags: MessageFlags.Ephemeral,
    });
  });
});
