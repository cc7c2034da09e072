// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates all slash command definitions for bulk registration with Discord.
// buildCommands() returns the JSON payloads that sync.ts PUTs to the guild endpoint.
//
// GOTCHA: after adding or removing a command here, guilds only see the change on the
// next sync (startup or guild join).

import { data as startGiveawayData } from "./startGiveaway.js";
import { data as testEmbedData } from "./testEmbed.js";

export function buildCommands() {
  return [startGiveawayData.toJSON(), testEmbedData.toJSON()];
}
