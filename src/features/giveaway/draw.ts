/**
 * Giveaway Bot — src/features/giveaway/draw.ts
 * WHAT: Uniform sampling of winners without replacement.
 * WHY: Kept apart from the engine so it can be tested with a seeded source.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { randomInt } from "node:crypto";

/** Returns an integer in [0, maxExclusive). */
export type RandomIndex = (maxExclusive: number) => number;

export const cryptoRandomIndex: RandomIndex = (maxExclusive) => randomInt(maxExclusive);

/**
 * Picks `count` distinct entries, each subset equally likely (partial Fisher–Yates).
 * Order of the result is the draw order. Input is not mutated.
 * Throws if count exceeds the pool; callers decide "insufficient" before calling.
 */
export function sampleWithoutReplacement<T>(
  pool: readonly T[],
  count: number,
  random: RandomIndex = cryptoRandomIndex
): T[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${count}`);
  }
  if (count > pool.length) {
    throw new RangeError(`cannot draw ${count} from ${pool.length}`);
  }
  const items = [...pool];
  for (let i = 0; i < count; i++) {
    const j = i + random(items.length - i);
    const picked = items[j];
    items[j] = items[i];
    items[i] = picked;
  }
  return items.slice(0, count);
}
