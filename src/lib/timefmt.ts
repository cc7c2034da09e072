/**
 * Giveaway Bot — src/lib/timefmt.ts
 * WHAT: Timestamp formatting for announcements and the uptime heartbeat.
 * WHY: Discord renders <t:...:R> in embed fields but not footers, and staff
 *      want end times in the server's own time zone.
 * DOCS:
 *  - Discord timestamps: https://discord.com/developers/docs/reference#message-formatting
 *  - Intl.DateTimeFormat: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Intl/DateTimeFormat
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** <t:epochSec:R> → "in 5 minutes" / "2 hours ago", rendered client-side. */
export function toDiscordRel(epochSec: number): string {
  return `<t:${epochSec}:R>`;
}

/** <t:epochSec:F> → full date and time in the viewer's zone. */
export function toDiscordAbs(epochSec: number): string {
  return `<t:${epochSec}:F>`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Uptime as "DDd:HHh:MMm:SSs". Negative input (clock went backwards) shows zero.
 * formatUptime(93784) → "01d:02h:03m:04s"
 */
export function formatUptime(totalSeconds: number): string {
  const secs = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(secs / 86_400);
  const hours = Math.floor((secs % 86_400) / 3600);
  const minutes = Math.floor((secs % 3600) / 60);
  const seconds = secs % 60;
  return `${pad2(days)}d:${pad2(hours)}h:${pad2(minutes)}m:${pad2(seconds)}s`;
}

type Parts = Partial<Record<Intl.DateTimeFormatPartTypes, string>>;

function partsOf(epochSec: number, timeZone: string, withSeconds: boolean): Parts {
  const fmt = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    day: "2-digit",
    month: "short",
    year: "numeric",
    hour: "2-digit",
    minute: "2-digit",
    ...(withSeconds ? { second: "2-digit" } : {}),
    hourCycle: "h12",
    timeZoneName: "short",
  });
  const parts: Parts = {};
  for (const part of fmt.formatToParts(new Date(epochSec * 1000))) {
    parts[part.type] = part.value;
  }
  return parts;
}

function clock(p: Parts, withSeconds: boolean): string {
  const period = (p.dayPeriod ?? "").toUpperCase();
  const base = withSeconds ? `${p.hour}:${p.minute}:${p.second}` : `${p.hour}:${p.minute}`;
  return `${base} ${period} ${p.timeZoneName ?? ""}`.replace(/\s+/g, " ").trim();
}

/**
 * "19 Oct 2026, 05:30 PM UTC" in the given zone. Used for the Ends field.
 */
export function formatDateTime(epochSec: number, timeZone: string): string {
  const p = partsOf(epochSec, timeZone, false);
  return `${p.day} ${p.month} ${p.year}, ${clock(p, false)}`;
}

/** "05:30:12 PM UTC" — heartbeat LAST UPDATE. */
export function formatClockWithSeconds(epochSec: number, timeZone: string): string {
  return clock(partsOf(epochSec, timeZone, true), true);
}

/** "05:30 PM UTC" — heartbeat START. */
export function formatClock(epochSec: number, timeZone: string): string {
  return clock(partsOf(epochSec, timeZone, false), false);
}
