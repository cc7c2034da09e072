/**
 * Giveaway Bot — tests/lib/sentry.test.ts
 * WHAT: Sentry stays off without a valid DSN, and its helpers are no-ops then.
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

import {
  captureException,
  flushSentry,
  hasValidDsn,
  initializeSentry,
  isSentryEnabled,
} from "../../src/lib/sentry.js";

describe("hasValidDsn", () => {
  it("accepts a key@host/project URL", () => {
    expect(hasValidDsn("https://publickey@o0.ingest.example.com/42")).toBe(true);
  });

  it.each([undefined, "", "not a url", "https://o0.ingest.example.com/42", "https://key@host/", "ftp://key@host/1"])(
    "rejects %s",
    (dsn) => {
      expect(hasValidDsn(dsn)).toBe(false);
    }
  );
});

describe("when disabled", () => {
  it("never initializes under vitest", () => {
    initializeSentry({
      dsn: "https://publickey@o0.ingest.example.com/42",
      environment: "test",
      tracesSampleRate: 0,
      release: "dev",
    });
    expect(isSentryEnabled()).toBe(false);
  });

  it("captures nothing and flushes immediately", async () => {
    expect(captureException(new Error("x"))).toBeNull();
    await expect(flushSentry()).resolves.toBe(true);
  });
});
