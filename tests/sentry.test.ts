/**
 * Grindboard — tests/sentry.test.ts
 * WHAT: DSN structure check, event scrubbing, and the disabled-by-default helpers.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { captureException, flushSentry, hasValidDsn, initializeSentry, isSentryEnabled, scrubEvent } from "../src/lib/sentry.js";

const FAKE_TOKEN = `${"A".repeat(24)}.${"B".repeat(6)}.${"C".repeat(27)}`;

describe("hasValidDsn", () => {
  it("needs a key, a host and a project path", () => {
    expect(hasValidDsn("https://key@o1.ingest.example.io/123")).toBe(true);
    expect(hasValidDsn("https://o1.ingest.example.io/123")).toBe(false);
    expect(hasValidDsn("https://key@o1.ingest.example.io/")).toBe(false);
  });

  it("rejects missing and unparseable values", () => {
    expect(hasValidDsn(undefined)).toBe(false);
    expect(hasValidDsn("")).toBe(false);
    expect(hasValidDsn("not a url")).toBe(false);
  });
});

describe("scrubEvent", () => {
  it("masks tokens in the message and exception values", () => {
    const event = scrubEvent({
      message: `login failed: ${FAKE_TOKEN}`,
      exception: { values: [{ value: `bad token ${FAKE_TOKEN}` }, {}] },
    });
    expect(event.message).toBe("login failed: [REDACTED_TOKEN]");
    expect(event.exception.values).toEqual([{ value: "bad token [REDACTED_TOKEN]" }, {}]);
  });
});

describe("under Vitest", () => {
  it("stays disabled and the helpers are no-ops", async () => {
    initializeSentry();
    expect(isSentryEnabled()).toBe(false);
    expect(captureException(new Error("x"))).toBeNull();
    await expect(flushSentry()).resolves.toBe(true);
  });
});
