/**
 * Grindboard — tests/lib/eventWrap.test.ts
 * WHAT: Gateway handlers never reject; failures and timeouts are logged with ids from the payload.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { wrapEvent } from "../../src/lib/eventWrap.js";
import { ctx } from "../../src/lib/reqctx.js";

vi.mock("../../src/lib/logger.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/lib/logger.js")>();
  return { ...actual, logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } };
});

import { logger } from "../../src/lib/logger.js";

describe("wrapEvent", () => {
  it("runs the handler inside an event context", async () => {
    const seen: unknown[] = [];
    const handler = wrapEvent("messageCreate", async (n: number) => {
      seen.push(n, ctx().kind, ctx().cmd);
    });

    await handler(7);
    expect(seen).toEqual([7, "event", "messageCreate"]);
  });

  it("logs a failure with the ids found on the payload", async () => {
    const message = { id: "msg-9", channelId: "chan-drops", guildId: "guild-1", author: { id: "user-3" } };
    const handler = wrapEvent("messageDelete", async (_m: typeof message) => {
      throw new Error("db down");
    });

    await expect(handler(message)).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        evt: "event_error",
        event: "messageDelete",
        guildId: "guild-1",
        channelId: "chan-drops",
        userId: "user-3",
        entityId: "msg-9",
      }),
      "[messageDelete] event handler failed: db down"
    );
  });

  it("gives up waiting after the timeout", async () => {
    vi.useFakeTimers();
    const handler = wrapEvent("channelPinsUpdate", () => new Promise<void>(() => undefined), 50);

    const done = handler();
    await vi.advanceTimersByTimeAsync(50);
    await done;

    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "event_error", event: "channelPinsUpdate" }),
      "[channelPinsUpdate] event handler failed: Event handler timeout after 50ms"
    );
  });
});
