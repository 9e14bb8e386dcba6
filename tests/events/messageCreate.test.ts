/**
 * Grindboard — tests/events/messageCreate.test.ts
 * WHAT: Value-drop limit/tracking and the daily activity gate, driven by mocked messages.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Db } from "../../src/db/db.js";
import type { BotDeps } from "../../src/config.js";
import { onMessageCreate } from "../../src/events/messageCreate.js";
import { trackValuePost } from "../../src/features/valuePosts.js";
import { postLimitDm, postLimitWarning } from "../../src/features/notify.js";
import { createMockClient, createMockMessage, createMockUser } from "../utils/discordMocks.js";
import { createTestDeps, IN_WINDOW } from "../utils/testDeps.js";

describe("onMessageCreate", () => {
  let db: Db;
  let deps: BotDeps;
  const author = createMockUser({ id: "u1", username: "alice" });

  beforeEach(() => {
    ({ db, deps } = createTestDeps());
  });

  afterEach(() => {
    db.close();
  });

  it("ignores bots and other guilds", async () => {
    await onMessageCreate(deps, createMockMessage({ author: createMockUser({ id: "b1", bot: true }), createdAt: IN_WINDOW }));
    await onMessageCreate(deps, createMockMessage({ author, guildId: "guild-2", createdAt: IN_WINDOW }));
    await onMessageCreate(deps, createMockMessage({ author, guildId: null, createdAt: IN_WINDOW }));
    expect(deps.stores.users.count()).toBe(0);
  });

  it("tracks a value drop and counts it as activity", async () => {
    await onMessageCreate(deps, createMockMessage({ id: "m1", author, channelId: "chan-drops", createdAt: IN_WINDOW }));

    expect(deps.stores.valuePosts.require("m1")).toMatchObject({ user_id: "u1", post_date: "2026-01-15" });
    expect(deps.stores.activity.get("u1", "2026-01-15")?.message_count).toBe(1);
  });

  it("removes a post over the daily limit, warns in channel and by DM", async () => {
    vi.useFakeTimers();
    for (const id of ["m1", "m2"]) {
      trackValuePost(deps.stores, { userId: "u1", username: "alice", messageId: id, channelId: "chan-drops", day: "2026-01-15" });
    }
    const message = createMockMessage({
      id: "m3",
      author,
      channelId: "chan-drops",
      createdAt: IN_WINDOW,
      client: createMockClient({ users: [author] }),
    });

    await onMessageCreate(deps, message);

    if (!message.inGuild()) throw new Error("expected a guild message");
    expect(message.delete).toHaveBeenCalledTimes(1);
    expect(message.channel.send).toHaveBeenCalledWith({
      content: postLimitWarning("u1", 2),
      allowedMentions: { users: ["u1"] },
    });
    expect(author.send).toHaveBeenCalledWith({ content: postLimitDm(2, "chan-drops") });
    expect(deps.stores.valuePosts.getByMessageId("m3")).toBeNull();
    expect(deps.stores.activity.get("u1", "2026-01-15")?.message_count).toBe(1);
  });

  it("awards the daily point on the third message anywhere", async () => {
    for (const id of ["a", "b", "c"]) {
      await onMessageCreate(deps, createMockMessage({ id, author, channelId: "chan-general", createdAt: IN_WINDOW }));
    }
    expect(deps.stores.users.require("u1").total_points).toBe(1);
    expect(deps.stores.valuePosts.countForUserOnDay("u1", "2026-01-15")).toBe(0);
  });

  it("still tracks value drops outside the challenge window but awards nothing", async () => {
    const after = new Date("2026-04-02T10:00:00.000Z");
    await onMessageCreate(deps, createMockMessage({ id: "m1", author, channelId: "chan-drops", createdAt: after }));
    expect(deps.stores.valuePosts.require("m1").post_date).toBe("2026-04-02");
    expect(deps.stores.activity.get("u1", "2026-04-02")).toBeNull();
  });
});
