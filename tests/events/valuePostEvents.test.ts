/**
 * Grindboard — tests/events/valuePostEvents.test.ts
 * WHAT: Reaction, pin and delete events on value-drop posts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Message, MessageReaction } from "discord.js";
import type { Db } from "../../src/db/db.js";
import type { BotDeps } from "../../src/config.js";
import { countTrackedReactions, isTrackedEmoji, onReactionChange } from "../../src/events/reactions.js";
import { onMessageDelete } from "../../src/events/messageDelete.js";
import { onChannelPinsUpdate } from "../../src/events/channelPinsUpdate.js";
import { trackValuePost } from "../../src/features/valuePosts.js";
import {
  createDiscordAPIError,
  createMockMessage,
  createMockTextChannel,
  createMockUser,
} from "../utils/discordMocks.js";
import { createTestDeps } from "../utils/testDeps.js";

function reactionOn(message: Message | Error, emoji: string, channelId = "chan-drops"): MessageReaction {
  return {
    emoji: { name: emoji },
    message: {
      id: "m1",
      channelId,
      fetch: vi.fn(async () => {
        if (message instanceof Error) throw message;
        return message;
      }),
    },
  } as unknown as MessageReaction;
}

describe("value post events", () => {
  let db: Db;
  let deps: BotDeps;
  const author = createMockUser({ id: "u1", username: "alice" });

  beforeEach(() => {
    ({ db, deps } = createTestDeps());
    trackValuePost(deps.stores, { userId: "u1", username: "alice", messageId: "m1", channelId: "chan-drops", day: "2026-01-15" });
  });

  afterEach(() => {
    db.close();
  });

  describe("reactions", () => {
    it("recognises the scored emojis", () => {
      expect(["🔥", "💎", "💯", "👍", null].map(isTrackedEmoji)).toEqual([true, true, true, false, false]);
      expect(countTrackedReactions(createMockMessage({ reactions: { "🔥": 2, "👍": 9 } }))).toEqual({
        fire: 2,
        gem: 0,
        hundred: 0,
      });
    });

    it("rescores the post from the fetched snapshot", async () => {
      const message = createMockMessage({ id: "m1", author, reactions: { "🔥": 2, "💎": 1 } });

      await onReactionChange(deps, reactionOn(message, "💎"));

      expect(deps.stores.users.require("u1").total_points).toBe(9);
      expect(deps.stores.valuePosts.require("m1")).toMatchObject({ fire_count: 2, gem_count: 1, total_points: 9 });
    });

    it("skips other emojis and other channels without fetching", async () => {
      const message = createMockMessage({ id: "m1", author, reactions: { "🔥": 1 } });
      const thumbs = reactionOn(message, "👍");
      const elsewhere = reactionOn(message, "🔥", "chan-general");

      await onReactionChange(deps, thumbs);
      await onReactionChange(deps, elsewhere);

      expect(thumbs.message.fetch).not.toHaveBeenCalled();
      expect(elsewhere.message.fetch).not.toHaveBeenCalled();
      expect(deps.stores.users.require("u1").total_points).toBe(0);
    });

    it("ignores posts by bots", async () => {
      const message = createMockMessage({ id: "m1", author: createMockUser({ id: "u1", bot: true }), reactions: { "🔥": 3 } });
      await onReactionChange(deps, reactionOn(message, "🔥"));
      expect(deps.stores.users.require("u1").total_points).toBe(0);
    });

    it("treats a deleted message as nothing to do and rethrows other fetch errors", async () => {
      await expect(
        onReactionChange(deps, reactionOn(createDiscordAPIError(10008, "Unknown Message", 404), "🔥"))
      ).resolves.toBeUndefined();
      await expect(
        onReactionChange(deps, reactionOn(createDiscordAPIError(50001, "Missing Access", 403), "🔥"))
      ).rejects.toThrow("Missing Access");
    });
  });

  describe("pins", () => {
    it("adds the bonus for newly pinned posts", async () => {
      const channel = createMockTextChannel({ id: "chan-drops", pinnedIds: ["m1", "untracked"] });

      await onChannelPinsUpdate(deps, channel);

      expect(deps.stores.valuePosts.require("m1").is_pinned).toBe(true);
      expect(deps.stores.users.require("u1").total_points).toBe(15);
    });

    it("only looks at the value-drops channel", async () => {
      const channel = createMockTextChannel({ id: "chan-general", pinnedIds: ["m1"] });
      await onChannelPinsUpdate(deps, channel);
      expect(channel.messages.fetchPinned).not.toHaveBeenCalled();
    });
  });

  describe("deletes", () => {
    it("takes back what the post earned", async () => {
      await onReactionChange(deps, reactionOn(createMockMessage({ id: "m1", author, reactions: { "💯": 1 } }), "💯"));
      expect(deps.stores.users.require("u1").total_points).toBe(5);

      await onMessageDelete(deps, createMockMessage({ id: "m1" }));

      expect(deps.stores.users.require("u1").total_points).toBe(0);
      expect(deps.stores.valuePosts.getByMessageId("m1")).toBeNull();
    });

    it("ignores untracked messages", async () => {
      await expect(onMessageDelete(deps, createMockMessage({ id: "other" }))).resolves.toBeUndefined();
    });
  });
});
