/**
 * Grindboard — tests/features/leaderboard.test.ts
 * WHAT: Channel resolution and replacing the public leaderboard post.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ChannelType } from "discord.js";
import type { Db } from "../../src/db/db.js";
import type { BotDeps } from "../../src/config.js";
import { postLeaderboard, resolveTextChannel } from "../../src/features/leaderboard.js";
import { updatePoints } from "../../src/features/points.js";
import { ConfigError } from "../../src/lib/errors.js";
import {
  createDiscordAPIError,
  createMockClient,
  createMockMessage,
  createMockTextChannel,
  createMockUser,
} from "../utils/discordMocks.js";
import { createTestDeps } from "../utils/testDeps.js";

describe("resolveTextChannel", () => {
  it("returns a text channel", async () => {
    const channel = createMockTextChannel({ id: "chan-leaderboard" });
    const client = createMockClient({ channels: [channel] });
    await expect(resolveTextChannel(client, "chan-leaderboard", "Leaderboard")).resolves.toBe(channel);
  });

  it("throws a config error for missing or non-text channels", async () => {
    const voice = createMockTextChannel({ id: "chan-voice", type: ChannelType.GuildVoice });
    const client = createMockClient({ channels: [voice] });

    await expect(resolveTextChannel(client, "chan-gone", "Leaderboard")).rejects.toThrow(
      new ConfigError("❌ Leaderboard channel not found. Check configuration.", "Leaderboard")
    );
    await expect(resolveTextChannel(client, "chan-voice", "Wins")).rejects.toThrow(
      "❌ Wins channel not found. Check configuration."
    );
  });
});

describe("postLeaderboard", () => {
  let db: Db;
  let deps: BotDeps;

  beforeEach(() => {
    ({ db, deps } = createTestDeps());
  });

  afterEach(() => {
    db.close();
  });

  it("deletes the bot's previous posts and sends a fresh board", async () => {
    deps.stores.users.getOrCreate("u1", "alice");
    deps.stores.users.getOrCreate("u2", "bob");
    updatePoints(deps.stores, "u1", 40, "seed");
    updatePoints(deps.stores, "u2", 90, "seed");

    const bot = createMockUser({ id: "bot-1", bot: true });
    const oldBoard = createMockMessage({ id: "old-1", author: bot });
    const chatter = createMockMessage({ id: "chat-1", author: createMockUser({ id: "u9" }) });
    const stuck = createMockMessage({
      id: "old-2",
      author: bot,
      deleteError: createDiscordAPIError(10008, "Unknown Message", 404),
    });
    const channel = createMockTextChannel({ id: "chan-leaderboard", recent: [oldBoard, chatter, stuck] });
    const client = createMockClient({ channels: [channel] });

    const result = await postLeaderboard(client, deps);

    expect(result).toEqual({ deleted: 1, entries: 2 });
    expect(oldBoard.delete).toHaveBeenCalled();
    expect(chatter.delete).not.toHaveBeenCalled();
    expect(channel.messages.fetch).toHaveBeenCalledWith({ limit: 10 });
    expect(channel.send).toHaveBeenCalledWith({
      embeds: [
        expect.objectContaining({
          data: expect.objectContaining({
            title: "🏆 LEADERBOARD",
            description: "🥇 **<@u2>** 🟢\n    └ 90 points\n\n🥈 **<@u1>** 🟤\n    └ 40 points",
          }),
        }),
      ],
    });
  });

  it("fails with a config error when the channel is gone", async () => {
    await expect(postLeaderboard(createMockClient(), deps)).rejects.toThrow(ConfigError);
  });
});
