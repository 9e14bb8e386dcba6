/**
 * Grindboard — src/features/leaderboard.ts
 * WHAT: Replace the public leaderboard post. Shared by /updateleaderboard and the 6h scheduler.
 * FLOWS: top 10 → embed → resolve channel → delete recent bot posts → send
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, type Client, type NewsChannel, type TextChannel } from "discord.js";
import { logger } from "../lib/logger.js";
import { ConfigError } from "../lib/errors.js";
import { LEADERBOARD_DEFAULT_LIMIT } from "../lib/constants.js";
import type { BotDeps } from "../config.js";
import { buildLeaderboardEmbed } from "../ui/leaderboardEmbed.js";

/** How far back we look for our own previous leaderboard posts. */
const CLEANUP_SCAN = 10;

export async function resolveTextChannel(
  client: Client,
  channelId: string,
  key: string
): Promise<TextChannel | NewsChannel> {
  const channel =
    client.channels.cache.get(channelId) ??
    (await client.channels.fetch(channelId).catch((err: unknown) => {
      logger.warn({ evt: "channel_fetch_fail", channelId, key, err }, "[channels] Channel fetch failed");
      return null;
    }));
  if (!channel || (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement)) {
    throw new ConfigError(`❌ ${key} channel not found. Check configuration.`, key);
  }
  return channel;
}

export interface LeaderboardPostResult {
  deleted: number;
  entries: number;
}

export async function postLeaderboard(client: Client, deps: BotDeps): Promise<LeaderboardPostResult> {
  const users = deps.stores.users.getLeaderboard(LEADERBOARD_DEFAULT_LIMIT);
  const embed = buildLeaderboardEmbed(users, { challengeName: deps.config.challenge.name });
  const channel = await resolveTextChannel(client, deps.config.channels.leaderboard, "Leaderboard");

  let deleted = 0;
  const recent = await channel.messages.fetch({ limit: CLEANUP_SCAN });
  for (const message of recent.values()) {
    if (message.author.id !== client.user?.id) continue;
    try {
      await message.delete();
      deleted++;
    } catch (err) {
      logger.warn({ evt: "leaderboard_cleanup_fail", messageId: message.id, err }, "[leaderboard] Could not delete old post");
    }
  }

  await channel.send({ embeds: [embed] });
  logger.info({ evt: "leaderboard_posted", deleted, entries: users.length }, "[leaderboard] Leaderboard updated");
  return { deleted, entries: users.length };
}
