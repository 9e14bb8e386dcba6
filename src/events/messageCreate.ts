/**
 * Grindboard — src/events/messageCreate.ts
 * WHAT: Every guild message feeds the daily activity gate; value-drop posts are limited and tracked.
 * FLOWS:
 *  - value-drops channel: over the daily limit? delete + warn + DM : track as ValuePost
 *  - any channel: recordDailyActivity → role sync when the point lands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Message } from "discord.js";
import { logger } from "../lib/logger.js";
import { autoDelete } from "../lib/autoDelete.js";
import { LIMIT_WARNING_DELETE_MS } from "../lib/constants.js";
import { utcDay } from "../lib/time.js";
import type { BotDeps } from "../config.js";
import { recordDailyActivity } from "../features/activity.js";
import { isOverDailyLimit, trackValuePost } from "../features/valuePosts.js";
import { postLimitDm, postLimitWarning, sendDm } from "../features/notify.js";
import { syncTierRoleForUser } from "../features/tierRoles.js";

export type ValueDropOutcome = "tracked" | "blocked";

export async function handleValueDrop(deps: BotDeps, message: Message<true>, now: Date): Promise<ValueDropOutcome> {
  const authorId = message.author.id;
  const max = deps.config.limits.maxValuePostsPerDay;
  const day = utcDay(now);

  if (isOverDailyLimit(deps, authorId, day)) {
    try {
      await message.delete();
    } catch (err) {
      logger.warn({ evt: "value_post_delete_fail", messageId: message.id, err }, "[valuePosts] Could not remove post");
    }
    autoDelete(
      message.channel.send({ content: postLimitWarning(authorId, max), allowedMentions: { users: [authorId] } }),
      LIMIT_WARNING_DELETE_MS
    );
    await sendDm(message.client, authorId, postLimitDm(max, message.channelId));
    logger.info({ evt: "value_post_blocked", userId: authorId, day }, "[valuePosts] Daily post limit reached");
    return "blocked";
  }

  trackValuePost(deps.stores, {
    userId: authorId,
    username: message.author.username,
    messageId: message.id,
    channelId: message.channelId,
    day,
  });
  return "tracked";
}

export async function onMessageCreate(deps: BotDeps, message: Message): Promise<void> {
  if (message.author.bot || !message.inGuild()) return;
  if (message.guildId !== deps.config.guildId) return;

  const now = message.createdAt;
  if (message.channelId === deps.config.channels.valueDrops) {
    await handleValueDrop(deps, message, now);
  }

  const activity = recordDailyActivity(deps, message.author.id, message.author.username, now);
  if (activity.kind === "awarded") {
    await syncTierRoleForUser(message.guild, message.author.id, activity.user.tier);
  }
}
