/**
 * Grindboard — src/features/valuePosts.ts
 * WHAT: Value-drop bookkeeping: per-day limit, tracking, reaction rescoring, pins, deletes.
 * Every function here is store-only; the discord.js side lives in src/events.
 * FLOWS:
 *  - isOverDailyLimit → trackValuePost
 *  - applyReactionSnapshot(counts) → post total recomputed → delta to author
 *  - applyPinState / reconcilePins → ±PINNED to post and author
 *  - reverseDeletedPost → author loses the post's total, row removed
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { POINTS } from "../lib/constants.js";
import type { BotDeps } from "../config.js";
import type { ReactionCounts, Stores, UserRow, ValuePostRow } from "../store/index.js";
import { postPoints, updatePoints } from "./points.js";

export function isOverDailyLimit(deps: BotDeps, userId: string, day: string): boolean {
  return deps.stores.valuePosts.countForUserOnDay(userId, day) >= deps.config.limits.maxValuePostsPerDay;
}

export function trackValuePost(
  stores: Stores,
  input: { userId: string; username: string; messageId: string; channelId: string; day: string }
): ValuePostRow {
  return stores.transaction(() => {
    stores.users.getOrCreate(input.userId, input.username);
    const post = stores.valuePosts.create({
      userId: input.userId,
      messageId: input.messageId,
      channelId: input.channelId,
      postDate: input.day,
    });
    logger.info(
      { evt: "value_post_tracked", userId: input.userId, messageId: input.messageId },
      "[valuePosts] Tracking new value post"
    );
    return post;
  });
}

export interface PostScoreChange {
  post: ValuePostRow;
  delta: number;
  /** Null when the delta was zero and the author was not touched */
  user: UserRow | null;
}

/**
 * Rescoring from the full snapshot makes add and remove the same operation;
 * an unchanged snapshot yields delta 0 and writes no history row.
 * Returns null for messages that are not tracked.
 */
export function applyReactionSnapshot(deps: BotDeps, messageId: string, counts: ReactionCounts): PostScoreChange | null {
  const { stores, config } = deps;
  return stores.transaction((): PostScoreChange | null => {
    const post = stores.valuePosts.getByMessageId(messageId);
    if (!post) return null;

    const total = postPoints(counts, post.is_pinned, config.limits.maxPointsPerPost);
    const delta = total - post.total_points;
    stores.valuePosts.updateScore(messageId, counts, total);

    let user: UserRow | null = null;
    if (delta !== 0) {
      user = updatePoints(stores, post.user_id, delta, "Value post reactions updated", {
        id: post.id,
        type: "value_post",
      }).user;
    }
    return { post: stores.valuePosts.require(messageId), delta, user };
  });
}

/** No-op (delta 0) when the stored flag already matches. */
export function applyPinState(stores: Stores, post: ValuePostRow, pinned: boolean): PostScoreChange {
  return stores.transaction((): PostScoreChange => {
    if (post.is_pinned === pinned) return { post, delta: 0, user: null };

    const delta = pinned ? POINTS.PINNED : -POINTS.PINNED;
    stores.valuePosts.setPinned(post.message_id, pinned, post.total_points + delta);
    const { user } = updatePoints(stores, post.user_id, delta, pinned ? "Post pinned" : "Post unpinned", {
      id: post.id,
      type: "value_post",
    });
    logger.info(
      { evt: pinned ? "value_post_pinned" : "value_post_unpinned", messageId: post.message_id, delta },
      "[valuePosts] Pin state changed"
    );
    return { post: stores.valuePosts.require(post.message_id), delta, user };
  });
}

/** Compares every tracked post in the channel against the current pin list. */
export function reconcilePins(stores: Stores, channelId: string, pinnedIds: ReadonlySet<string>): PostScoreChange[] {
  const changes: PostScoreChange[] = [];
  for (const post of stores.valuePosts.listByChannel(channelId)) {
    const change = applyPinState(stores, post, pinnedIds.has(post.message_id));
    if (change.delta !== 0) changes.push(change);
  }
  return changes;
}

/**
 * The author loses whatever the post had earned (pin bonus included).
 * Null when the message was not tracked.
 */
export function reverseDeletedPost(stores: Stores, messageId: string): PostScoreChange | null {
  return stores.transaction((): PostScoreChange | null => {
    const post = stores.valuePosts.getByMessageId(messageId);
    if (!post) return null;

    let user: UserRow | null = null;
    if (post.total_points > 0) {
      user = updatePoints(stores, post.user_id, -post.total_points, "Value post deleted").user;
    }
    stores.valuePosts.deleteByMessageId(messageId);
    logger.info(
      { evt: "value_post_deleted", messageId, reversed: post.total_points },
      "[valuePosts] Removed deleted value post"
    );
    return { post, delta: post.total_points > 0 ? -post.total_points : 0, user };
  });
}
