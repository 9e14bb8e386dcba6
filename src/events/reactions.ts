/**
 * Grindboard — src/events/reactions.ts
 * WHAT: messageReactionAdd / messageReactionRemove → rescore the value post from its full reaction snapshot.
 * Add and remove share one path: the snapshot, not the event, decides the score.
 * DOCS:
 *  - Partials: https://discordjs.guide/popular-topics/partials.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Message, MessageReaction, PartialMessageReaction } from "discord.js";
import { logger } from "../lib/logger.js";
import { classifyError } from "../lib/errors.js";
import { TRACK_EMOJIS } from "../lib/constants.js";
import type { BotDeps } from "../config.js";
import type { ReactionCounts } from "../store/index.js";
import { applyReactionSnapshot } from "../features/valuePosts.js";
import { syncTierRoleForUser } from "../features/tierRoles.js";

const TRACKED: ReadonlySet<string> = new Set(Object.values(TRACK_EMOJIS));

export function isTrackedEmoji(name: string | null): boolean {
  return name !== null && TRACKED.has(name);
}

export function countTrackedReactions(message: Pick<Message, "reactions">): ReactionCounts {
  const count = (emoji: string) => message.reactions.cache.get(emoji)?.count ?? 0;
  return {
    fire: count(TRACK_EMOJIS.fire),
    gem: count(TRACK_EMOJIS.gem),
    hundred: count(TRACK_EMOJIS.hundred),
  };
}

export async function onReactionChange(deps: BotDeps, reaction: MessageReaction | PartialMessageReaction): Promise<void> {
  if (!isTrackedEmoji(reaction.emoji.name)) return;
  if (reaction.message.channelId !== deps.config.channels.valueDrops) return;

  let message: Message;
  try {
    message = await reaction.message.fetch();
  } catch (err) {
    const classified = classifyError(err);
    if (classified.kind === "discord_api" && classified.code === 10008) {
      logger.warn({ evt: "reaction_message_missing", messageId: reaction.message.id }, "[reactions] Message not found");
      return;
    }
    throw err;
  }
  if (message.author.bot) return;

  const counts = countTrackedReactions(message);
  const change = applyReactionSnapshot(deps, message.id, counts);
  if (!change) return;

  logger.debug(
    { evt: "reactions_rescored", messageId: message.id, ...counts, delta: change.delta },
    "[reactions] Updated reactions"
  );
  if (change.user) {
    await syncTierRoleForUser(message.guild, change.user.user_id, change.user.tier);
  }
}
