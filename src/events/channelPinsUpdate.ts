/**
 * Grindboard — src/events/channelPinsUpdate.ts
 * WHAT: Pins changed in value-drops → diff every tracked post against the pin list, ±PINNED each change.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { TextBasedChannel } from "discord.js";
import { logger } from "../lib/logger.js";
import type { BotDeps } from "../config.js";
import { reconcilePins } from "../features/valuePosts.js";
import { syncTierRoleForUser } from "../features/tierRoles.js";

export async function onChannelPinsUpdate(deps: BotDeps, channel: TextBasedChannel): Promise<void> {
  if (channel.id !== deps.config.channels.valueDrops || channel.isDMBased()) return;

  const pinned = await channel.messages.fetchPinned();
  const changes = reconcilePins(deps.stores, channel.id, new Set(pinned.keys()));

  for (const change of changes) {
    logger.info(
      { evt: "pin_reconciled", messageId: change.post.message_id, delta: change.delta },
      "[pins] Pin state applied"
    );
    if (change.user) {
      await syncTierRoleForUser(channel.guild, change.user.user_id, change.user.tier);
    }
  }
}
