/**
 * Grindboard — src/events/messageDelete.ts
 * WHAT: A deleted value post takes its points with it.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Message, PartialMessage } from "discord.js";
import type { BotDeps } from "../config.js";
import { reverseDeletedPost } from "../features/valuePosts.js";
import { syncTierRoleForUser } from "../features/tierRoles.js";

export async function onMessageDelete(deps: BotDeps, message: Message | PartialMessage): Promise<void> {
  const change = reverseDeletedPost(deps.stores, message.id);
  if (change?.user) {
    await syncTierRoleForUser(message.guild, change.user.user_id, change.user.tier);
  }
}
