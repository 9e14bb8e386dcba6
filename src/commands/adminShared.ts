/**
 * Grindboard — src/commands/adminShared.ts
 * WHAT: The point-adjustment path shared by /addpoints, /removepoints and /setpoints.
 * FLOWS: get-or-create target → updatePoints → best-effort tier role sync
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ChatInputCommandInteraction, User } from "discord.js";
import { logger } from "../lib/logger.js";
import { withStep, type CommandContext } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { MAX_DESCRIPTION_LENGTH } from "../lib/constants.js";
import { sanitizeInput } from "../lib/validation.js";
import type { BotDeps } from "../config.js";
import type { UserRow } from "../store/index.js";
import { updatePoints } from "../features/points.js";
import { syncTierRoleForUser, tierMention } from "../features/tierRoles.js";

export interface AdminPointsInput {
  target: User;
  points: number;
  reason: string;
}

export function readAdminPointsInput(interaction: ChatInputCommandInteraction): AdminPointsInput {
  const reason = sanitizeInput(interaction.options.getString("reason", true), MAX_DESCRIPTION_LENGTH);
  if (!reason) {
    throw new ValidationError("reason", "❌ Please provide a reason.");
  }
  return {
    target: interaction.options.getUser("user", true),
    points: interaction.options.getInteger("points", true),
    reason,
  };
}

/** Current row for the target, created on first sight. */
export function loadTarget(deps: BotDeps, target: User): UserRow {
  return deps.stores.users.getOrCreate(target.id, target.username);
}

export async function applyAdminDelta(
  ctx: CommandContext,
  deps: BotDeps,
  target: User,
  delta: number,
  reason: string
): Promise<UserRow> {
  const { user } = await withStep(ctx, "db_write", () => updatePoints(deps.stores, target.id, delta, reason));
  logger.info(
    { evt: "admin_points", adminId: ctx.interaction.user.id, userId: target.id, delta, reason },
    "[admin] Points adjusted"
  );
  await withStep(ctx, "role_sync", () => syncTierRoleForUser(ctx.interaction.guild, target.id, user.tier));
  return user;
}

/** Tail shared by every points confirmation. */
export function tierFooter(user: UserRow, interaction: ChatInputCommandInteraction): string {
  return `**Tier:** ${tierMention(user.tier, interaction.guild)}\n🎖️ Discord role updated automatically!`;
}
