/**
 * Grindboard — src/commands/setpoints.ts
 * WHAT: /setpoints — admin override of a member's total, recorded as the difference.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { requireAdmin } from "../lib/permissions.js";
import { formatPoints } from "../lib/validation.js";
import type { BotDeps } from "../config.js";
import { successEmbed } from "../ui/cards.js";
import { applyAdminDelta, loadTarget, readAdminPointsInput, tierFooter } from "./adminShared.js";

export const data = new SlashCommandBuilder()
  .setName("setpoints")
  .setDescription("[ADMIN] Set a user's total points")
  .addUserOption((o) => o.setName("user").setDescription("The user to set points for").setRequired(true))
  .addIntegerOption((o) => o.setName("points").setDescription("New total points").setRequired(true).setMinValue(0))
  .addStringOption((o) => o.setName("reason").setDescription("Reason for setting points").setRequired(true));

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  ctx.step("permission");
  if (!(await requireAdmin(interaction, deps.config))) return;
  await ensureDeferred(interaction);

  ctx.step("validate");
  const { target, points, reason } = readAdminPointsInput(interaction);
  if (points < 0) {
    throw new ValidationError("points", "❌ Points cannot be negative.");
  }

  const previous = loadTarget(deps, target).total_points;
  const diff = points - previous;
  if (diff === 0) {
    ctx.step("reply");
    await replyOrEdit(interaction, {
      embeds: [successEmbed(`ℹ️ <@${target.id}> already has **${points}** points. Nothing was changed.`)],
    });
    return;
  }
  const user = await applyAdminDelta(ctx, deps, target, diff, `Points set by admin: ${reason}`);

  ctx.step("reply");
  await replyOrEdit(interaction, {
    embeds: [
      successEmbed(
        `✅ Set <@${target.id}>'s points to **${points}**\n\n` +
          `**Reason:** ${reason}\n` +
          `**Previous Total:** ${previous} points\n` +
          `**Change:** ${formatPoints(diff)}\n` +
          tierFooter(user, interaction)
      ),
    ],
  });
}
