/**
 * Grindboard — src/commands/addpoints.ts
 * WHAT: /addpoints — admin grant with a reason recorded in points history.
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
  .setName("addpoints")
  .setDescription("[ADMIN] Add points to a user")
  .addUserOption((o) => o.setName("user").setDescription("The user to add points to").setRequired(true))
  .addIntegerOption((o) =>
    o.setName("points").setDescription("Number of points to add").setRequired(true).setMinValue(1)
  )
  .addStringOption((o) => o.setName("reason").setDescription("Reason for adding points").setRequired(true));

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  ctx.step("permission");
  if (!(await requireAdmin(interaction, deps.config))) return;
  await ensureDeferred(interaction);

  ctx.step("validate");
  const { target, points, reason } = readAdminPointsInput(interaction);
  if (points <= 0) {
    throw new ValidationError("points", "❌ Points must be greater than 0.");
  }

  loadTarget(deps, target);
  const user = await applyAdminDelta(ctx, deps, target, points, reason);

  ctx.step("reply");
  await replyOrEdit(interaction, {
    embeds: [
      successEmbed(
        `✅ Added **${formatPoints(points)}** points to <@${target.id}>\n\n` +
          `**Reason:** ${reason}\n` +
          `**New Total:** ${user.total_points} points\n` +
          tierFooter(user, interaction)
      ),
    ],
  });
}
