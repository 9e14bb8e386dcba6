/**
 * Grindboard — src/commands/removepoints.ts
 * WHAT: /removepoints — admin deduction; refuses to take a member below zero.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { requireAdmin } from "../lib/permissions.js";
import type { BotDeps } from "../config.js";
import { successEmbed } from "../ui/cards.js";
import { applyAdminDelta, loadTarget, readAdminPointsInput, tierFooter } from "./adminShared.js";

export const data = new SlashCommandBuilder()
  .setName("removepoints")
  .setDescription("[ADMIN] Remove points from a user")
  .addUserOption((o) => o.setName("user").setDescription("The user to remove points from").setRequired(true))
  .addIntegerOption((o) =>
    o.setName("points").setDescription("Number of points to remove").setRequired(true).setMinValue(1)
  )
  .addStringOption((o) => o.setName("reason").setDescription("Reason for removing points").setRequired(true));

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
  const current = loadTarget(deps, target);
  if (current.total_points < points) {
    throw new ValidationError(
      "points",
      `❌ <@${target.id}> only has ${current.total_points} points. Cannot remove ${points}.`
    );
  }

  const user = await applyAdminDelta(ctx, deps, target, -points, reason);

  ctx.step("reply");
  await replyOrEdit(interaction, {
    embeds: [
      successEmbed(
        `✅ Removed **${points}** points from <@${target.id}>\n\n` +
          `**Reason:** ${reason}\n` +
          `**New Total:** ${user.total_points} points\n` +
          tierFooter(user, interaction)
      ),
    ],
  });
}
