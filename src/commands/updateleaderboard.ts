/**
 * Grindboard — src/commands/updateleaderboard.ts
 * WHAT: /updateleaderboard — run the 6h leaderboard job now.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { requireAdmin } from "../lib/permissions.js";
import type { BotDeps } from "../config.js";
import { postLeaderboard } from "../features/leaderboard.js";
import { successEmbed } from "../ui/cards.js";

export const data = new SlashCommandBuilder()
  .setName("updateleaderboard")
  .setDescription("[ADMIN] Manually update the leaderboard");

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  ctx.step("permission");
  if (!(await requireAdmin(interaction, deps.config))) return;
  await ensureDeferred(interaction);

  await withStep(ctx, "post_leaderboard", () => postLeaderboard(interaction.client, deps));

  ctx.step("reply");
  await replyOrEdit(interaction, { embeds: [successEmbed("✅ Leaderboard has been updated!")] });
}
