/**
 * Grindboard — src/commands/points.ts
 * WHAT: /points — the caller's stat card with their rank inside the top 100.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { RANK_WINDOW } from "../lib/constants.js";
import type { BotDeps } from "../config.js";
import { addRankField, buildUserStatsEmbed } from "../ui/userCards.js";

export const data = new SlashCommandBuilder().setName("points").setDescription("Check your points and stats");

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  await ensureDeferred(interaction);

  const { user, rank, ranked } = await withStep(ctx, "db_read", () => {
    const user = deps.stores.users.getOrCreate(interaction.user.id, interaction.user.username);
    return {
      user,
      rank: deps.stores.users.getRank(user.user_id, RANK_WINDOW),
      ranked: Math.min(deps.stores.users.count(), RANK_WINDOW),
    };
  });

  ctx.step("reply");
  const embed = buildUserStatsEmbed(user, {
    challengeName: deps.config.challenge.name,
    maxReferrals: deps.config.limits.maxReferrals,
    displayName: interaction.user.displayName,
  });
  addRankField(embed, rank, ranked);
  await replyOrEdit(interaction, { embeds: [embed] });
}
