/**
 * Grindboard — src/commands/leaderboard.ts
 * WHAT: /leaderboard [limit] — public top-N list.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { LEADERBOARD_DEFAULT_LIMIT, LEADERBOARD_MAX_LIMIT } from "../lib/constants.js";
import type { BotDeps } from "../config.js";
import { buildLeaderboardEmbed } from "../ui/leaderboardEmbed.js";

export const data = new SlashCommandBuilder()
  .setName("leaderboard")
  .setDescription("View the top 10 leaderboard")
  .addIntegerOption((o) =>
    o
      .setName("limit")
      .setDescription("How many entries to show (1-25)")
      .setMinValue(1)
      .setMaxValue(LEADERBOARD_MAX_LIMIT)
  );

/** Out-of-range values fall back to the default instead of erroring. */
export function resolveLimit(raw: number | null): number {
  if (raw === null || raw < 1 || raw > LEADERBOARD_MAX_LIMIT) return LEADERBOARD_DEFAULT_LIMIT;
  return raw;
}

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  await ensureDeferred(interaction, { ephemeral: false });

  const limit = resolveLimit(interaction.options.getInteger("limit"));
  const users = await withStep(ctx, "db_read", () => deps.stores.users.getLeaderboard(limit));

  ctx.step("reply");
  const embed = buildLeaderboardEmbed(users, {
    challengeName: deps.config.challenge.name,
    title: `🏆 TOP ${users.length} LEADERBOARD`,
  });
  await replyOrEdit(interaction, { embeds: [embed], flags: 0 });
}
