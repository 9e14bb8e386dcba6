/**
 * Grindboard — src/commands/viewuser.ts
 * WHAT: /viewuser — admin view of a member: stat card, last five history rows, submission counts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { requireAdmin } from "../lib/permissions.js";
import { VIEWUSER_HISTORY_LIMIT } from "../lib/constants.js";
import type { BotDeps } from "../config.js";
import { addHistoryField, addSubmissionCountsField, buildUserStatsEmbed } from "../ui/userCards.js";

export const data = new SlashCommandBuilder()
  .setName("viewuser")
  .setDescription("[ADMIN] View detailed user stats")
  .addUserOption((o) => o.setName("user").setDescription("The user to view").setRequired(true));

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  ctx.step("permission");
  if (!(await requireAdmin(interaction, deps.config))) return;
  await ensureDeferred(interaction);

  const target = interaction.options.getUser("user", true);
  const { user, history, counts } = await withStep(ctx, "db_read", () => ({
    user: deps.stores.users.getOrCreate(target.id, target.username),
    history: deps.stores.history.recent(target.id, VIEWUSER_HISTORY_LIMIT),
    counts: deps.stores.submissions.countsForUser(target.id),
  }));

  ctx.step("reply");
  const embed = buildUserStatsEmbed(user, {
    challengeName: deps.config.challenge.name,
    maxReferrals: deps.config.limits.maxReferrals,
    displayName: target.displayName,
  });
  addHistoryField(embed, history);
  addSubmissionCountsField(embed, counts);
  await replyOrEdit(interaction, { embeds: [embed] });
}
