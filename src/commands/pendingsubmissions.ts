/**
 * Grindboard — src/commands/pendingsubmissions.ts
 * WHAT: /pendingsubmissions — oldest pending submissions first.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { requireAdmin } from "../lib/permissions.js";
import type { BotDeps } from "../config.js";
import { successEmbed } from "../ui/cards.js";
import { buildPendingEmbed } from "../ui/pendingList.js";

export const data = new SlashCommandBuilder()
  .setName("pendingsubmissions")
  .setDescription("[ADMIN] View all pending submissions");

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  ctx.step("permission");
  if (!(await requireAdmin(interaction, deps.config))) return;
  await ensureDeferred(interaction);

  const pending = await withStep(ctx, "db_read", () => deps.stores.submissions.listPending());

  ctx.step("reply");
  if (pending.length === 0) {
    await replyOrEdit(interaction, { embeds: [successEmbed("✅ No pending submissions!")] });
    return;
  }
  await replyOrEdit(interaction, { embeds: [buildPendingEmbed(pending)] });
}
