/**
 * Grindboard — src/commands/mytier.ts
 * WHAT: /mytier — every tier with the caller's position on the ladder.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import type { BotDeps } from "../config.js";
import { buildTierProgressEmbed } from "../ui/userCards.js";

export const data = new SlashCommandBuilder()
  .setName("mytier")
  .setDescription("Check your current tier and progress");

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  await ensureDeferred(interaction);

  const user = await withStep(ctx, "db_read", () =>
    deps.stores.users.getOrCreate(interaction.user.id, interaction.user.username)
  );

  ctx.step("reply");
  await replyOrEdit(interaction, { embeds: [buildTierProgressEmbed(user)] });
}
