/**
 * Grindboard — src/commands/submitwin.ts
 * WHAT: /submitwin — record a revenue win as a pending submission and post its review card.
 * FLOWS: parse amount → check proof URL → sanitize → store → review card → confirm
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { MAX_DESCRIPTION_LENGTH } from "../lib/constants.js";
import { parseAmount, sanitizeInput, validateUrl } from "../lib/validation.js";
import type { BotDeps } from "../config.js";
import { postReviewCard } from "../features/reviewFlow.js";
import { successEmbed } from "../ui/cards.js";
import { formatAmount } from "../ui/submissionCard.js";

export const data = new SlashCommandBuilder()
  .setName("submitwin")
  .setDescription("Submit a win for review")
  .addStringOption((o) =>
    o.setName("amount").setDescription("Revenue amount (e.g., 100, 500, 1000)").setRequired(true)
  )
  .addStringOption((o) => o.setName("description").setDescription("Brief description of the win").setRequired(true))
  .addStringOption((o) => o.setName("proof_url").setDescription("Screenshot/proof URL (optional)"));

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  await ensureDeferred(interaction);

  ctx.step("validate");
  const amount = parseAmount(interaction.options.getString("amount", true));
  if (amount === null) {
    throw new ValidationError("amount", "❌ Invalid amount format. Please use numbers only (e.g., 100, 500, 1000)");
  }
  const proofUrl = interaction.options.getString("proof_url")?.trim() || null;
  if (proofUrl && !validateUrl(proofUrl)) {
    throw new ValidationError("proof_url", "❌ Invalid URL format. Please provide a valid URL or leave it empty.");
  }
  const description = sanitizeInput(interaction.options.getString("description", true), MAX_DESCRIPTION_LENGTH);

  const submission = await withStep(ctx, "db_write", () =>
    deps.stores.transaction(() => {
      deps.stores.users.getOrCreate(interaction.user.id, interaction.user.username);
      return deps.stores.submissions.create({
        userId: interaction.user.id,
        type: "win",
        description,
        proofUrl,
        amount,
      });
    })
  );

  await withStep(ctx, "post_card", () => postReviewCard(interaction.client, deps, submission));

  ctx.step("reply");
  await replyOrEdit(interaction, {
    embeds: [
      successEmbed(
        `✅ Win submitted for review!\n\n` +
          `**Amount:** ${formatAmount(amount)}\n` +
          `**Submission ID:** \`${submission.id}\`\n\n` +
          `A moderator will review your submission shortly.`
      ),
    ],
  });
}
