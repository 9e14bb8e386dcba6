/**
 * Grindboard — src/commands/applyscaler.ts
 * WHAT: /applyscaler — apply for the Scaler role; proof is mandatory and approval awards no points.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { MAX_DESCRIPTION_LENGTH } from "../lib/constants.js";
import { sanitizeInput, validateUrl } from "../lib/validation.js";
import type { BotDeps } from "../config.js";
import { postReviewCard } from "../features/reviewFlow.js";
import { successEmbed } from "../ui/cards.js";

export const data = new SlashCommandBuilder()
  .setName("applyscaler")
  .setDescription("Apply for Scaler status ($1K+/day verified)")
  .addStringOption((o) =>
    o
      .setName("description")
      .setDescription("Describe your revenue (e.g., 'Consistent $1.5K/day for 2 weeks')")
      .setRequired(true)
  )
  .addStringOption((o) => o.setName("proof_url").setDescription("Screenshot/proof of revenue").setRequired(true));

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  await ensureDeferred(interaction);

  const user = await withStep(ctx, "db_read", () =>
    deps.stores.users.getOrCreate(interaction.user.id, interaction.user.username)
  );

  ctx.step("validate");
  if (user.is_scaler) {
    throw new ValidationError("user", "❌ You're already verified as a Scaler!");
  }
  const proofUrl = interaction.options.getString("proof_url", true).trim();
  if (!validateUrl(proofUrl)) {
    throw new ValidationError("proof_url", "❌ Invalid URL format. Please provide a valid proof URL.");
  }
  const description = sanitizeInput(interaction.options.getString("description", true), MAX_DESCRIPTION_LENGTH);

  const submission = await withStep(ctx, "db_write", () =>
    deps.stores.submissions.create({
      userId: interaction.user.id,
      type: "scaler_application",
      description,
      proofUrl,
    })
  );

  await withStep(ctx, "post_card", () => postReviewCard(interaction.client, deps, submission));

  ctx.step("reply");
  await replyOrEdit(interaction, {
    embeds: [
      successEmbed(
        `✅ Scaler application submitted!\n\n` +
          `**Submission ID:** \`${submission.id}\`\n\n` +
          `A moderator will review your application and proof shortly. ` +
          `Once approved, you'll gain access to the Scalers chat!`
      ),
    ],
  });
}
