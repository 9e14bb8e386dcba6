/**
 * Grindboard — src/commands/submitreferral.ts
 * WHAT: /submitreferral — a WHOP or Discord referral, capped at MAX_REFERRALS per member (approved plus pending).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { ValidationError } from "../lib/errors.js";
import { MAX_USERNAME_LENGTH, REFERRAL_TYPES } from "../lib/constants.js";
import { sanitizeInput, validateUrl } from "../lib/validation.js";
import type { BotDeps } from "../config.js";
import { referralPoints } from "../features/points.js";
import { postReviewCard } from "../features/reviewFlow.js";
import { successEmbed } from "../ui/cards.js";

export const data = new SlashCommandBuilder()
  .setName("submitreferral")
  .setDescription("Submit a referral for review")
  .addStringOption((o) =>
    o
      .setName("referral_type")
      .setDescription("Type of referral (whop or discord)")
      .setRequired(true)
      .addChoices({ name: "WHOP Referral", value: "whop" }, { name: "Discord Referral", value: "discord" })
  )
  .addStringOption((o) => o.setName("username").setDescription("Username of the person referred").setRequired(true))
  .addStringOption((o) => o.setName("proof_url").setDescription("Proof URL (optional)"));

export async function execute(ctx: CommandContext, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  const max = deps.config.limits.maxReferrals;
  await ensureDeferred(interaction);

  ctx.step("validate");
  const rawType = interaction.options.getString("referral_type", true);
  const referralType = REFERRAL_TYPES.find((t) => t === rawType);
  if (!referralType) {
    throw new ValidationError("referral_type", "❌ Unknown referral type.");
  }

  const { user, pending } = await withStep(ctx, "db_read", () => ({
    user: deps.stores.users.getOrCreate(interaction.user.id, interaction.user.username),
    pending: deps.stores.submissions.countPending(interaction.user.id, "referral"),
  }));
  const used = user.referral_count + pending;
  if (used >= max) {
    throw new ValidationError("referral_type", `❌ You've reached the maximum of ${max} referrals!`);
  }

  const proofUrl = interaction.options.getString("proof_url")?.trim() || null;
  if (proofUrl && !validateUrl(proofUrl)) {
    throw new ValidationError("proof_url", "❌ Invalid URL format. Please provide a valid URL or leave it empty.");
  }
  const username = sanitizeInput(interaction.options.getString("username", true), MAX_USERNAME_LENGTH);

  const submission = await withStep(ctx, "db_write", () =>
    deps.stores.submissions.create({
      userId: interaction.user.id,
      type: "referral",
      description: `Referred: ${username}`,
      proofUrl,
      referralType,
    })
  );

  await withStep(ctx, "post_card", () => postReviewCard(interaction.client, deps, submission));

  ctx.step("reply");
  await replyOrEdit(interaction, {
    embeds: [
      successEmbed(
        `✅ Referral submitted for review!\n\n` +
          `**Type:** ${referralType.toUpperCase()}\n` +
          `**Username:** ${username}\n` +
          `**Potential Points:** +${referralPoints(referralType)}\n` +
          `**Submission ID:** \`${submission.id}\`\n\n` +
          `Referrals remaining: ${max - used - 1}/${max}`
      ),
    ],
  });
}
