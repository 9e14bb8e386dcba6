/**
 * Grindboard — src/ui/submissionCard.ts
 * WHAT: Review card posted to the submissions channel, its approve/reject buttons, and the reviewed state.
 * FLOWS:
 *  - buildSubmissionEmbed(row) + buildReviewButtons(row) → channel.send
 *  - buildReviewedEmbed(original, outcome) + buildReviewButtons(row, true) → message.edit
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  EmbedBuilder,
  type APIEmbed,
  type Embed,
} from "discord.js";
import { COLORS } from "../lib/constants.js";
import { reviewButtonId, type ReviewScope } from "../lib/componentIds.js";
import { truncateText } from "../lib/validation.js";
import type { SubmissionRow } from "../store/index.js";

function titleCase(value: string): string {
  return value
    .split("_")
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1) : w))
    .join(" ");
}

export function formatAmount(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function reviewScopeFor(row: Pick<SubmissionRow, "submission_type">): ReviewScope {
  return row.submission_type === "scaler_application" ? "scaler" : "sub";
}

export function buildSubmissionEmbed(row: SubmissionRow): EmbedBuilder {
  const isScaler = row.submission_type === "scaler_application";
  const embed = new EmbedBuilder()
    .setTitle(isScaler ? "⚙️ Scaler Application" : `🔥 New ${titleCase(row.submission_type)} Submission`)
    .setColor(isScaler ? COLORS.purple : COLORS.orange)
    .setTimestamp(new Date(row.created_at))
    .setFooter({ text: `Submission ID: ${row.id}` })
    .addFields(
      { name: "User", value: `<@${row.user_id}>`, inline: true },
      { name: "Type", value: row.submission_type, inline: true },
      { name: "ID", value: `\`${row.id}\``, inline: true }
    );

  if (row.description) {
    embed.addFields({ name: "Description", value: truncateText(row.description) });
  }
  if (row.amount !== null) {
    embed.addFields({ name: "Amount", value: formatAmount(row.amount), inline: true });
  }
  if (row.referral_type) {
    embed.addFields({ name: "Referral Type", value: row.referral_type.toUpperCase(), inline: true });
  }
  if (row.proof_url) {
    embed.addFields({ name: "Proof", value: `[View Proof](${row.proof_url})` });
  }
  return embed;
}

export function buildReviewButtons(row: SubmissionRow, disabled = false): ActionRowBuilder<ButtonBuilder> {
  const scope = reviewScopeFor(row);
  return new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder()
      .setCustomId(reviewButtonId(scope, "approve", row.id))
      .setLabel(scope === "scaler" ? "Approve Scaler" : "Approve")
      .setStyle(ButtonStyle.Success)
      .setDisabled(disabled),
    new ButtonBuilder()
      .setCustomId(reviewButtonId(scope, "reject", row.id))
      .setLabel("Reject")
      .setStyle(ButtonStyle.Danger)
      .setDisabled(disabled)
  );
}

export type ReviewOutcome =
  | { kind: "approved"; reviewerId: string; points: number; scaler: boolean }
  | { kind: "rejected"; reviewerId: string; scaler: boolean };

/**
 * Starts from the card as it is on the message so edits made in Discord
 * survive; falls back to a fresh card when the message has no embed.
 */
export function buildReviewedEmbed(
  original: Embed | APIEmbed | null,
  row: SubmissionRow,
  outcome: ReviewOutcome
): EmbedBuilder {
  const embed = original ? EmbedBuilder.from(original) : buildSubmissionEmbed(row);
  const baseTitle = embed.data.title ?? `Submission ${row.id}`;

  if (outcome.kind === "approved") {
    embed
      .setColor(COLORS.green)
      .setTitle(outcome.scaler ? "✅ Scaler Application Approved" : `✅ ${baseTitle}`)
      .addFields({
        name: "Status",
        value: outcome.scaler
          ? `Approved by <@${outcome.reviewerId}>\n⚙️ Scaler role granted`
          : `Approved by <@${outcome.reviewerId}>\nPoints Awarded: +${outcome.points}`,
      });
    return embed;
  }

  return embed
    .setColor(COLORS.red)
    .setTitle(outcome.scaler ? "❌ Scaler Application Rejected" : `❌ ${baseTitle}`)
    .addFields({ name: "Status", value: `Rejected by <@${outcome.reviewerId}>` });
}
