/**
 * Grindboard — src/features/reviewFlow.ts
 * WHAT: Everything around a submission's review card: posting it, and handling its approve/reject buttons.
 * FLOWS:
 *  - postReviewCard(client, deps, row) → submissions channel
 *  - handleReviewButton: permission → defer → approve/reject → edit card (best effort) → roles → DM → confirm
 *  - a card that was already decided, or a referral over the cap, throws ConflictError for wrapCommand to show
 * DOCS:
 *  - Button interactions: https://discord.js.org/#/docs/discord.js/main/class/ButtonInteraction
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ButtonInteraction, Client, Guild } from "discord.js";
import { logger } from "../lib/logger.js";
import { SAFE_ALLOWED_MENTIONS, SCALER_ROLE_NAME } from "../lib/constants.js";
import { parseReviewButtonId, type ReviewAction, type ReviewScope } from "../lib/componentIds.js";
import { ensureDeferred, replyOrEdit, withSql, withStep, type CommandContext } from "../lib/cmdWrap.js";
import { ConflictError } from "../lib/errors.js";
import { isAdmin } from "../lib/permissions.js";
import type { BotDeps } from "../config.js";
import type { SubmissionRow } from "../store/index.js";
import { errorEmbed, successEmbed } from "../ui/cards.js";
import { buildReviewButtons, buildReviewedEmbed, buildSubmissionEmbed } from "../ui/submissionCard.js";
import { approveSubmission, rejectSubmission, type ReviewResult } from "./submissions.js";
import { syncTierRoleForUser } from "./tierRoles.js";
import { resolveTextChannel } from "./leaderboard.js";
import {
  scalerApprovedDm,
  scalerRejectedDm,
  sendDm,
  submissionApprovedDm,
  submissionRejectedDm,
} from "./notify.js";

/**
 * A missing submissions channel should not lose the submission itself:
 * the row is already stored and /pendingsubmissions still lists it.
 */
export async function postReviewCard(client: Client, deps: BotDeps, row: SubmissionRow): Promise<boolean> {
  try {
    const channel = await resolveTextChannel(client, deps.config.channels.submissions, "Submissions");
    await channel.send({
      embeds: [buildSubmissionEmbed(row)],
      components: [buildReviewButtons(row)],
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
    return true;
  } catch (err) {
    logger.warn(
      { evt: "review_card_post_fail", submissionId: row.id, err },
      "[review] Could not post review card"
    );
    return false;
  }
}

export function permissionDeniedMessage(scope: ReviewScope, action: ReviewAction): string {
  return scope === "scaler"
    ? `❌ You don't have permission to ${action} Scaler applications.`
    : `❌ You don't have permission to ${action} submissions.`;
}

export function reviewFailureMessage(
  scope: ReviewScope,
  result: Exclude<ReviewResult, { kind: "changed" }>
): string {
  if (result.kind === "not_found") return "❌ Submission not found.";
  if (result.kind === "referral_cap") {
    return `❌ This member already has the maximum of ${result.max} approved referrals. Reject this submission instead.`;
  }
  return `❌ This ${scope === "scaler" ? "application" : "submission"} was already ${result.status}.`;
}

export function reviewSuccessMessage(scaler: boolean, action: ReviewAction, points: number): string {
  if (scaler) {
    return action === "approve"
      ? "✅ Scaler application approved! User has been granted Scaler status."
      : "✅ Scaler application rejected.";
  }
  return action === "approve" ? `✅ Submission approved! Awarded ${points} points.` : "✅ Submission rejected.";
}

async function grantScalerRole(guild: Guild | null, userId: string): Promise<void> {
  if (!guild) return;
  const role = guild.roles.cache.find((r) => r.name === SCALER_ROLE_NAME);
  if (!role) {
    logger.warn({ evt: "scaler_role_missing", guildId: guild.id }, "[review] Scaler role not found");
    return;
  }
  try {
    const member = guild.members.cache.get(userId) ?? (await guild.members.fetch(userId));
    await member.roles.add(role, "Scaler application approved");
  } catch (err) {
    logger.warn({ evt: "scaler_role_grant_fail", userId, err }, "[review] Could not grant Scaler role");
  }
}

/**
 * Buttons carry the submission id, so cards posted before a restart keep working.
 */
export async function handleReviewButton(ctx: CommandContext<ButtonInteraction>, deps: BotDeps): Promise<void> {
  const { interaction } = ctx;
  const parsed = parseReviewButtonId(interaction.customId);
  if (!parsed) {
    logger.warn({ evt: "review_button_unknown", customId: interaction.customId }, "[review] Unrecognised button");
    return;
  }
  const { scope, action, submissionId } = parsed;

  ctx.step("permission");
  if (!isAdmin(interaction, deps.config)) {
    await replyOrEdit(interaction, { embeds: [errorEmbed(permissionDeniedMessage(scope, action))] });
    return;
  }

  await ensureDeferred(interaction);

  const result = await withStep(ctx, "db_write", () =>
    withSql(ctx, "UPDATE submissions SET status = ? WHERE id = ? AND status = 'pending'", () =>
      action === "approve"
        ? approveSubmission(deps.stores, submissionId, interaction.user.id, deps.config.limits)
        : rejectSubmission(deps.stores, submissionId, interaction.user.id)
    )
  );

  if (result.kind === "not_found") {
    await replyOrEdit(interaction, { embeds: [errorEmbed(reviewFailureMessage(scope, result))] });
    return;
  }
  if (result.kind !== "changed") {
    throw new ConflictError(
      reviewFailureMessage(scope, result),
      result.kind === "conflict" ? result.status : "pending"
    );
  }

  const { submission, points, user } = result;
  const scaler = submission.submission_type === "scaler_application";

  // Best effort; the decision is already committed.
  await withStep(ctx, "edit_card", async () => {
    const outcome =
      action === "approve"
        ? { kind: "approved" as const, reviewerId: interaction.user.id, points, scaler }
        : { kind: "rejected" as const, reviewerId: interaction.user.id, scaler };
    try {
      await interaction.message.edit({
        embeds: [buildReviewedEmbed(interaction.message.embeds[0] ?? null, submission, outcome)],
        components: [buildReviewButtons(submission, true)],
      });
    } catch (err) {
      logger.warn(
        { evt: "review_card_edit_fail", submissionId: submission.id, messageId: interaction.message.id, err },
        "[review] Could not update review card"
      );
    }
  });

  await withStep(ctx, "side_effects", async () => {
    if (action === "approve") {
      if (scaler) {
        await grantScalerRole(interaction.guild, submission.user_id);
      } else {
        await syncTierRoleForUser(interaction.guild, submission.user_id, user.tier);
      }
    }

    const dm =
      action === "approve"
        ? scaler
          ? scalerApprovedDm()
          : submissionApprovedDm(submission, points)
        : scaler
          ? scalerRejectedDm()
          : submissionRejectedDm(submission);
    await sendDm(interaction.client, submission.user_id, dm);
  });

  ctx.step("reply");
  await replyOrEdit(interaction, { embeds: [successEmbed(reviewSuccessMessage(scaler, action, points))] });
}
