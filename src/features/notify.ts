/**
 * Grindboard — src/features/notify.ts
 * WHAT: Best-effort DMs to members plus the texts they carry.
 * Closed DMs (50007) are normal; failures log at debug and return false.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import { logger } from "../lib/logger.js";
import { isDmBlocked } from "../lib/errors.js";
import type { SubmissionRow } from "../store/index.js";

export async function sendDm(client: Client, userId: string, content: string): Promise<boolean> {
  try {
    const user = await client.users.fetch(userId);
    await user.send({ content });
    return true;
  } catch (err) {
    logger.debug(
      { evt: "dm_fail", userId, blocked: isDmBlocked(err), err },
      "[notify] DM not delivered"
    );
    return false;
  }
}

export function submissionApprovedDm(row: SubmissionRow, points: number): string {
  return [
    "✅ Your submission has been approved!",
    "",
    `**Type:** ${row.submission_type}`,
    `**Points Awarded:** +${points}`,
    `**Submission ID:** \`${row.id}\``,
  ].join("\n");
}

export function submissionRejectedDm(row: SubmissionRow): string {
  return [
    "❌ Your submission was not approved.",
    "",
    `**Type:** ${row.submission_type}`,
    `**Submission ID:** \`${row.id}\``,
    "",
    "Please ensure your proof is clear and meets the requirements.",
  ].join("\n");
}

export function scalerApprovedDm(): string {
  return [
    "🎉 Congratulations! Your Scaler application has been approved!",
    "",
    "You now have access to the exclusive **Scalers Chat** and are recognized as a verified $1K+/day operator.",
    "",
    "Keep scaling! ⚙️",
  ].join("\n");
}

export function scalerRejectedDm(): string {
  return [
    "❌ Your Scaler application was not approved.",
    "",
    "Please ensure:",
    "• You have consistent $1K+/day revenue",
    "• Your proof clearly shows this revenue",
    "• Screenshots are clear and not cropped excessively",
    "",
    "You can reapply once you meet the requirements.",
  ].join("\n");
}

export function postLimitDm(maxPerDay: number, channelId: string): string {
  return [
    `⚠️ You've reached the maximum of ${maxPerDay} value posts per day.`,
    "",
    `Your message in <#${channelId}> was removed. Please try again tomorrow!`,
  ].join("\n");
}

export function postLimitWarning(userId: string, maxPerDay: number): string {
  return (
    `⚠️ <@${userId}> You've reached the maximum of **${maxPerDay} value posts per day**. ` +
    "Your message was removed. Please try again tomorrow!"
  );
}
