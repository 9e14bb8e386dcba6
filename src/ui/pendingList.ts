/**
 * Grindboard — src/ui/pendingList.ts
 * WHAT: /pendingsubmissions embed: oldest first, capped at PENDING_LIST_LIMIT entries.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { COLORS, PENDING_LIST_LIMIT } from "../lib/constants.js";
import type { SubmissionRow } from "../store/index.js";
import { formatAmount } from "./submissionCard.js";

export function formatPendingEntry(row: SubmissionRow): string {
  const lines = [`**User:** <@${row.user_id}>`, `**Type:** ${row.submission_type}`];
  if (row.amount !== null) lines.push(`**Amount:** ${formatAmount(row.amount)}`);
  if (row.referral_type) lines.push(`**Referral Type:** ${row.referral_type}`);
  lines.push(`**ID:** \`${row.id}\``);
  return lines.join("\n");
}

/** Caller handles the empty list. */
export function buildPendingEmbed(rows: SubmissionRow[]): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle("🔥 Pending Submissions")
    .setDescription(`Total pending: **${rows.length}**`)
    .setColor(COLORS.orange);

  for (const row of rows.slice(0, PENDING_LIST_LIMIT)) {
    embed.addFields({ name: `Submission ${row.id}`, value: formatPendingEntry(row) });
  }
  if (rows.length > PENDING_LIST_LIMIT) {
    embed.setFooter({ text: `Showing ${PENDING_LIST_LIMIT} of ${rows.length} submissions` });
  }
  return embed;
}
