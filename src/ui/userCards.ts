/**
 * Grindboard — src/ui/userCards.ts
 * WHAT: Per-member embeds: the stat card (/points, /viewuser) and the tier ladder (/mytier).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { COLORS } from "../lib/constants.js";
import { TIERS, calculateTier, isTierKey, tierEmoji, tierRoleName, type TierInfo } from "../lib/tiers.js";
import { formatPoints, truncateText } from "../lib/validation.js";
import type { PointsHistoryRow, SubmissionCounts, UserRow } from "../store/index.js";

export interface StatCardOptions {
  challengeName: string;
  maxReferrals: number;
  /** Falls back to the stored username */
  displayName?: string;
}

export function buildUserStatsEmbed(user: UserRow, opts: StatCardOptions): EmbedBuilder {
  const emoji = tierEmoji(user.tier);
  const embed = new EmbedBuilder()
    .setTitle(`${emoji} ${opts.displayName ?? user.username}'s Stats`)
    .setDescription(`Stats for <@${user.user_id}>`)
    .setColor(COLORS.blue)
    .setTimestamp(new Date())
    .setFooter({ text: opts.challengeName })
    .addFields(
      { name: "📊 Total Points", value: `**${user.total_points}** points`, inline: true },
      { name: "🎖️ Tier", value: `${emoji} **${tierRoleName(user.tier)}**`, inline: true }
    );

  if (user.is_scaler) {
    embed.addFields({ name: "⚙️ Status", value: "**Scaler** (Verified)", inline: true });
  }
  embed.addFields({ name: "🤝 Referrals", value: `${user.referral_count}/${opts.maxReferrals}`, inline: true });
  return embed;
}

export function addRankField(embed: EmbedBuilder, rank: number | null, windowSize: number): EmbedBuilder {
  if (rank === null) return embed;
  return embed.addFields({ name: "🏅 Rank", value: `**#${rank}** of ${windowSize}`, inline: true });
}

export function addHistoryField(embed: EmbedBuilder, history: PointsHistoryRow[]): EmbedBuilder {
  if (history.length === 0) return embed;
  const text = history.map((h) => `${formatPoints(h.points_change)} - ${h.reason}`).join("\n");
  return embed.addFields({ name: "📜 Recent Points History", value: truncateText(text) });
}

export function addSubmissionCountsField(embed: EmbedBuilder, counts: SubmissionCounts): EmbedBuilder {
  if (counts.approved + counts.pending + counts.rejected === 0) return embed;
  return embed.addFields({
    name: "📋 Submissions",
    value: `✅ Approved: ${counts.approved}\n⏳ Pending: ${counts.pending}\n❌ Rejected: ${counts.rejected}`,
    inline: true,
  });
}

function tierStatusLine(tier: TierInfo, currentTier: string, points: number): string {
  if (tier.key === currentTier) return "**← YOU ARE HERE**";
  if (points >= tier.min) return "✅ Completed";
  return `🔒 Need ${tier.min - points} more points`;
}

export function buildTierProgressEmbed(user: UserRow): EmbedBuilder {
  const current = isTierKey(user.tier) ? user.tier : calculateTier(user.total_points);
  const embed = new EmbedBuilder()
    .setTitle(`${tierEmoji(current)} Your Tier Progress`)
    .setDescription(`Tier progress for <@${user.user_id}>`)
    .setColor(COLORS.blue)
    .setFooter({ text: `Current Points: ${user.total_points}` });

  for (const tier of TIERS) {
    const max = Number.isFinite(tier.max) ? String(tier.max) : "∞";
    embed.addFields({
      name: `${tier.emoji} ${tier.roleName}`,
      value: `${tier.min}-${max} points\n${tierStatusLine(tier, current, user.total_points)}`,
    });
  }
  return embed;
}
