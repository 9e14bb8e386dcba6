/**
 * Grindboard — src/ui/leaderboardEmbed.ts
 * WHAT: Ranked leaderboard embed shared by /leaderboard, /updateleaderboard and the 6h job.
 * FORMAT (one entry):
 *  🥇 **<@id>** 🟢 ⚙️
 *      └ 120 points
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { COLORS, MEDALS } from "../lib/constants.js";
import { tierEmoji } from "../lib/tiers.js";
import type { UserRow } from "../store/index.js";

export interface LeaderboardOptions {
  challengeName: string;
  title?: string;
}

export function rankLabel(index: number): string {
  return MEDALS[index] ?? `\`#${index + 1}\``;
}

export function formatLeaderboardLine(user: UserRow, index: number): string {
  const scalerBadge = user.is_scaler ? " ⚙️" : "";
  return `${rankLabel(index)} **<@${user.user_id}>** ${tierEmoji(user.tier)}${scalerBadge}\n    └ ${user.total_points} points`;
}

export function buildLeaderboardEmbed(users: UserRow[], opts: LeaderboardOptions): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(opts.title ?? "🏆 LEADERBOARD")
    .setColor(COLORS.gold)
    .setFooter({ text: `${opts.challengeName} • Updated` })
    .setTimestamp(new Date());

  if (users.length === 0) {
    return embed
      .setDescription(`Top performers in the ${opts.challengeName}`)
      .addFields({ name: "No Data", value: "No users on the leaderboard yet!" });
  }

  return embed.setDescription(users.map(formatLeaderboardLine).join("\n\n"));
}
