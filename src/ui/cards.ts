/**
 * Grindboard — src/ui/cards.ts
 * WHAT: The small green/red confirmation cards every command replies with.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { COLORS } from "../lib/constants.js";

export function successEmbed(message: string): EmbedBuilder {
  return new EmbedBuilder().setTitle("✅ Success").setDescription(message).setColor(COLORS.success);
}

export function errorEmbed(message: string): EmbedBuilder {
  return new EmbedBuilder().setTitle("❌ Error").setDescription(message).setColor(COLORS.error);
}
