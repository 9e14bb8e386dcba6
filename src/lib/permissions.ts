/**
 * Grindboard — src/lib/permissions.ts
 * WHAT: Member type guard and the admin/mod check used by admin commands and review buttons.
 * DOCS:
 *  - Discord permissions: https://discord.com/developers/docs/topics/permissions
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  PermissionFlagsBits,
  type APIInteractionGuildMember,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type GuildMember,
} from "discord.js";
import type { BotConfig } from "../config.js";
import { errorEmbed } from "../ui/cards.js";
import { replyOrEdit } from "./cmdWrap.js";

export const ADMIN_DENIED_MESSAGE = "❌ You don't have permission to use admin commands.";

/**
 * Uncached members arrive as APIInteractionGuildMember: string permissions,
 * roles as a plain id array.
 */
export function isGuildMember(
  member: GuildMember | APIInteractionGuildMember | null | undefined
): member is GuildMember {
  if (!member) return false;
  return typeof member.permissions !== "string" && "roles" in member && !Array.isArray(member.roles);
}

function memberRoleIds(member: GuildMember | APIInteractionGuildMember | null): string[] {
  if (!member) return [];
  if (isGuildMember(member)) return [...member.roles.cache.keys()];
  return member.roles;
}

/**
 * Administrator permission, or the configured admin or mod role.
 */
export function isAdmin(
  interaction: ChatInputCommandInteraction | ButtonInteraction,
  config: Pick<BotConfig, "adminRoleId" | "modRoleId">
): boolean {
  if (!interaction.inGuild()) return false;
  if (interaction.memberPermissions?.has(PermissionFlagsBits.Administrator)) return true;
  const roles = memberRoleIds(interaction.member);
  return roles.includes(config.adminRoleId) || roles.includes(config.modRoleId);
}

/** Replies with the denial card and returns false for non-admins. */
export async function requireAdmin(
  interaction: ChatInputCommandInteraction,
  config: Pick<BotConfig, "adminRoleId" | "modRoleId">
): Promise<boolean> {
  if (isAdmin(interaction, config)) return true;
  await replyOrEdit(interaction, { embeds: [errorEmbed(ADMIN_DENIED_MESSAGE)] });
  return false;
}
