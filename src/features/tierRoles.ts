/**
 * Grindboard — src/features/tierRoles.ts
 * WHAT: Keeps each member's tier role in line with their stored tier.
 * FLOWS:
 *  - resolveTierRoles(guild) → Map<TierKey, Role> (roles are found by name)
 *  - syncMemberTierRole(member, tier, roles) → remove other tier roles, add the right one
 *  - syncTierRoleForUser(guild, userId, tier) → best-effort variant used after point changes
 *  - reconcileAllTierRoles(guild, stores) → hourly job body
 * DOCS:
 *  - GuildMemberRoleManager: https://discord.js.org/#/docs/discord.js/main/class/GuildMemberRoleManager
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildMember, Role } from "discord.js";
import { logger } from "../lib/logger.js";
import { TIERS, calculateTier, isTierKey, tierRoleName, type TierKey } from "../lib/tiers.js";
import type { Stores } from "../store/index.js";

const ROLE_REASON = "Tier update";

export function resolveTierRoles(guild: Guild): Map<TierKey, Role> {
  const roles = new Map<TierKey, Role>();
  for (const tier of TIERS) {
    const role = guild.roles.cache.find((r) => r.name === tier.roleName);
    if (role) roles.set(tier.key, role);
  }
  return roles;
}

/** Role mention when the tier role exists in the guild, otherwise its name. */
export function tierMention(tier: string, guild: Guild | null): string {
  const name = tierRoleName(tier);
  const role = guild?.roles.cache.find((r) => r.name === name);
  return role ? `<@&${role.id}>` : name;
}

/**
 * Returns true when the member's roles were changed. A tier whose role
 * does not exist in the guild leaves the member untouched.
 */
export async function syncMemberTierRole(
  member: GuildMember,
  tier: TierKey,
  tierRoles: Map<TierKey, Role>
): Promise<boolean> {
  const target = tierRoles.get(tier);
  if (!target) return false;

  const stale = [...tierRoles.entries()]
    .filter(([key, role]) => key !== tier && member.roles.cache.has(role.id))
    .map(([, role]) => role);
  const hasTarget = member.roles.cache.has(target.id);

  if (stale.length === 0 && hasTarget) return false;

  if (stale.length > 0) {
    await member.roles.remove(stale, ROLE_REASON);
  }
  if (!hasTarget) {
    await member.roles.add(target, ROLE_REASON);
  }
  return true;
}

/**
 * Called right after a handler changed someone's points so the role does
 * not wait for the hourly job. Failures are logged and dropped.
 */
export async function syncTierRoleForUser(guild: Guild | null, userId: string, tier: string): Promise<void> {
  if (!guild || !isTierKey(tier)) return;
  try {
    const member = guild.members.cache.get(userId) ?? (await guild.members.fetch(userId));
    const changed = await syncMemberTierRole(member, tier, resolveTierRoles(guild));
    if (changed) {
      logger.info({ evt: "tier_role_synced", userId, tier }, "[tierRoles] Updated tier role");
    }
  } catch (err) {
    logger.debug({ evt: "tier_role_sync_fail", userId, tier, err }, "[tierRoles] Best-effort role sync failed");
  }
}

export interface ReconcileResult {
  updated: number;
  skipped: number;
  failed: number;
}

/**
 * Walks every user row. The tier comes from total_points, not the stored tier
 * column. Members no longer in the guild are skipped; a failure for one member
 * is logged and the walk continues.
 */
export async function reconcileAllTierRoles(guild: Guild, stores: Stores): Promise<ReconcileResult> {
  const result: ReconcileResult = { updated: 0, skipped: 0, failed: 0 };
  const tierRoles = resolveTierRoles(guild);
  if (tierRoles.size === 0) {
    logger.warn({ evt: "tier_roles_missing", guildId: guild.id }, "[tierRoles] No tier roles found in guild");
    return result;
  }

  for (const user of stores.users.all()) {
    const member = guild.members.cache.get(user.user_id);
    if (!member) {
      result.skipped++;
      continue;
    }
    try {
      if (await syncMemberTierRole(member, calculateTier(user.total_points), tierRoles)) {
        result.updated++;
      }
    } catch (err) {
      result.failed++;
      logger.error({ evt: "tier_role_update_fail", userId: user.user_id, err }, "[tierRoles] Error updating roles");
    }
  }
  return result;
}
