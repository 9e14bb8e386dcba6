/**
 * Grindboard — src/scheduler/tierRoleScheduler.ts
 * WHAT: Hourly pass that puts every member's tier role back in line with the database.
 * FLOWS: resolve guild → refresh member cache → reconcileAllTierRoles (runScheduled)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import { logger } from "../lib/logger.js";
import { runScheduled } from "../lib/schedulerHealth.js";
import { ConfigError } from "../lib/errors.js";
import type { BotDeps } from "../config.js";
import { reconcileAllTierRoles, type ReconcileResult } from "../features/tierRoles.js";

export const TIER_ROLE_INTERVAL_MS = 60 * 60 * 1000;

let _activeInterval: NodeJS.Timeout | null = null;

async function reconcile(client: Client, deps: BotDeps): Promise<ReconcileResult> {
  const guild = client.guilds.cache.get(deps.config.guildId);
  if (!guild) throw new ConfigError("Guild not found", "GUILD_ID");

  // Reconcile reads the member cache; a stale cache only means more skips.
  try {
    await guild.members.fetch();
  } catch (err) {
    logger.warn({ evt: "member_fetch_fail", guildId: guild.id, err }, "[tierRoles] Member fetch failed; using cache");
  }
  return reconcileAllTierRoles(guild, deps.stores);
}

export async function runTierRoleJob(client: Client, deps: BotDeps): Promise<ReconcileResult | null> {
  return runScheduled("tierRoles", async () => {
    const result = await reconcile(client, deps);
    logger.info(
      { evt: "tier_roles_reconciled", ...result },
      result.updated > 0 ? "[tierRoles] Updated tier roles" : "[tierRoles] All tier roles are up to date"
    );
    return result;
  });
}

export function startTierRoleScheduler(client: Client, deps: BotDeps): void {
  if (process.env.SCHEDULERS_DISABLED === "1") {
    logger.debug("[tierRoles] scheduler disabled via env flag");
    return;
  }
  if (_activeInterval) return;

  logger.info({ intervalMinutes: TIER_ROLE_INTERVAL_MS / 60_000 }, "[tierRoles] scheduler starting");
  void runTierRoleJob(client, deps);

  _activeInterval = setInterval(() => {
    void runTierRoleJob(client, deps);
  }, TIER_ROLE_INTERVAL_MS);
  _activeInterval.unref();
}

export function stopTierRoleScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[tierRoles] scheduler stopped");
  }
}
