/**
 * Grindboard — src/scheduler/leaderboardScheduler.ts
 * WHAT: Re-posts the public leaderboard every 6 hours.
 * FLOWS: start → run once now → every 6h postLeaderboard (runScheduled)
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client } from "discord.js";
import { logger } from "../lib/logger.js";
import { runScheduled } from "../lib/schedulerHealth.js";
import type { BotDeps } from "../config.js";
import { postLeaderboard } from "../features/leaderboard.js";

export const LEADERBOARD_INTERVAL_MS = 6 * 60 * 60 * 1000;

let _activeInterval: NodeJS.Timeout | null = null;

/** One run; true when the post went out. Failures are recorded and logged, never thrown. */
export async function runLeaderboardJob(client: Client, deps: BotDeps): Promise<boolean> {
  const result = await runScheduled("leaderboard", () => postLeaderboard(client, deps));
  return result !== null;
}

export function startLeaderboardScheduler(client: Client, deps: BotDeps): void {
  if (process.env.SCHEDULERS_DISABLED === "1") {
    logger.debug("[leaderboard] scheduler disabled via env flag");
    return;
  }
  if (_activeInterval) return;

  logger.info({ intervalHours: LEADERBOARD_INTERVAL_MS / 3_600_000 }, "[leaderboard] scheduler starting");
  void runLeaderboardJob(client, deps);

  _activeInterval = setInterval(() => {
    void runLeaderboardJob(client, deps);
  }, LEADERBOARD_INTERVAL_MS);
  _activeInterval.unref();
}

export function stopLeaderboardScheduler(): void {
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
    logger.info("[leaderboard] scheduler stopped");
  }
}
