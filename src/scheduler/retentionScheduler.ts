/**
 * Grindboard — src/scheduler/retentionScheduler.ts
 * WHAT: Daily 03:00 UTC housekeeping: drop old daily_activity rows, log table totals.
 * FLOWS: wait until 03:00 UTC → run → every 24h
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { runScheduled } from "../lib/schedulerHealth.js";
import { ACTIVITY_RETENTION_DAYS } from "../lib/constants.js";
import { msUntilNextUtcHour, utcDayMinus } from "../lib/time.js";
import type { Stores } from "../store/index.js";

export const RETENTION_HOUR_UTC = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

let _startTimer: NodeJS.Timeout | null = null;
let _activeInterval: NodeJS.Timeout | null = null;

export interface RetentionResult {
  cutoff: string;
  deletedActivityRows: number;
  users: number;
  submissions: number;
}

export async function runRetentionJob(stores: Stores, now: Date = new Date()): Promise<RetentionResult | null> {
  return runScheduled("retention", () => {
    const cutoff = utcDayMinus(ACTIVITY_RETENTION_DAYS, now);
    const result: RetentionResult = {
      cutoff,
      deletedActivityRows: stores.activity.deleteBefore(cutoff),
      users: stores.users.count(),
      submissions: stores.submissions.count(),
    };
    logger.info({ evt: "retention_done", ...result }, "[retention] Daily cleanup complete");
    return result;
  });
}

export function startRetentionScheduler(stores: Stores): void {
  if (process.env.SCHEDULERS_DISABLED === "1") {
    logger.debug("[retention] scheduler disabled via env flag");
    return;
  }
  if (_startTimer || _activeInterval) return;

  const delay = msUntilNextUtcHour(RETENTION_HOUR_UTC);
  logger.info({ firstRunInMinutes: Math.round(delay / 60_000) }, "[retention] scheduler starting");

  _startTimer = setTimeout(() => {
    _startTimer = null;
    void runRetentionJob(stores);
    _activeInterval = setInterval(() => {
      void runRetentionJob(stores);
    }, DAY_MS);
    _activeInterval.unref();
  }, delay);
  _startTimer.unref();
}

export function stopRetentionScheduler(): void {
  if (_startTimer) {
    clearTimeout(_startTimer);
    _startTimer = null;
  }
  if (_activeInterval) {
    clearInterval(_activeInterval);
    _activeInterval = null;
  }
  logger.info("[retention] scheduler stopped");
}
