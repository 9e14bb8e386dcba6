/**
 * Grindboard — src/features/activity.ts
 * WHAT: Daily activity gate: count messages per UTC day, award DAILY_ACTIVITY once at the threshold.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { POINTS } from "../lib/constants.js";
import { utcDay } from "../lib/time.js";
import { isChallengeActive, type BotDeps } from "../config.js";
import type { UserRow } from "../store/index.js";
import { updatePoints } from "./points.js";

export type ActivityResult =
  | { kind: "inactive" }
  | { kind: "counted"; messageCount: number }
  | { kind: "awarded"; messageCount: number; user: UserRow };

/**
 * The award flag flips with a conditional UPDATE, so only the message that
 * crosses the threshold grants the point.
 */
export function recordDailyActivity(
  deps: BotDeps,
  userId: string,
  username: string,
  now: Date = new Date()
): ActivityResult {
  if (!isChallengeActive(deps.config, now)) return { kind: "inactive" };
  const { stores } = deps;
  const day = utcDay(now);
  const min = deps.config.limits.minDailyMessages;

  return stores.transaction((): ActivityResult => {
    stores.users.getOrCreate(userId, username);
    const row = stores.activity.increment(userId, day);
    stores.users.touchActivity(userId, day);

    if (row.message_count < min || row.points_awarded) {
      return { kind: "counted", messageCount: row.message_count };
    }
    if (!stores.activity.markAwarded(userId, day, min)) {
      return { kind: "counted", messageCount: row.message_count };
    }

    const { user } = updatePoints(stores, userId, POINTS.DAILY_ACTIVITY, "Daily activity", {
      id: row.id,
      type: "daily_activity",
    });
    logger.info({ evt: "daily_activity_awarded", userId, day }, "[activity] Awarded daily activity point");
    return { kind: "awarded", messageCount: row.message_count, user };
  });
}
