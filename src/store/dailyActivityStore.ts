/**
 * Grindboard — src/store/dailyActivityStore.ts
 * WHAT: Per-user, per-UTC-day message counters and the once-a-day award flag.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { z } from "zod";
import { nowIso } from "../lib/time.js";

export const dailyActivityRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  activity_date: z.string(),
  message_count: z.number().int(),
  points_awarded: z.number().int().transform((v) => v !== 0),
  created_at: z.string(),
});

export type DailyActivityRow = z.infer<typeof dailyActivityRowSchema>;

export class DailyActivityStore {
  private readonly upsertStmt: Database.Statement;
  private readonly getStmt: Database.Statement;
  private readonly awardStmt: Database.Statement;
  private readonly pruneStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.upsertStmt = db.prepare(
      `INSERT INTO daily_activity (user_id, activity_date, message_count, points_awarded, created_at)
       VALUES (?, ?, 1, 0, ?)
       ON CONFLICT(user_id, activity_date) DO UPDATE SET message_count = message_count + 1`
    );
    this.getStmt = db.prepare(
      `SELECT id, user_id, activity_date, message_count, points_awarded, created_at
       FROM daily_activity WHERE user_id = ? AND activity_date = ?`
    );
    this.awardStmt = db.prepare(
      `UPDATE daily_activity SET points_awarded = 1
       WHERE user_id = ? AND activity_date = ? AND points_awarded = 0 AND message_count >= ?`
    );
    this.pruneStmt = db.prepare(`DELETE FROM daily_activity WHERE activity_date < ?`);
  }

  /** Counts one message and returns the updated row. */
  increment(userId: string, day: string): DailyActivityRow {
    this.upsertStmt.run(userId, day, nowIso());
    return dailyActivityRowSchema.parse(this.getStmt.get(userId, day));
  }

  get(userId: string, day: string): DailyActivityRow | null {
    const row: unknown = this.getStmt.get(userId, day);
    return row === undefined ? null : dailyActivityRowSchema.parse(row);
  }

  /** Flips the award flag once the threshold is met. True only for the call that flipped it. */
  markAwarded(userId: string, day: string, minMessages: number): boolean {
    return this.awardStmt.run(userId, day, minMessages).changes === 1;
  }

  /** Rows with activity_date strictly before `day`. */
  deleteBefore(day: string): number {
    return this.pruneStmt.run(day).changes;
  }
}
