/**
 * Grindboard — src/store/pointsHistoryStore.ts
 * WHAT: Append-only audit trail of point changes. Display only; totals live on users.
 * FLOWS:
 *  - append(entry) → row id
 *  - recent(userId, limit) → newest first
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { z } from "zod";
import { nowIso } from "../lib/time.js";

export const pointsHistoryRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  points_change: z.number().int(),
  reason: z.string(),
  reference_id: z.number().int().nullable(),
  reference_type: z.string().nullable(),
  created_at: z.string(),
});

export type PointsHistoryRow = z.infer<typeof pointsHistoryRowSchema>;

/** What a point change points back at, when anything. */
export interface PointsReference {
  id: number;
  type: "submission" | "value_post" | "daily_activity";
}

export class PointsHistoryStore {
  private readonly insertStmt: Database.Statement;
  private readonly recentStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare(
      `INSERT INTO points_history (user_id, points_change, reason, reference_id, reference_type, created_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    this.recentStmt = db.prepare(
      `SELECT id, user_id, points_change, reason, reference_id, reference_type, created_at
       FROM points_history WHERE user_id = ? ORDER BY id DESC LIMIT ?`
    );
  }

  append(userId: string, pointsChange: number, reason: string, ref?: PointsReference): number {
    const info = this.insertStmt.run(userId, pointsChange, reason, ref?.id ?? null, ref?.type ?? null, nowIso());
    return Number(info.lastInsertRowid);
  }

  recent(userId: string, limit: number): PointsHistoryRow[] {
    return z.array(pointsHistoryRowSchema).parse(this.recentStmt.all(userId, limit));
  }
}
