/**
 * Grindboard — src/store/userStore.ts
 * WHAT: Participant rows: get-or-create, totals/tier writes, leaderboard reads.
 * FLOWS:
 *  - getOrCreate(userId, username) → UserRow (username refreshed when it changed)
 *  - writePoints(userId, total, tier) → persisted row
 *  - getLeaderboard(limit) / getRank(userId, window)
 * DOCS:
 *  - better-sqlite3 prepared statements: https://github.com/WiseLibs/better-sqlite3/blob/master/docs/api.md
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import { nowIso } from "../lib/time.js";
import { NotFoundError } from "../lib/errors.js";
import { MAX_USERNAME_LENGTH } from "../lib/constants.js";
import { sanitizeInput } from "../lib/validation.js";
import type { TierKey } from "../lib/tiers.js";

// SQLite has no boolean; 0/1 comes back as a number.
const sqliteBool = z.number().int().transform((v) => v !== 0);

export const userRowSchema = z.object({
  user_id: z.string(),
  username: z.string(),
  total_points: z.number().int(),
  tier: z.string(),
  is_scaler: sqliteBool,
  referral_count: z.number().int(),
  last_activity_date: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type UserRow = z.infer<typeof userRowSchema>;

const USER_COLUMNS = `user_id, username, total_points, tier, is_scaler, referral_count, last_activity_date, created_at, updated_at`;

const countSchema = z.object({ n: z.number().int() });

export class UserStore {
  private readonly getStmt: Database.Statement;
  private readonly insertStmt: Database.Statement;
  private readonly renameStmt: Database.Statement;
  private readonly writePointsStmt: Database.Statement;
  private readonly setScalerStmt: Database.Statement;
  private readonly incrementReferralStmt: Database.Statement;
  private readonly touchActivityStmt: Database.Statement;
  private readonly leaderboardStmt: Database.Statement;
  private readonly allStmt: Database.Statement;
  private readonly countStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.getStmt = db.prepare(`SELECT ${USER_COLUMNS} FROM users WHERE user_id = ?`);
    this.insertStmt = db.prepare(
      `INSERT INTO users (user_id, username, total_points, tier, is_scaler, referral_count, created_at, updated_at)
       VALUES (?, ?, 0, 'OBSERVER', 0, 0, ?, ?)
       ON CONFLICT(user_id) DO NOTHING`
    );
    this.renameStmt = db.prepare(`UPDATE users SET username = ?, updated_at = ? WHERE user_id = ?`);
    this.writePointsStmt = db.prepare(
      `UPDATE users SET total_points = ?, tier = ?, updated_at = ? WHERE user_id = ?`
    );
    this.setScalerStmt = db.prepare(`UPDATE users SET is_scaler = ?, updated_at = ? WHERE user_id = ?`);
    this.incrementReferralStmt = db.prepare(
      `UPDATE users SET referral_count = referral_count + 1, updated_at = ? WHERE user_id = ?`
    );
    this.touchActivityStmt = db.prepare(`UPDATE users SET last_activity_date = ? WHERE user_id = ?`);
    // user_id breaks ties so the order is stable across refreshes
    this.leaderboardStmt = db.prepare(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY total_points DESC, created_at ASC, user_id ASC LIMIT ?`
    );
    this.allStmt = db.prepare(`SELECT ${USER_COLUMNS} FROM users`);
    this.countStmt = db.prepare(`SELECT COUNT(*) AS n FROM users`);
  }

  getById(userId: string): UserRow | null {
    const row: unknown = this.getStmt.get(userId);
    return row === undefined ? null : userRowSchema.parse(row);
  }

  /** Throws NotFoundError instead of returning null. */
  require(userId: string): UserRow {
    const user = this.getById(userId);
    if (!user) throw new NotFoundError("User", userId);
    return user;
  }

  getOrCreate(userId: string, rawUsername: string): UserRow {
    const username = sanitizeInput(rawUsername, MAX_USERNAME_LENGTH) || userId;
    const existing = this.getById(userId);
    if (existing) {
      if (existing.username !== username) {
        this.renameStmt.run(username, nowIso(), userId);
        return { ...existing, username };
      }
      return existing;
    }

    const now = nowIso();
    const info = this.insertStmt.run(userId, username, now, now);
    if (info.changes > 0) {
      logger.info({ evt: "user_created", userId }, "[users] Created new user");
    }
    return this.require(userId);
  }

  writePoints(userId: string, totalPoints: number, tier: TierKey): UserRow {
    const info = this.writePointsStmt.run(totalPoints, tier, nowIso(), userId);
    if (info.changes === 0) throw new NotFoundError("User", userId);
    return this.require(userId);
  }

  setScaler(userId: string, isScaler: boolean): UserRow {
    const info = this.setScalerStmt.run(isScaler ? 1 : 0, nowIso(), userId);
    if (info.changes === 0) throw new NotFoundError("User", userId);
    return this.require(userId);
  }

  incrementReferrals(userId: string): void {
    const info = this.incrementReferralStmt.run(nowIso(), userId);
    if (info.changes === 0) throw new NotFoundError("User", userId);
  }

  touchActivity(userId: string, day: string): void {
    this.touchActivityStmt.run(day, userId);
  }

  getLeaderboard(limit: number): UserRow[] {
    return z.array(userRowSchema).parse(this.leaderboardStmt.all(limit));
  }

  /** 1-based position inside the top `window`, or null when outside it. */
  getRank(userId: string, window: number): number | null {
    const idx = this.getLeaderboard(window).findIndex((u) => u.user_id === userId);
    return idx >= 0 ? idx + 1 : null;
  }

  all(): UserRow[] {
    return z.array(userRowSchema).parse(this.allStmt.all());
  }

  count(): number {
    return countSchema.parse(this.countStmt.get()).n;
  }
}
