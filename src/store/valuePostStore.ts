/**
 * Grindboard — src/store/valuePostStore.ts
 * WHAT: Tracked value-drop posts: reaction counters, pin flag, and the points each post has earned.
 * FLOWS:
 *  - create(input) → row (existing row when the message is already tracked)
 *  - countForUserOnDay(userId, day) → per-day limit check
 *  - updateScore / setPinned → counters + total
 *  - deleteByMessageId → tracked row removed after the message is deleted
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { z } from "zod";
import { nowIso } from "../lib/time.js";
import { NotFoundError } from "../lib/errors.js";

const sqliteBool = z.number().int().transform((v) => v !== 0);

export const valuePostRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  message_id: z.string(),
  channel_id: z.string(),
  post_date: z.string(),
  fire_count: z.number().int(),
  gem_count: z.number().int(),
  hundred_count: z.number().int(),
  is_pinned: sqliteBool,
  total_points: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type ValuePostRow = z.infer<typeof valuePostRowSchema>;

export interface ReactionCounts {
  fire: number;
  gem: number;
  hundred: number;
}

const POST_COLUMNS = `id, user_id, message_id, channel_id, post_date, fire_count, gem_count, hundred_count,
  is_pinned, total_points, created_at, updated_at`;

const countSchema = z.object({ n: z.number().int() });

export class ValuePostStore {
  private readonly insertStmt: Database.Statement;
  private readonly getStmt: Database.Statement;
  private readonly countDayStmt: Database.Statement;
  private readonly scoreStmt: Database.Statement;
  private readonly pinStmt: Database.Statement;
  private readonly deleteStmt: Database.Statement;
  private readonly byChannelStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare(
      `INSERT INTO value_posts (user_id, message_id, channel_id, post_date, fire_count, gem_count, hundred_count,
         is_pinned, total_points, created_at, updated_at)
       VALUES (?, ?, ?, ?, 0, 0, 0, 0, 0, ?, ?)
       ON CONFLICT(message_id) DO NOTHING`
    );
    this.getStmt = db.prepare(`SELECT ${POST_COLUMNS} FROM value_posts WHERE message_id = ?`);
    this.countDayStmt = db.prepare(`SELECT COUNT(*) AS n FROM value_posts WHERE user_id = ? AND post_date = ?`);
    this.scoreStmt = db.prepare(
      `UPDATE value_posts SET fire_count = ?, gem_count = ?, hundred_count = ?, total_points = ?, updated_at = ?
       WHERE message_id = ?`
    );
    this.pinStmt = db.prepare(
      `UPDATE value_posts SET is_pinned = ?, total_points = ?, updated_at = ? WHERE message_id = ?`
    );
    this.deleteStmt = db.prepare(`DELETE FROM value_posts WHERE message_id = ?`);
    this.byChannelStmt = db.prepare(`SELECT ${POST_COLUMNS} FROM value_posts WHERE channel_id = ?`);
  }

  create(input: { userId: string; messageId: string; channelId: string; postDate: string }): ValuePostRow {
    const now = nowIso();
    this.insertStmt.run(input.userId, input.messageId, input.channelId, input.postDate, now, now);
    return this.require(input.messageId);
  }

  getByMessageId(messageId: string): ValuePostRow | null {
    const row: unknown = this.getStmt.get(messageId);
    return row === undefined ? null : valuePostRowSchema.parse(row);
  }

  require(messageId: string): ValuePostRow {
    const row = this.getByMessageId(messageId);
    if (!row) throw new NotFoundError("Value post", messageId);
    return row;
  }

  countForUserOnDay(userId: string, day: string): number {
    return countSchema.parse(this.countDayStmt.get(userId, day)).n;
  }

  updateScore(messageId: string, counts: ReactionCounts, totalPoints: number): void {
    this.scoreStmt.run(counts.fire, counts.gem, counts.hundred, totalPoints, nowIso(), messageId);
  }

  setPinned(messageId: string, pinned: boolean, totalPoints: number): void {
    this.pinStmt.run(pinned ? 1 : 0, totalPoints, nowIso(), messageId);
  }

  deleteByMessageId(messageId: string): boolean {
    return this.deleteStmt.run(messageId).changes > 0;
  }

  listByChannel(channelId: string): ValuePostRow[] {
    return z.array(valuePostRowSchema).parse(this.byChannelStmt.all(channelId));
  }
}
