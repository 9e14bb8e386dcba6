/**
 * Grindboard — src/db/ensure.ts
 * WHAT: Idempotent schema creation.
 * FLOWS: CREATE TABLE IF NOT EXISTS × 5 → indexes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type Database from "better-sqlite3";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id TEXT PRIMARY KEY,
    username TEXT NOT NULL,
    total_points INTEGER NOT NULL DEFAULT 0,
    tier TEXT NOT NULL DEFAULT 'OBSERVER',
    is_scaler INTEGER NOT NULL DEFAULT 0,
    referral_count INTEGER NOT NULL DEFAULT 0,
    last_activity_date TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS points_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
    points_change INTEGER NOT NULL,
    reason TEXT NOT NULL,
    reference_id INTEGER,
    reference_type TEXT,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS submissions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
    submission_type TEXT NOT NULL CHECK (submission_type IN ('win','referral','scaler_application')),
    status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending','approved','rejected')),
    description TEXT,
    proof_url TEXT,
    amount REAL,
    referral_type TEXT CHECK (referral_type IS NULL OR referral_type IN ('whop','discord')),
    points_awarded INTEGER NOT NULL DEFAULT 0,
    reviewed_by TEXT,
    reviewed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS value_posts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
    message_id TEXT NOT NULL UNIQUE,
    channel_id TEXT NOT NULL,
    post_date TEXT NOT NULL,
    fire_count INTEGER NOT NULL DEFAULT 0,
    gem_count INTEGER NOT NULL DEFAULT 0,
    hundred_count INTEGER NOT NULL DEFAULT 0,
    is_pinned INTEGER NOT NULL DEFAULT 0,
    total_points INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS daily_activity (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
    activity_date TEXT NOT NULL,
    message_count INTEGER NOT NULL DEFAULT 0,
    points_awarded INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    UNIQUE (user_id, activity_date)
  );

  CREATE INDEX IF NOT EXISTS idx_users_points ON users(total_points DESC);
  CREATE INDEX IF NOT EXISTS idx_users_tier ON users(tier);
  CREATE INDEX IF NOT EXISTS idx_value_posts_user_date ON value_posts(user_id, post_date);
  CREATE INDEX IF NOT EXISTS idx_submissions_status ON submissions(status, created_at);
  CREATE INDEX IF NOT EXISTS idx_submissions_user ON submissions(user_id);
  CREATE INDEX IF NOT EXISTS idx_points_history_user ON points_history(user_id, id DESC);
`;

export function ensureSchema(db: Database.Database): void {
  db.exec(SCHEMA);
}
