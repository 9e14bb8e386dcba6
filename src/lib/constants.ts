/**
 * Grindboard — src/lib/constants.ts
 * WHAT: Point values, tracked emojis, colours and the other fixed numbers the bot uses.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/** Echoing user content (descriptions, usernames) must never ping anyone. */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

// ===== Points =====

export const POINTS = {
  DAILY_ACTIVITY: 1,
  FIRE_EMOJI: 3,
  GEM_EMOJI: 3,
  HUNDRED_EMOJI: 5,
  PINNED: 15,
  FIRST_SALE: 3,
  WIN_100: 5,
  WIN_500: 15,
  WIN_1K: 30,
  WIN_5K: 75,
  WHOP_REFERRAL: 10,
  DISCORD_REFERRAL: 5,
} as const;

/** Emojis scored on value posts, keyed by the counter column they feed. */
export const TRACK_EMOJIS = {
  fire: "🔥",
  gem: "💎",
  hundred: "💯",
} as const;

export type TrackedEmojiKey = keyof typeof TRACK_EMOJIS;

// ===== Enumerations =====

export const SUBMISSION_TYPES = ["win", "referral", "scaler_application"] as const;
export type SubmissionType = (typeof SUBMISSION_TYPES)[number];

export const SUBMISSION_STATUSES = ["pending", "approved", "rejected"] as const;
export type SubmissionStatus = (typeof SUBMISSION_STATUSES)[number];

export const REFERRAL_TYPES = ["whop", "discord"] as const;
export type ReferralType = (typeof REFERRAL_TYPES)[number];

/** Guild role granted on an approved scaler application. Looked up by name. */
export const SCALER_ROLE_NAME = "Scaler";

// ===== Input limits =====

export const MAX_INPUT_LENGTH = 1000;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_USERNAME_LENGTH = 100;

// ===== Listing limits =====

export const LEADERBOARD_DEFAULT_LIMIT = 10;
export const LEADERBOARD_MAX_LIMIT = 25;
/** /points ranks the caller inside this many leaders; beyond it the rank shows as "—". */
export const RANK_WINDOW = 100;
export const PENDING_LIST_LIMIT = 10;
export const VIEWUSER_HISTORY_LIMIT = 5;

// ===== Timeouts & Delays =====

/** Channel warning for an over-limit value post */
export const LIMIT_WARNING_DELETE_MS = 10_000;

/** daily_activity rows older than this are removed by the retention job */
export const ACTIVITY_RETENTION_DAYS = 30;

// ===== Colours =====

export const COLORS = {
  success: 0x57f287,
  error: 0xed4245,
  gold: 0xf1c40f,
  blue: 0x3498db,
  green: 0x2ecc71,
  red: 0xe74c3c,
  orange: 0xe67e22,
  purple: 0x9b59b6,
} as const;

export const MEDALS = ["🥇", "🥈", "🥉"] as const;

/** Grace period for Sentry to flush before exiting on an uncaught exception */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1_000;
