/**
 * Grindboard — src/config.ts
 * WHAT: Typed runtime configuration handed to every handler, built once from the validated env.
 * WHY: Handlers take a BotConfig instead of reading env, so tests build one inline.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Env } from "./lib/env.js";
import type { Stores } from "./store/index.js";
import { isWithinWindow } from "./lib/time.js";

export interface BotConfig {
  guildId: string;
  adminRoleId: string;
  modRoleId: string;
  channels: {
    leaderboard: string;
    wins: string;
    valueDrops: string;
    submissions: string;
    announcements: string;
  };
  challenge: {
    name: string;
    /** YYYY-MM-DD, UTC, inclusive */
    startDate: string;
    /** YYYY-MM-DD, UTC, inclusive */
    endDate: string;
    prizeAmount: number;
  };
  limits: {
    maxReferrals: number;
    maxValuePostsPerDay: number;
    maxPointsPerPost: number;
    minDailyMessages: number;
  };
}

export function buildConfig(e: Env): BotConfig {
  return {
    guildId: e.GUILD_ID,
    adminRoleId: e.ADMIN_ROLE_ID,
    modRoleId: e.MOD_ROLE_ID,
    channels: {
      leaderboard: e.LEADERBOARD_CHANNEL_ID,
      wins: e.WINS_CHANNEL_ID,
      valueDrops: e.VALUE_DROPS_CHANNEL_ID,
      submissions: e.SUBMISSIONS_CHANNEL_ID,
      announcements: e.ANNOUNCEMENTS_CHANNEL_ID,
    },
    challenge: {
      name: e.CHALLENGE_NAME,
      startDate: e.CHALLENGE_START_DATE,
      endDate: e.CHALLENGE_END_DATE,
      prizeAmount: e.PRIZE_AMOUNT,
    },
    limits: {
      maxReferrals: e.MAX_REFERRALS,
      maxValuePostsPerDay: e.MAX_VALUE_POSTS_PER_DAY,
      maxPointsPerPost: e.MAX_POINTS_PER_POST,
      minDailyMessages: e.MIN_DAILY_MESSAGES,
    },
  };
}

export function isChallengeActive(config: BotConfig, now: Date = new Date()): boolean {
  return isWithinWindow(config.challenge.startDate, config.challenge.endDate, now);
}

/** Everything a handler needs besides the discord.js object it was called with. */
export interface BotDeps {
  config: BotConfig;
  stores: Stores;
}
