/**
 * Grindboard — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail fast on missing ids/secrets; keep process.env access in one place.
 * FLOWS: load .env → trim → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// Tests set their variables before importing anything, so .env must not win there.
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const KEYS = [
  "DISCORD_TOKEN",
  "CLIENT_ID",
  "GUILD_ID",
  "NODE_ENV",
  "ADMIN_ROLE_ID",
  "MOD_ROLE_ID",
  "LEADERBOARD_CHANNEL_ID",
  "WINS_CHANNEL_ID",
  "VALUE_DROPS_CHANNEL_ID",
  "SUBMISSIONS_CHANNEL_ID",
  "ANNOUNCEMENTS_CHANNEL_ID",
  "CHALLENGE_START_DATE",
  "CHALLENGE_END_DATE",
  "CHALLENGE_NAME",
  "PRIZE_AMOUNT",
  "MAX_REFERRALS",
  "MAX_VALUE_POSTS_PER_DAY",
  "MAX_POINTS_PER_POST",
  "MIN_DAILY_MESSAGES",
  "DB_PATH",
  "LOG_LEVEL",
  "SENTRY_DSN",
  "SENTRY_ENVIRONMENT",
  "SENTRY_TRACES_SAMPLE_RATE",
] as const;

/**
 * Every variable gets trimmed; stray whitespace from copy-pasted .env files
 * otherwise ends up inside snowflake ids.
 */
function readRaw(source: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const raw: Record<string, string | undefined> = {};
  for (const key of KEYS) {
    const value = source[key]?.trim();
    raw[key] = value === "" ? undefined : value;
  }
  return raw;
}

const snowflake = (name: string) => z.string({ required_error: `Missing ${name}` }).min(1, `Missing ${name}`);

const isoDate = (name: string) =>
  z
    .string({ required_error: `Missing ${name}` })
    .regex(ISO_DATE_RE, `${name} must be YYYY-MM-DD`);

export const envSchema = z
  .object({
    // Core Discord credentials
    DISCORD_TOKEN: z.string({ required_error: "Missing DISCORD_TOKEN" }).min(1, "Missing DISCORD_TOKEN"),
    CLIENT_ID: snowflake("CLIENT_ID"),
    GUILD_ID: snowflake("GUILD_ID"),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

    // Staff roles
    ADMIN_ROLE_ID: snowflake("ADMIN_ROLE_ID"),
    MOD_ROLE_ID: snowflake("MOD_ROLE_ID"),

    // Channels
    LEADERBOARD_CHANNEL_ID: snowflake("LEADERBOARD_CHANNEL_ID"),
    WINS_CHANNEL_ID: snowflake("WINS_CHANNEL_ID"),
    VALUE_DROPS_CHANNEL_ID: snowflake("VALUE_DROPS_CHANNEL_ID"),
    SUBMISSIONS_CHANNEL_ID: snowflake("SUBMISSIONS_CHANNEL_ID"),
    ANNOUNCEMENTS_CHANNEL_ID: snowflake("ANNOUNCEMENTS_CHANNEL_ID"),

    // Challenge window (UTC calendar days, both inclusive)
    CHALLENGE_START_DATE: isoDate("CHALLENGE_START_DATE"),
    CHALLENGE_END_DATE: isoDate("CHALLENGE_END_DATE"),
    CHALLENGE_NAME: z.string().default("Q1 Challenge"),
    PRIZE_AMOUNT: z.coerce.number().int().min(0).default(1000),

    // Limits
    MAX_REFERRALS: z.coerce.number().int().min(0).default(10),
    MAX_VALUE_POSTS_PER_DAY: z.coerce.number().int().min(1).default(2),
    MAX_POINTS_PER_POST: z.coerce.number().int().min(0).default(30),
    MIN_DAILY_MESSAGES: z.coerce.number().int().min(1).default(3),

    DB_PATH: z.string().default("data/grindboard.db"),
    LOG_LEVEL: z.string().optional(),

    // Sentry is off unless a DSN is present. 0.1 = trace 10% of transactions.
    SENTRY_DSN: z.string().optional(),
    SENTRY_ENVIRONMENT: z.string().optional(),
    SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  })
  .refine((v) => v.CHALLENGE_START_DATE <= v.CHALLENGE_END_DATE, {
    message: "CHALLENGE_END_DATE is before CHALLENGE_START_DATE",
    path: ["CHALLENGE_END_DATE"],
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an env-like object. Exported so config tests can feed their own
 * sources without touching process.env.
 */
export function parseEnv(source: NodeJS.ProcessEnv): z.SafeParseReturnType<unknown, Env> {
  return envSchema.safeParse(readRaw(source));
}

// safeParse collects every issue so a broken .env is fixed in one pass.
const parsed = parseEnv(process.env);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
