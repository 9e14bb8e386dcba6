/**
 * Grindboard — src/lib/validation.ts
 * WHAT: Input validation helpers for user-supplied submission fields.
 * FLOWS:
 *  - validateUrl(url) → boolean
 *  - parseAmount("$1,200.50") → 1200.5 | null
 *  - sanitizeInput(text, max) → mention-free, truncated, trimmed text
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MAX_INPUT_LENGTH } from "./constants.js";

/**
 * http(s), then a dotted domain, localhost, or an IPv4 quad; optional port
 * and path. Case-insensitive.
 */
const URL_PATTERN =
  /^https?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+[A-Z]{2,6}\.?|localhost|\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3})(?::\d+)?(?:\/?|[/?]\S+)$/i;

export function validateUrl(url: string): boolean {
  return URL_PATTERN.test(url);
}

const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Strips "$" and "," then parses. Negative or non-numeric → null.
 * Result is rounded to cents.
 */
export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/\$/g, "").replace(/,/g, "").trim();
  if (!NUMERIC_PATTERN.test(cleaned)) return null;
  const value = Number(cleaned);
  if (!Number.isFinite(value) || value < 0) return null;
  return Math.round(value * 100) / 100;
}

const USER_MENTION = /<@!?\d+>/g;
const ROLE_MENTION = /<@&\d+>/g;
const CHANNEL_MENTION = /<#\d+>/g;

/** Removes user/role/channel mentions, truncates, trims. */
export function sanitizeInput(text: string, maxLength = MAX_INPUT_LENGTH): string {
  let out = text.replace(USER_MENTION, "").replace(ROLE_MENTION, "").replace(CHANNEL_MENTION, "");
  if (out.length > maxLength) {
    out = out.slice(0, maxLength);
  }
  return out.trim();
}

/** "+5" for gains, "-3" / "0" otherwise. */
export function formatPoints(points: number): string {
  return points > 0 ? `+${points}` : String(points);
}

/** Clip to an embed field budget, ending in "..." when cut. */
export function truncateText(text: string, maxLength = 1024): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}
