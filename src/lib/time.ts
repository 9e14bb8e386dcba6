/**
 * Grindboard — src/lib/time.ts
 * WHAT: UTC calendar-day helpers and timestamp formatting.
 * All day keys are "YYYY-MM-DD" in UTC; the bot never looks at the host timezone.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** ISO-8601 timestamp for created_at / updated_at columns. */
export const nowIso = (): string => new Date().toISOString();

/** UTC day key for a date, e.g. "2026-01-15". */
export function utcDay(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

/** Day key `days` before `from`. */
export function utcDayMinus(days: number, from: Date = new Date()): string {
  return utcDay(new Date(from.getTime() - days * 24 * 60 * 60 * 1000));
}

/** Both ends inclusive: the whole end day counts. */
export function isWithinWindow(startDay: string, endDay: string, now: Date = new Date()): boolean {
  const today = utcDay(now);
  return startDay <= today && today <= endDay;
}

/** Milliseconds until the next occurrence of `hour`:00 UTC, strictly in the future. */
export function msUntilNextUtcHour(hour: number, now: Date = new Date()): number {
  const next = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), hour, 0, 0, 0));
  if (next.getTime() <= now.getTime()) {
    next.setUTCDate(next.getUTCDate() + 1);
  }
  return next.getTime() - now.getTime();
}
