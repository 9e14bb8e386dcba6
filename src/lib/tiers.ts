/**
 * Grindboard — src/lib/tiers.ts
 * WHAT: Static tier ladder and the total → tier lookup.
 * FLOWS: calculateTier(total) → TierKey; getTier(key) → TierInfo; nextTier(key) → TierInfo | null
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const TIER_KEYS = ["OBSERVER", "BUILDER", "OPERATOR", "ELITE"] as const;
export type TierKey = (typeof TIER_KEYS)[number];

export interface TierInfo {
  key: TierKey;
  min: number;
  /** Inclusive. Infinity for the top tier. */
  max: number;
  roleName: string;
  emoji: string;
}

export const TIERS: readonly TierInfo[] = [
  { key: "OBSERVER", min: 0, max: 49, roleName: "Q1 — Challenger", emoji: "🟤" },
  { key: "BUILDER", min: 50, max: 149, roleName: "Q1 — Builder", emoji: "🟢" },
  { key: "OPERATOR", min: 150, max: 299, roleName: "Q1 — Operator", emoji: "🔵" },
  { key: "ELITE", min: 300, max: Number.POSITIVE_INFINITY, roleName: "Q1 — Elite", emoji: "🟣" },
];

const DEFAULT_TIER: TierKey = "OBSERVER";

export function isTierKey(value: string): value is TierKey {
  return TIER_KEYS.some((k) => k === value);
}

/**
 * First tier whose inclusive [min, max] holds the total.
 * Totals outside every bucket (negative ones) fall back to OBSERVER.
 */
export function calculateTier(totalPoints: number): TierKey {
  const match = TIERS.find((t) => totalPoints >= t.min && totalPoints <= t.max);
  return match?.key ?? DEFAULT_TIER;
}

export function getTier(key: TierKey): TierInfo {
  return TIERS.find((t) => t.key === key) ?? TIERS[0];
}

/** Stored tier strings come from the database; unknown ones read as OBSERVER. */
export function tierEmoji(tier: string): string {
  return isTierKey(tier) ? getTier(tier).emoji : "⚪";
}

export function tierRoleName(tier: string): string {
  return isTierKey(tier) ? getTier(tier).roleName : tier;
}

export function nextTier(key: TierKey): TierInfo | null {
  const idx = TIERS.findIndex((t) => t.key === key);
  return idx >= 0 && idx < TIERS.length - 1 ? TIERS[idx + 1] : null;
}
