/**
 * Grindboard — src/features/points.ts
 * WHAT: The points engine: apply a delta, recompute the tier, append history. Plus the scoring tables.
 * FLOWS:
 *  - updatePoints(stores, userId, delta, reason) → tx(read → add → calculateTier → write → history) → PointsChange
 *  - winPoints(amount) / referralPoints(type) / postPoints(counts, pinned, cap)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import { POINTS, type ReferralType } from "../lib/constants.js";
import { calculateTier, isTierKey, type TierKey } from "../lib/tiers.js";
import type { PointsReference, ReactionCounts, Stores, UserRow } from "../store/index.js";

export interface PointsChange {
  user: UserRow;
  previousTier: TierKey;
  tierChanged: boolean;
}

/**
 * Negative deltas are allowed and there is no floor; admin commands do their
 * own pre-checks. Throws NotFoundError when the user row is missing.
 */
export function updatePoints(
  stores: Stores,
  userId: string,
  delta: number,
  reason: string,
  ref?: PointsReference
): PointsChange {
  return stores.transaction(() => {
    const current = stores.users.require(userId);
    const previousTier: TierKey = isTierKey(current.tier) ? current.tier : calculateTier(current.total_points);
    const newTotal = current.total_points + delta;
    const newTier = calculateTier(newTotal);
    const user = stores.users.writePoints(userId, newTotal, newTier);
    stores.history.append(userId, delta, reason, ref);

    logger.info(
      { evt: "points_update", userId, delta, total: newTotal, tier: newTier, reason },
      "[points] Updated points"
    );
    return { user, previousTier, tierChanged: previousTier !== newTier };
  });
}

/** Brackets are checked top-down; anything under $100 is a first sale. */
export function winPoints(amount: number): number {
  if (amount >= 5000) return POINTS.WIN_5K;
  if (amount >= 1000) return POINTS.WIN_1K;
  if (amount >= 500) return POINTS.WIN_500;
  if (amount >= 100) return POINTS.WIN_100;
  return POINTS.FIRST_SALE;
}

export function referralPoints(type: ReferralType): number {
  return type === "whop" ? POINTS.WHOP_REFERRAL : POINTS.DISCORD_REFERRAL;
}

/** Weighted reaction score, clamped to the per-post cap. */
export function reactionPoints(counts: ReactionCounts, cap: number): number {
  const raw = counts.fire * POINTS.FIRE_EMOJI + counts.gem * POINTS.GEM_EMOJI + counts.hundred * POINTS.HUNDRED_EMOJI;
  return Math.min(raw, cap);
}

/** The pin bonus sits outside the reaction cap. */
export function postPoints(counts: ReactionCounts, pinned: boolean, cap: number): number {
  return reactionPoints(counts, cap) + (pinned ? POINTS.PINNED : 0);
}
