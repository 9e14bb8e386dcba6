/**
 * Grindboard — src/features/submissions.ts
 * WHAT: Submission review state machine: pending → approved | rejected, both terminal.
 * FLOWS:
 *  - awardFor(row) → points an approval is worth
 *  - approveSubmission(stores, id, reviewerId, limits) → tx(referral cap → conditional flip → award → referral/scaler side effects)
 *  - rejectSubmission(stores, id, reviewerId) → conditional flip, no points
 * Both return a ReviewResult; a repeated click sees `conflict` and changes nothing.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "../lib/logger.js";
import type { SubmissionStatus } from "../lib/constants.js";
import type { Stores, SubmissionRow, UserRow } from "../store/index.js";
import { referralPoints, updatePoints, winPoints } from "./points.js";

export type ReviewResult =
  | { kind: "changed"; submission: SubmissionRow; points: number; user: UserRow }
  | { kind: "conflict"; status: SubmissionStatus }
  /** Referral approval refused; the submission stays pending. */
  | { kind: "referral_cap"; max: number }
  | { kind: "not_found" };

export function awardFor(row: Pick<SubmissionRow, "submission_type" | "amount" | "referral_type">): number {
  switch (row.submission_type) {
    case "win":
      return winPoints(row.amount ?? 0);
    case "referral":
      return referralPoints(row.referral_type ?? "discord");
    case "scaler_application":
      return 0;
  }
}

export interface ReviewLimits {
  maxReferrals: number;
}

/**
 * Status flip, point award and referral increment commit together or not
 * at all. The flip is `WHERE status = 'pending'`, so two reviewers racing on
 * the same card award once. A referral for a member already at the cap is
 * refused before anything is written.
 */
export function approveSubmission(
  stores: Stores,
  submissionId: number,
  reviewerId: string,
  limits: ReviewLimits
): ReviewResult {
  return stores.transaction((): ReviewResult => {
    const row = stores.submissions.getById(submissionId);
    if (!row) return { kind: "not_found" };
    if (row.status !== "pending") return { kind: "conflict", status: row.status };
    if (row.submission_type === "referral" && stores.users.require(row.user_id).referral_count >= limits.maxReferrals) {
      logger.info(
        { evt: "referral_cap_reached", submissionId, userId: row.user_id, max: limits.maxReferrals },
        "[submissions] Referral approval refused at cap"
      );
      return { kind: "referral_cap", max: limits.maxReferrals };
    }

    const points = awardFor(row);
    if (!stores.submissions.markApproved(submissionId, reviewerId, points)) {
      return { kind: "conflict", status: stores.submissions.require(submissionId).status };
    }

    let user = stores.users.require(row.user_id);
    const ref = { id: submissionId, type: "submission" as const };
    switch (row.submission_type) {
      case "win":
        user = updatePoints(stores, row.user_id, points, "win approved", ref).user;
        break;
      case "referral":
        stores.users.incrementReferrals(row.user_id);
        user = updatePoints(stores, row.user_id, points, "referral approved", ref).user;
        break;
      case "scaler_application":
        user = stores.users.setScaler(row.user_id, true);
        break;
    }

    logger.info(
      { evt: "submission_approved", submissionId, type: row.submission_type, reviewerId, points },
      "[submissions] Approved submission"
    );
    return { kind: "changed", submission: stores.submissions.require(submissionId), points, user };
  });
}

export function rejectSubmission(stores: Stores, submissionId: number, reviewerId: string): ReviewResult {
  return stores.transaction((): ReviewResult => {
    const row = stores.submissions.getById(submissionId);
    if (!row) return { kind: "not_found" };
    if (row.status !== "pending") return { kind: "conflict", status: row.status };

    if (!stores.submissions.markRejected(submissionId, reviewerId)) {
      return { kind: "conflict", status: stores.submissions.require(submissionId).status };
    }
    logger.info(
      { evt: "submission_rejected", submissionId, type: row.submission_type, reviewerId },
      "[submissions] Rejected submission"
    );
    return {
      kind: "changed",
      submission: stores.submissions.require(submissionId),
      points: 0,
      user: stores.users.require(row.user_id),
    };
  });
}
