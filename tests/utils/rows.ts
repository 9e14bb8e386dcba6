/**
 * Grindboard — tests/utils/rows.ts
 * WHAT: Plain row objects for UI tests that do not need a database.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { PointsHistoryRow, SubmissionRow, UserRow } from "../../src/store/index.js";

const STAMP = "2026-01-15T12:00:00.000Z";

export function makeUserRow(overrides: Partial<UserRow> = {}): UserRow {
  return {
    user_id: "u1",
    username: "alice",
    total_points: 0,
    tier: "OBSERVER",
    is_scaler: false,
    referral_count: 0,
    last_activity_date: null,
    created_at: STAMP,
    updated_at: STAMP,
    ...overrides,
  };
}

export function makeSubmissionRow(overrides: Partial<SubmissionRow> = {}): SubmissionRow {
  return {
    id: 1,
    user_id: "u1",
    submission_type: "win",
    status: "pending",
    description: null,
    proof_url: null,
    amount: null,
    referral_type: null,
    points_awarded: 0,
    reviewed_by: null,
    reviewed_at: null,
    created_at: STAMP,
    updated_at: STAMP,
    ...overrides,
  };
}

export function makeHistoryRow(overrides: Partial<PointsHistoryRow> = {}): PointsHistoryRow {
  return {
    id: 1,
    user_id: "u1",
    points_change: 0,
    reason: "",
    reference_id: null,
    reference_type: null,
    created_at: STAMP,
    ...overrides,
  };
}
