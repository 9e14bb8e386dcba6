/**
 * Grindboard — src/lib/componentIds.ts
 * WHAT: Custom-id format for review buttons.
 * The submission id lives in the custom id, so buttons keep working after a restart.
 * FORMAT: v1:<sub|scaler>:<approve|reject>:<submissionId>
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export type ReviewScope = "sub" | "scaler";
export type ReviewAction = "approve" | "reject";

export interface ReviewButtonId {
  scope: ReviewScope;
  action: ReviewAction;
  submissionId: number;
}

export const REVIEW_BUTTON_RE = /^v1:(sub|scaler):(approve|reject):(\d+)$/;

export function reviewButtonId(scope: ReviewScope, action: ReviewAction, submissionId: number): string {
  return `v1:${scope}:${action}:${submissionId}`;
}

export function parseReviewButtonId(customId: string): ReviewButtonId | null {
  const m = REVIEW_BUTTON_RE.exec(customId);
  if (!m) return null;
  const scope = m[1] === "scaler" ? "scaler" : "sub";
  const action = m[2] === "approve" ? "approve" : "reject";
  const submissionId = Number.parseInt(m[3], 10);
  if (!Number.isSafeInteger(submissionId) || submissionId <= 0) return null;
  return { scope, action, submissionId };
}
