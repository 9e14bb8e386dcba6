/**
 * Grindboard — src/store/submissionStore.ts
 * WHAT: Win / referral / scaler-application submissions and their review transitions.
 * FLOWS:
 *  - create(input) → SubmissionRow (status pending)
 *  - markApproved / markRejected → conditional UPDATE on status = 'pending'; false when it already moved on
 *  - listPending() → oldest first
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type Database from "better-sqlite3";
import { z } from "zod";
import { nowIso } from "../lib/time.js";
import { NotFoundError } from "../lib/errors.js";
import { REFERRAL_TYPES, SUBMISSION_STATUSES, SUBMISSION_TYPES, type ReferralType, type SubmissionType } from "../lib/constants.js";

export const submissionRowSchema = z.object({
  id: z.number().int(),
  user_id: z.string(),
  submission_type: z.enum(SUBMISSION_TYPES),
  status: z.enum(SUBMISSION_STATUSES),
  description: z.string().nullable(),
  proof_url: z.string().nullable(),
  amount: z.number().nullable(),
  referral_type: z.enum(REFERRAL_TYPES).nullable(),
  points_awarded: z.number().int(),
  reviewed_by: z.string().nullable(),
  reviewed_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type SubmissionRow = z.infer<typeof submissionRowSchema>;

export interface NewSubmission {
  userId: string;
  type: SubmissionType;
  description?: string | null;
  proofUrl?: string | null;
  amount?: number | null;
  referralType?: ReferralType | null;
}

export interface SubmissionCounts {
  approved: number;
  pending: number;
  rejected: number;
}

const SUBMISSION_COLUMNS = `id, user_id, submission_type, status, description, proof_url, amount, referral_type,
  points_awarded, reviewed_by, reviewed_at, created_at, updated_at`;

const statusCountSchema = z.array(z.object({ status: z.enum(SUBMISSION_STATUSES), n: z.number().int() }));
const countSchema = z.object({ n: z.number().int() });

export class SubmissionStore {
  private readonly insertStmt: Database.Statement;
  private readonly getStmt: Database.Statement;
  private readonly approveStmt: Database.Statement;
  private readonly rejectStmt: Database.Statement;
  private readonly pendingStmt: Database.Statement;
  private readonly countByStatusStmt: Database.Statement;
  private readonly countStmt: Database.Statement;
  private readonly pendingOfTypeStmt: Database.Statement;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare(
      `INSERT INTO submissions (user_id, submission_type, status, description, proof_url, amount, referral_type,
         points_awarded, created_at, updated_at)
       VALUES (?, ?, 'pending', ?, ?, ?, ?, 0, ?, ?)`
    );
    this.getStmt = db.prepare(`SELECT ${SUBMISSION_COLUMNS} FROM submissions WHERE id = ?`);
    this.approveStmt = db.prepare(
      `UPDATE submissions
       SET status = 'approved', points_awarded = ?, reviewed_by = ?, reviewed_at = ?, updated_at = ?
       WHERE id = ? AND status = 'pending'`
    );
    this.rejectStmt = db.prepare(
      `UPDATE submissions
       SET status = 'rejected', reviewed_by = ?, reviewed_at = ?, updated_at = ?
       WHERE id = ? AND status = 'pending'`
    );
    this.pendingStmt = db.prepare(
      `SELECT ${SUBMISSION_COLUMNS} FROM submissions WHERE status = 'pending' ORDER BY created_at ASC, id ASC`
    );
    this.countByStatusStmt = db.prepare(
      `SELECT status, COUNT(*) AS n FROM submissions WHERE user_id = ? GROUP BY status`
    );
    this.countStmt = db.prepare(`SELECT COUNT(*) AS n FROM submissions`);
    this.pendingOfTypeStmt = db.prepare(
      `SELECT COUNT(*) AS n FROM submissions WHERE user_id = ? AND submission_type = ? AND status = 'pending'`
    );
  }

  create(input: NewSubmission): SubmissionRow {
    const now = nowIso();
    const info = this.insertStmt.run(
      input.userId,
      input.type,
      input.description ?? null,
      input.proofUrl ?? null,
      input.amount ?? null,
      input.referralType ?? null,
      now,
      now
    );
    return this.require(Number(info.lastInsertRowid));
  }

  getById(id: number): SubmissionRow | null {
    const row: unknown = this.getStmt.get(id);
    return row === undefined ? null : submissionRowSchema.parse(row);
  }

  require(id: number): SubmissionRow {
    const row = this.getById(id);
    if (!row) throw new NotFoundError("Submission", String(id));
    return row;
  }

  /** False when the row is missing or no longer pending. */
  markApproved(id: number, reviewerId: string, points: number): boolean {
    const now = nowIso();
    return this.approveStmt.run(points, reviewerId, now, now, id).changes === 1;
  }

  markRejected(id: number, reviewerId: string): boolean {
    const now = nowIso();
    return this.rejectStmt.run(reviewerId, now, now, id).changes === 1;
  }

  listPending(): SubmissionRow[] {
    return z.array(submissionRowSchema).parse(this.pendingStmt.all());
  }

  countsForUser(userId: string): SubmissionCounts {
    const counts: SubmissionCounts = { approved: 0, pending: 0, rejected: 0 };
    for (const { status, n } of statusCountSchema.parse(this.countByStatusStmt.all(userId))) {
      counts[status] = n;
    }
    return counts;
  }

  countPending(userId: string, type: SubmissionType): number {
    return countSchema.parse(this.pendingOfTypeStmt.get(userId, type)).n;
  }

  count(): number {
    return countSchema.parse(this.countStmt.get()).n;
  }
}
