/**
 * Grindboard — tests/store/submissionStore.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { openDb, type Db } from "../../src/db/db.js";
import { createStores, type Stores } from "../../src/store/index.js";
import { NotFoundError } from "../../src/lib/errors.js";

describe("SubmissionStore", () => {
  let db: Db;
  let stores: Stores;

  beforeEach(() => {
    db = openDb(":memory:");
    stores = createStores(db);
    stores.users.getOrCreate("u1", "alice");
  });

  afterEach(() => {
    db.close();
  });

  it("creates pending submissions with nulls for unused fields", () => {
    const row = stores.submissions.create({ userId: "u1", type: "win", amount: 1200, description: "first client" });
    expect(row).toMatchObject({
      user_id: "u1",
      submission_type: "win",
      status: "pending",
      amount: 1200,
      description: "first client",
      proof_url: null,
      referral_type: null,
      points_awarded: 0,
      reviewed_by: null,
    });
  });

  it("moves out of pending exactly once", () => {
    const { id } = stores.submissions.create({ userId: "u1", type: "referral", referralType: "whop" });

    expect(stores.submissions.markApproved(id, "mod-1", 10)).toBe(true);
    expect(stores.submissions.markApproved(id, "mod-2", 10)).toBe(false);
    expect(stores.submissions.markRejected(id, "mod-2")).toBe(false);

    expect(stores.submissions.require(id)).toMatchObject({ status: "approved", points_awarded: 10, reviewed_by: "mod-1" });
  });

  it("returns false for a missing id and throws from require", () => {
    expect(stores.submissions.markRejected(999, "mod-1")).toBe(false);
    expect(() => stores.submissions.require(999)).toThrow(NotFoundError);
  });

  it("lists pending oldest first", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-03T00:00:00.000Z"));
    const newer = stores.submissions.create({ userId: "u1", type: "win", amount: 100 });
    vi.setSystemTime(new Date("2026-01-02T00:00:00.000Z"));
    const older = stores.submissions.create({ userId: "u1", type: "win", amount: 200 });
    const rejected = stores.submissions.create({ userId: "u1", type: "win", amount: 300 });
    vi.useRealTimers();
    stores.submissions.markRejected(rejected.id, "mod-1");

    expect(stores.submissions.listPending().map((s) => s.id)).toEqual([older.id, newer.id]);
    expect(stores.submissions.countsForUser("u1")).toEqual({ approved: 0, pending: 2, rejected: 1 });
    expect(stores.submissions.countsForUser("nobody")).toEqual({ approved: 0, pending: 0, rejected: 0 });
    expect(stores.submissions.count()).toBe(3);
  });
});
