/**
 * Grindboard — tests/store/userStore.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { openDb, type Db } from "../../src/db/db.js";
import { UserStore } from "../../src/store/userStore.js";
import { NotFoundError } from "../../src/lib/errors.js";

describe("UserStore", () => {
  let db: Db;
  let users: UserStore;

  beforeEach(() => {
    db = openDb(":memory:");
    users = new UserStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it("creates a participant at zero points", () => {
    const user = users.getOrCreate("u1", "alice");
    expect(user).toMatchObject({
      user_id: "u1",
      username: "alice",
      total_points: 0,
      tier: "OBSERVER",
      is_scaler: false,
      referral_count: 0,
      last_activity_date: null,
    });
    expect(users.count()).toBe(1);
  });

  it("returns the same row and refreshes a changed username", () => {
    users.getOrCreate("u1", "alice");
    expect(users.getOrCreate("u1", "alice2").username).toBe("alice2");
    expect(users.require("u1").username).toBe("alice2");
    expect(users.count()).toBe(1);
  });

  it("strips mentions and falls back to the id for an empty name", () => {
    expect(users.getOrCreate("u1", "<@123> ").username).toBe("u1");
    expect(users.getOrCreate("u2", "x".repeat(150)).username).toHaveLength(100);
  });

  it("writes totals and tier together", () => {
    users.getOrCreate("u1", "alice");
    const updated = users.writePoints("u1", 160, "OPERATOR");
    expect(updated.total_points).toBe(160);
    expect(updated.tier).toBe("OPERATOR");
  });

  it("throws NotFoundError for unknown users", () => {
    expect(() => users.writePoints("ghost", 1, "OBSERVER")).toThrow(NotFoundError);
    expect(() => users.setScaler("ghost", true)).toThrow(NotFoundError);
    expect(() => users.incrementReferrals("ghost")).toThrow(NotFoundError);
    expect(users.getById("ghost")).toBeNull();
  });

  it("tracks scaler status and referrals", () => {
    users.getOrCreate("u1", "alice");
    expect(users.setScaler("u1", true).is_scaler).toBe(true);
    users.incrementReferrals("u1");
    users.incrementReferrals("u1");
    expect(users.require("u1").referral_count).toBe(2);
  });

  it("orders the leaderboard by points, then by who joined first", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-02T00:00:00.000Z"));
    users.getOrCreate("late", "late");
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    users.getOrCreate("early", "early");
    users.getOrCreate("top", "top");
    vi.useRealTimers();

    users.writePoints("late", 50, "BUILDER");
    users.writePoints("early", 50, "BUILDER");
    users.writePoints("top", 300, "ELITE");

    expect(users.getLeaderboard(10).map((u) => u.user_id)).toEqual(["top", "early", "late"]);
    expect(users.getLeaderboard(2).map((u) => u.user_id)).toEqual(["top", "early"]);
    expect(users.getRank("late", 100)).toBe(3);
    expect(users.getRank("late", 2)).toBeNull();
  });
});
