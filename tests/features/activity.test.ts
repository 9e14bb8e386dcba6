/**
 * Grindboard — tests/features/activity.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Db } from "../../src/db/db.js";
import type { BotDeps } from "../../src/config.js";
import { recordDailyActivity } from "../../src/features/activity.js";
import { createTestDeps, IN_WINDOW } from "../utils/testDeps.js";

describe("recordDailyActivity", () => {
  let db: Db;
  let deps: BotDeps;

  beforeEach(() => {
    ({ db, deps } = createTestDeps());
  });

  afterEach(() => {
    db.close();
  });

  it("awards one point on the third message of the day, once", () => {
    expect(recordDailyActivity(deps, "u1", "alice", IN_WINDOW)).toEqual({ kind: "counted", messageCount: 1 });
    expect(recordDailyActivity(deps, "u1", "alice", IN_WINDOW)).toEqual({ kind: "counted", messageCount: 2 });

    const third = recordDailyActivity(deps, "u1", "alice", IN_WINDOW);
    expect(third.kind).toBe("awarded");
    if (third.kind === "awarded") {
      expect(third.messageCount).toBe(3);
      expect(third.user.total_points).toBe(1);
    }

    expect(recordDailyActivity(deps, "u1", "alice", IN_WINDOW)).toEqual({ kind: "counted", messageCount: 4 });
    expect(deps.stores.users.require("u1")).toMatchObject({ total_points: 1, last_activity_date: "2026-01-15" });
  });

  it("starts over the next UTC day", () => {
    for (let i = 0; i < 3; i++) recordDailyActivity(deps, "u1", "alice", IN_WINDOW);
    const nextDay = new Date("2026-01-16T00:00:01.000Z");
    for (let i = 0; i < 3; i++) recordDailyActivity(deps, "u1", "alice", nextDay);
    expect(deps.stores.users.require("u1").total_points).toBe(2);
  });

  it("does nothing outside the challenge window", () => {
    expect(recordDailyActivity(deps, "u1", "alice", new Date("2025-12-31T23:59:59.000Z"))).toEqual({ kind: "inactive" });
    expect(recordDailyActivity(deps, "u1", "alice", new Date("2026-04-01T00:00:00.000Z"))).toEqual({ kind: "inactive" });
    expect(deps.stores.users.getById("u1")).toBeNull();
  });

  it("counts the whole end day", () => {
    expect(recordDailyActivity(deps, "u1", "alice", new Date("2026-03-31T23:59:00.000Z")).kind).toBe("counted");
  });
});
