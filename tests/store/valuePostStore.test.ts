/**
 * Grindboard — tests/store/valuePostStore.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { openDb, type Db } from "../../src/db/db.js";
import { createStores, type Stores } from "../../src/store/index.js";

describe("ValuePostStore", () => {
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

  const post = (messageId: string, postDate = "2026-01-15", channelId = "chan-drops") =>
    stores.valuePosts.create({ userId: "u1", messageId, channelId, postDate });

  it("tracks a message once", () => {
    const first = post("m1");
    const again = post("m1");
    expect(again.id).toBe(first.id);
    expect(first).toMatchObject({ fire_count: 0, gem_count: 0, hundred_count: 0, is_pinned: false, total_points: 0 });
  });

  it("counts posts per user per day", () => {
    post("m1");
    post("m2");
    post("m3", "2026-01-16");
    expect(stores.valuePosts.countForUserOnDay("u1", "2026-01-15")).toBe(2);
    expect(stores.valuePosts.countForUserOnDay("u1", "2026-01-16")).toBe(1);
    expect(stores.valuePosts.countForUserOnDay("u2", "2026-01-15")).toBe(0);
  });

  it("stores counters, pin flag and total", () => {
    post("m1");
    stores.valuePosts.updateScore("m1", { fire: 2, gem: 1, hundred: 0 }, 9);
    stores.valuePosts.setPinned("m1", true, 24);
    expect(stores.valuePosts.require("m1")).toMatchObject({
      fire_count: 2,
      gem_count: 1,
      hundred_count: 0,
      is_pinned: true,
      total_points: 24,
    });
  });

  it("deletes and lists by channel", () => {
    post("m1");
    post("m2", "2026-01-15", "chan-other");
    expect(stores.valuePosts.listByChannel("chan-drops").map((p) => p.message_id)).toEqual(["m1"]);
    expect(stores.valuePosts.deleteByMessageId("m1")).toBe(true);
    expect(stores.valuePosts.deleteByMessageId("m1")).toBe(false);
    expect(stores.valuePosts.getByMessageId("m1")).toBeNull();
  });
});
