/**
 * Grindboard — tests/config.test.ts
 * WHAT: BotConfig built from the validated env, and the challenge window check.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { buildConfig, isChallengeActive } from "../src/config.js";
import { env } from "../src/lib/env.js";
import { createTestConfig } from "./utils/testDeps.js";

describe("buildConfig", () => {
  it("maps env keys onto the nested config", () => {
    const config = buildConfig(env);
    expect(config.guildId).toBe("guild-1");
    expect(config.adminRoleId).toBe("role-admin");
    expect(config.channels).toEqual({
      leaderboard: "chan-leaderboard",
      wins: "chan-wins",
      valueDrops: "chan-drops",
      submissions: "chan-submissions",
      announcements: "chan-announcements",
    });
    expect(config.challenge.startDate).toBe("2026-01-01");
    expect(config.challenge.endDate).toBe("2026-03-31");
    expect(config.limits.maxValuePostsPerDay).toBe(2);
  });
});

describe("isChallengeActive", () => {
  const config = createTestConfig();

  it("is true on the last day of the challenge", () => {
    expect(isChallengeActive(config, new Date("2026-03-31T22:00:00.000Z"))).toBe(true);
  });

  it("is false before the start and after the end", () => {
    expect(isChallengeActive(config, new Date("2025-12-31T12:00:00.000Z"))).toBe(false);
    expect(isChallengeActive(config, new Date("2026-04-01T00:00:01.000Z"))).toBe(false);
  });
});
