/**
 * Grindboard — tests/features/notify.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { postLimitDm, postLimitWarning, sendDm, submissionApprovedDm } from "../../src/features/notify.js";
import type { SubmissionRow } from "../../src/store/index.js";
import { createDiscordAPIError, createMockClient, createMockUser } from "../utils/discordMocks.js";

const row: SubmissionRow = {
  id: 7,
  user_id: "u1",
  submission_type: "win",
  status: "approved",
  description: null,
  proof_url: null,
  amount: 1200,
  referral_type: null,
  points_awarded: 30,
  reviewed_by: "mod-1",
  reviewed_at: "2026-01-15T12:00:00.000Z",
  created_at: "2026-01-15T11:00:00.000Z",
  updated_at: "2026-01-15T12:00:00.000Z",
};

describe("sendDm", () => {
  it("delivers and reports success", async () => {
    const user = createMockUser({ id: "u1" });
    await expect(sendDm(createMockClient({ users: [user] }), "u1", "hello")).resolves.toBe(true);
    expect(user.send).toHaveBeenCalledWith({ content: "hello" });
  });

  it("returns false for closed DMs or unknown users", async () => {
    const closed = createMockUser({ id: "u1", dmError: createDiscordAPIError(50007, "Cannot send messages to this user", 403) });
    await expect(sendDm(createMockClient({ users: [closed] }), "u1", "hello")).resolves.toBe(false);
    await expect(sendDm(createMockClient(), "ghost", "hello")).resolves.toBe(false);
  });
});

describe("message texts", () => {
  it("summarises an approval", () => {
    expect(submissionApprovedDm(row, 30)).toBe(
      "✅ Your submission has been approved!\n\n**Type:** win\n**Points Awarded:** +30\n**Submission ID:** `7`"
    );
  });

  it("explains the post limit", () => {
    expect(postLimitDm(2, "chan-drops")).toBe(
      "⚠️ You've reached the maximum of 2 value posts per day.\n\nYour message in <#chan-drops> was removed. Please try again tomorrow!"
    );
    expect(postLimitWarning("u1", 2)).toBe(
      "⚠️ <@u1> You've reached the maximum of **2 value posts per day**. Your message was removed. Please try again tomorrow!"
    );
  });
});
