/**
 * Grindboard — tests/commands/submit.test.ts
 * WHAT: /submitwin, /submitreferral and /applyscaler.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { TextChannel } from "discord.js";
import type { Db } from "../../src/db/db.js";
import type { BotDeps } from "../../src/config.js";
import { execute as submitwin } from "../../src/commands/submitwin.js";
import { execute as submitreferral } from "../../src/commands/submitreferral.js";
import { execute as applyscaler } from "../../src/commands/applyscaler.js";
import {
  createMockClient,
  createMockInteraction,
  createMockTextChannel,
  createMockUser,
  type MockOptionsConfig,
} from "../utils/discordMocks.js";
import { createTestCommandContext } from "../utils/contextFactory.js";
import { embedPayload } from "../utils/embeds.js";
import { createTestDeps } from "../utils/testDeps.js";

describe("submission commands", () => {
  let db: Db;
  let deps: BotDeps;
  let reviewChannel: TextChannel;

  beforeEach(() => {
    ({ db, deps } = createTestDeps({ limits: { maxReferrals: 2 } }));
    reviewChannel = createMockTextChannel({ id: "chan-submissions" });
  });

  afterEach(() => {
    db.close();
  });

  function interactionWith(strings: MockOptionsConfig["strings"]) {
    return createMockInteraction({
      user: createMockUser({ id: "u1", username: "alice" }),
      client: createMockClient({ channels: [reviewChannel] }),
      options: { strings },
    });
  }

  describe("/submitwin", () => {
    it("stores a pending win and posts its review card", async () => {
      const interaction = interactionWith({ amount: "$1,200", description: "retainer <@123>", proof_url: "" });

      await submitwin(createTestCommandContext(interaction), deps);

      expect(deps.stores.submissions.require(1)).toMatchObject({
        user_id: "u1",
        submission_type: "win",
        status: "pending",
        amount: 1200,
        description: "retainer",
        proof_url: null,
      });
      expect(reviewChannel.send).toHaveBeenCalledTimes(1);
      expect(interaction.editReply).toHaveBeenCalledWith(
        embedPayload({
          description:
            "✅ Win submitted for review!\n\n**Amount:** $1200.00\n**Submission ID:** `1`\n\nA moderator will review your submission shortly.",
        })
      );
    });

    it("rejects a non-numeric amount", async () => {
      const interaction = interactionWith({ amount: "lots", description: "x" });
      await expect(submitwin(createTestCommandContext(interaction), deps)).rejects.toThrow(
        "❌ Invalid amount format. Please use numbers only (e.g., 100, 500, 1000)"
      );
      expect(deps.stores.submissions.count()).toBe(0);
    });

    it("rejects a malformed proof URL", async () => {
      const interaction = interactionWith({ amount: "100", description: "x", proof_url: "not a url" });
      await expect(submitwin(createTestCommandContext(interaction), deps)).rejects.toThrow(
        "❌ Invalid URL format. Please provide a valid URL or leave it empty."
      );
    });
  });

  describe("/submitreferral", () => {
    it("stores the referral and shows what is left", async () => {
      const interaction = interactionWith({ referral_type: "whop", username: "bob" });

      await submitreferral(createTestCommandContext(interaction), deps);

      expect(deps.stores.submissions.require(1)).toMatchObject({
        submission_type: "referral",
        referral_type: "whop",
        description: "Referred: bob",
      });
      expect(interaction.editReply).toHaveBeenCalledWith(
        embedPayload({
          description:
            "✅ Referral submitted for review!\n\n**Type:** WHOP\n**Username:** bob\n**Potential Points:** +10\n**Submission ID:** `1`\n\nReferrals remaining: 1/2",
        })
      );
    });

    it("refuses once the approved cap is reached", async () => {
      deps.stores.users.getOrCreate("u1", "alice");
      deps.stores.users.incrementReferrals("u1");
      deps.stores.users.incrementReferrals("u1");

      const interaction = interactionWith({ referral_type: "discord", username: "bob" });
      await expect(submitreferral(createTestCommandContext(interaction), deps)).rejects.toThrow(
        "❌ You've reached the maximum of 2 referrals!"
      );
    });

    it("counts referrals still waiting for review toward the cap", async () => {
      const first = interactionWith({ referral_type: "whop", username: "bob" });
      const second = interactionWith({ referral_type: "whop", username: "carol" });
      const third = interactionWith({ referral_type: "discord", username: "dave" });

      await submitreferral(createTestCommandContext(first), deps);
      await submitreferral(createTestCommandContext(second), deps);

      expect(second.editReply).toHaveBeenCalledWith(
        embedPayload({
          description:
            "✅ Referral submitted for review!\n\n**Type:** WHOP\n**Username:** carol\n**Potential Points:** +10\n**Submission ID:** `2`\n\nReferrals remaining: 0/2",
        })
      );
      await expect(submitreferral(createTestCommandContext(third), deps)).rejects.toThrow(
        "❌ You've reached the maximum of 2 referrals!"
      );
      expect(deps.stores.submissions.countPending("u1", "referral")).toBe(2);
    });

    it("rejects an unknown referral type", async () => {
      const interaction = interactionWith({ referral_type: "email", username: "bob" });
      await expect(submitreferral(createTestCommandContext(interaction), deps)).rejects.toThrow(
        "❌ Unknown referral type."
      );
    });
  });

  describe("/applyscaler", () => {
    it("stores an application with its proof", async () => {
      const interaction = interactionWith({ description: "$1.5K/day for 2 weeks", proof_url: "https://example.com/rev.png" });

      await applyscaler(createTestCommandContext(interaction), deps);

      expect(deps.stores.submissions.require(1)).toMatchObject({
        submission_type: "scaler_application",
        proof_url: "https://example.com/rev.png",
      });
      expect(reviewChannel.send).toHaveBeenCalledWith(
        expect.objectContaining({
          embeds: [expect.objectContaining({ data: expect.objectContaining({ title: "⚙️ Scaler Application" }) })],
        })
      );
    });

    it("refuses verified scalers and bad proof", async () => {
      const bad = interactionWith({ description: "x", proof_url: "ftp://example.com" });
      await expect(applyscaler(createTestCommandContext(bad), deps)).rejects.toThrow(
        "❌ Invalid URL format. Please provide a valid proof URL."
      );

      deps.stores.users.setScaler("u1", true);
      const again = interactionWith({ description: "x", proof_url: "https://example.com/rev.png" });
      await expect(applyscaler(createTestCommandContext(again), deps)).rejects.toThrow(
        "❌ You're already verified as a Scaler!"
      );
    });
  });
});
