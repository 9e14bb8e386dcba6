/**
 * Grindboard — tests/lib/errorCard.test.ts
 * WHAT: The card shown when a command fails.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { buildErrorCard, hintFor } from "../../src/lib/errorCard.js";
import { classifyError, ConfigError, ConflictError } from "../../src/lib/errors.js";
import { COLORS } from "../../src/lib/constants.js";
import { createDiscordAPIError, createSqliteError } from "../utils/discordMocks.js";

const base = { traceId: "trace-1", cmd: "points", phase: "db_read" };

describe("buildErrorCard", () => {
  it("uses the plain error card for invoker-facing kinds", () => {
    const card = buildErrorCard({ ...base, classified: classifyError(new ConflictError("❌ This submission was already approved.")) });
    expect(card.data.title).toBe("❌ Error");
    expect(card.data.description).toBe("❌ This submission was already approved.");
    expect(card.data.color).toBe(COLORS.error);
  });

  it("shows config errors verbatim", () => {
    const card = buildErrorCard({
      ...base,
      classified: classifyError(new ConfigError("❌ Leaderboard channel not found. Check configuration.", "Leaderboard")),
    });
    expect(card.data.description).toBe("❌ Leaderboard channel not found. Check configuration.");
  });

  it("lists diagnostics for everything else", () => {
    const card = buildErrorCard({ ...base, classified: classifyError(createSqliteError("SQLITE_ERROR", "no such table: users")) });
    expect(card.data.title).toBe("Command Error");
    expect(card.data.description).toBe("A database error occurred.");
    expect(card.data.fields).toEqual(
      expect.arrayContaining([
        { name: "Command", value: "points", inline: true },
        { name: "Kind", value: "db_error", inline: true },
        { name: "Last SQL", value: "n/a" },
        { name: "Trace", value: "trace-1", inline: true },
        { name: "Hint", value: "Schema missing. Restart the bot so the database is initialised." },
      ])
    );
  });
});

describe("hintFor", () => {
  it("explains common Discord codes", () => {
    expect(hintFor(classifyError(createDiscordAPIError(10062, "Unknown interaction")))).toBe(
      "Interaction expired; handler didn't defer in time."
    );
    expect(hintFor(classifyError(createDiscordAPIError(50013, "Missing Permissions")))).toBe(
      "Missing Discord permission in this channel."
    );
    expect(hintFor(classifyError(createDiscordAPIError(99999, "??")))).toBe(
      "Discord rejected the request. Try again or contact staff."
    );
  });

  it("has a generic hint for unknown errors", () => {
    expect(hintFor(classifyError(new Error("x")))).toBe("Unexpected error. Try again or contact staff.");
  });
});
