/**
 * Grindboard — tests/lib/errors.test.ts
 * WHAT: Error classification, Sentry filtering and the messages the invoker sees.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import {
  ConfigError,
  ConflictError,
  NotFoundError,
  ValidationError,
  classifyError,
  errorContext,
  isDmBlocked,
  shouldReportToSentry,
  userFriendlyMessage,
} from "../../src/lib/errors.js";
import { createDiscordAPIError, createNetworkError, createSqliteError } from "../utils/discordMocks.js";

describe("classifyError", () => {
  it("maps the domain classes to their kinds", () => {
    expect(classifyError(new NotFoundError("Submission", "5"))).toMatchObject({
      kind: "not_found",
      entity: "Submission",
      id: "5",
      message: "Submission 5 not found",
    });
    expect(classifyError(new ConflictError("already done", "approved"))).toMatchObject({
      kind: "conflict",
      currentState: "approved",
    });
    expect(classifyError(new ValidationError("amount", "❌ bad amount"))).toMatchObject({
      kind: "validation",
      field: "amount",
      message: "❌ bad amount",
    });
    expect(classifyError(new ConfigError("❌ gone", "Leaderboard"))).toMatchObject({ kind: "config", key: "Leaderboard" });
  });

  it("recognises SQLite errors by name", () => {
    expect(classifyError(createSqliteError("SQLITE_BUSY", "database is locked"))).toMatchObject({
      kind: "db_error",
      code: "SQLITE_BUSY",
      message: "database is locked",
    });
  });

  it("recognises Discord REST errors and keeps the HTTP status", () => {
    expect(classifyError(createDiscordAPIError(50013, "Missing Permissions", 403))).toMatchObject({
      kind: "discord_api",
      code: 50013,
      httpStatus: 403,
    });
  });

  it("recognises Node network errors", () => {
    expect(classifyError(createNetworkError("ECONNRESET"))).toMatchObject({
      kind: "network",
      code: "ECONNRESET",
      host: "discord.com",
    });
  });

  it("falls back to unknown", () => {
    expect(classifyError(null)).toEqual({ kind: "unknown", message: "Unknown error (null/undefined)" });
    expect(classifyError("boom")).toEqual({ kind: "unknown", message: "boom" });
    expect(classifyError(new Error("plain"))).toMatchObject({ kind: "unknown", message: "plain" });
  });
});

describe("shouldReportToSentry", () => {
  it("skips user mistakes and routine Discord codes", () => {
    expect(shouldReportToSentry(classifyError(new ValidationError("x", "bad")))).toBe(false);
    expect(shouldReportToSentry(classifyError(new ConflictError("dup")))).toBe(false);
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(50007, "Cannot send messages to this user")))).toBe(false);
    expect(shouldReportToSentry(classifyError(createNetworkError("ETIMEDOUT")))).toBe(false);
  });

  it("reports database, config and unexpected errors", () => {
    expect(shouldReportToSentry(classifyError(createSqliteError("SQLITE_CORRUPT", "malformed")))).toBe(true);
    expect(shouldReportToSentry(classifyError(new ConfigError("missing")))).toBe(true);
    expect(shouldReportToSentry(classifyError(createDiscordAPIError(50035, "Invalid Form Body")))).toBe(true);
    expect(shouldReportToSentry(classifyError(new Error("boom")))).toBe(true);
  });
});

describe("userFriendlyMessage", () => {
  it("passes invoker-facing messages through", () => {
    expect(userFriendlyMessage(classifyError(new ValidationError("x", "❌ Points must be greater than 0.")))).toBe(
      "❌ Points must be greater than 0."
    );
  });

  it("replaces internal details with fixed text", () => {
    expect(userFriendlyMessage(classifyError(createSqliteError("SQLITE_BUSY", "locked")))).toBe(
      "Database is temporarily busy. Please try again."
    );
    expect(userFriendlyMessage(classifyError(createDiscordAPIError(10062, "Unknown interaction")))).toBe(
      "This interaction has expired. Please try the command again."
    );
    expect(userFriendlyMessage(classifyError(new Error("stack details")))).toBe("An unexpected error occurred.");
  });
});

describe("errorContext", () => {
  it("adds kind-specific fields to the extras", () => {
    expect(errorContext(classifyError(new NotFoundError("Submission", "5")), { cmd: "review" })).toEqual({
      errorKind: "not_found",
      errorMessage: "Submission 5 not found",
      cmd: "review",
      entity: "Submission",
      entityId: "5",
    });
  });
});

describe("isDmBlocked", () => {
  it("is true only for Discord code 50007", () => {
    expect(isDmBlocked(createDiscordAPIError(50007, "Cannot send messages to this user", 403))).toBe(true);
    expect(isDmBlocked(createDiscordAPIError(10013, "Unknown User", 404))).toBe(false);
    expect(isDmBlocked(new Error("x"))).toBe(false);
  });
});
