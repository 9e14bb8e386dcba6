/**
 * Grindboard — src/lib/errors.ts
 * WHAT: Domain error classes plus a discriminated union for classifying anything a catch block sees.
 * FLOWS:
 *  - throw new NotFoundError(...) / ConflictError(...) / ValidationError(...) from domain code
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - userFriendlyMessage(err) → what the invoker sees
 * USAGE:
 *  const classified = classifyError(err);
 *  if (classified.kind === "conflict") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Domain errors =====

/**
 * Raised when a row the operation depends on is missing
 * (submission, user, channel).
 */
export class NotFoundError extends Error {
  readonly kind = "not_found" as const;
  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super(`${entity} ${id} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * Raised when a state transition finds the row already moved on
 * (submission no longer pending).
 */
export class ConflictError extends Error {
  readonly kind = "conflict" as const;
  constructor(
    message: string,
    readonly currentState?: string,
  ) {
    super(message);
    this.name = "ConflictError";
  }
}

/** A configured id (channel, role) does not resolve to something usable. */
export class ConfigError extends Error {
  readonly kind = "config" as const;
  constructor(
    message: string,
    readonly key?: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Bad user input. Reported to the invoker, never to Sentry. */
export class ValidationError extends Error {
  readonly kind = "validation" as const;
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

// ===== Classified union =====

interface BaseClassified {
  message: string;
  cause?: Error;
}

export interface DbErrorInfo extends BaseClassified {
  kind: "db_error";
  code: string;
}

export interface DiscordApiErrorInfo extends BaseClassified {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface ValidationErrorInfo extends BaseClassified {
  kind: "validation";
  field: string;
}

export interface NotFoundErrorInfo extends BaseClassified {
  kind: "not_found";
  entity: string;
  id: string;
}

export interface ConflictErrorInfo extends BaseClassified {
  kind: "conflict";
  currentState?: string;
}

export interface NetworkErrorInfo extends BaseClassified {
  kind: "network";
  code: string;
  host?: string;
}

export interface ConfigErrorInfo extends BaseClassified {
  kind: "config";
  key?: string;
}

export interface UnknownErrorInfo extends BaseClassified {
  kind: "unknown";
}

export type ClassifiedError =
  | DbErrorInfo
  | DiscordApiErrorInfo
  | ValidationErrorInfo
  | NotFoundErrorInfo
  | ConflictErrorInfo
  | NetworkErrorInfo
  | ConfigErrorInfo
  | UnknownErrorInfo;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readField(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

function readString(obj: object, key: string): string | undefined {
  const v = readField(obj, key);
  return typeof v === "string" ? v : undefined;
}

function readNumber(obj: object, key: string): number | undefined {
  const v = readField(obj, key);
  return typeof v === "number" ? v : undefined;
}

/**
 * Ordered from most specific to least: our own classes, SQLite,
 * Discord REST, Node network codes, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err instanceof NotFoundError) {
    return { kind: "not_found", entity: err.entity, id: err.id, message: err.message, cause: err };
  }
  if (err instanceof ConflictError) {
    return { kind: "conflict", currentState: err.currentState, message: err.message, cause: err };
  }
  if (err instanceof ValidationError) {
    return { kind: "validation", field: err.field, message: err.message, cause: err };
  }
  if (err instanceof ConfigError) {
    return { kind: "config", key: err.key, message: err.message, cause: err };
  }

  if (!err || typeof err !== "object") {
    return { kind: "unknown", message: err === undefined || err === null ? "Unknown error (null/undefined)" : String(err) };
  }

  const obj: object = err;
  const message = readString(obj, "message") ?? String(err);
  const name = readString(obj, "name");
  const cause = err instanceof Error ? err : undefined;
  const stringCode = readString(obj, "code");
  const numericCode = readNumber(obj, "code");

  if (name === "SqliteError" || stringCode?.startsWith("SQLITE_")) {
    return { kind: "db_error", code: stringCode ?? "UNKNOWN", message, cause };
  }

  if (numericCode !== undefined && (name === "DiscordAPIError" || name?.startsWith("DiscordAPIError"))) {
    return {
      kind: "discord_api",
      code: numericCode,
      httpStatus: readNumber(obj, "status"),
      method: readString(obj, "method"),
      path: readString(obj, "url"),
      message,
      cause,
    };
  }

  if (stringCode && NETWORK_CODES.includes(stringCode)) {
    return { kind: "network", code: stringCode, host: readString(obj, "hostname"), message, cause };
  }

  return { kind: "unknown", message, cause };
}

/**
 * Sentry should mean "something is broken", not "Discord had a hiccup"
 * or "user typed a bad URL".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
        50007, // Cannot send messages to this user (DMs closed)
        50013, // Missing permissions
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
    case "validation":
    case "not_found":
    case "conflict":
      return false;
    default:
      return true;
  }
}

/** Structured context for log lines. */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {},
): Record<string, unknown> {
  const base = { errorKind: err.kind, errorMessage: err.message, ...extra };
  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code };
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "not_found":
      return { ...base, entity: err.entity, entityId: err.id };
    case "conflict":
      return { ...base, currentState: err.currentState };
    case "config":
      return { ...base, configKey: err.key };
    default:
      return base;
  }
}

export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "validation":
    case "not_found":
    case "conflict":
      return err.message;
    case "db_error":
      return err.code === "SQLITE_BUSY"
        ? "Database is temporarily busy. Please try again."
        : "A database error occurred.";
    case "discord_api":
      if (err.code === 10062) return "This interaction has expired. Please try the command again.";
      if (err.code === 50013) return "I don't have permission to do that.";
      return "Discord API error occurred.";
    case "network":
      return "Network error. Please try again.";
    case "config":
      return "The bot is misconfigured. Please contact an admin.";
    default:
      return "An unexpected error occurred.";
  }
}

/** Discord code 50007: the user has DMs closed or blocked the bot. */
export function isDmBlocked(err: unknown): boolean {
  const classified = classifyError(err);
  return classified.kind === "discord_api" && classified.code === 50007;
}
