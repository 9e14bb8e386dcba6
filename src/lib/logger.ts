/**
 * Grindboard — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * FLOWS: create logger → stamp trace fields from reqctx → redact helpers → forward error logs carrying an Error to Sentry
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";
import { ctx, type ReqKind } from "./reqctx.js";

/**
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: keep the host, drop the secret.
 * Mention pattern: @everyone/@here in a log line is nearly always user content.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

const REDACT_MAX = 300;

let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled or external data.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > REDACT_MAX) {
    sanitized = `${sanitized.slice(0, REDACT_MAX)}...`;
  }
  return sanitized;
}

type SerializedErr = { name?: string; code?: unknown; message?: string; stack?: string };

/** Keep only the useful fields; discord.js errors drag huge request objects along. */
function field(o: object, key: string): unknown {
  return key in o ? Reflect.get(o, key) : undefined;
}

function stringField(o: object, key: string): string | undefined {
  const v = field(o, key);
  return typeof v === "string" ? v : undefined;
}

export function serializeErr(e: unknown): SerializedErr {
  if (e instanceof Error) {
    return { name: e.name, code: field(e, "code"), message: e.message, stack: e.stack };
  }
  if (e && typeof e === "object") {
    return {
      name: stringField(e, "name"),
      code: field(e, "code"),
      message: stringField(e, "message"),
      stack: stringField(e, "stack"),
    };
  }
  return { message: String(e) };
}

export type TraceFields = { traceId?: string; cmd?: string; kind?: ReqKind };

/** Trace of the surrounding command, event or job; fields passed to the log call take precedence. */
export function traceFields(): TraceFields {
  const { traceId, cmd, kind } = ctx();
  return traceId ? { traceId, cmd, kind } : {};
}

const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : process.env.LOG_FILE
      ? {
          transport: {
            target: "pino/file",
            options: { destination: process.env.LOG_FILE, mkdir: true },
          },
        }
      : {}),
  base: undefined,
  mixin: traceFields,
  serializers: {
    err: serializeErr,
  },
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object"
              ? field(firstArg, "err")
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          // Dynamic import keeps logger.ts free of a sentry.ts → logger.ts cycle.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeErr(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
