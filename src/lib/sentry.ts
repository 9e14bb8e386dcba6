/**
 * Grindboard — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and the few capture helpers the bot uses.
 * Every helper is a no-op until initializeSentry() succeeded, so callers never check.
 * FLOWS: initializeSentry() → scrubEvent on every event → captureException → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import { env } from "./env.js";
import { logger } from "./logger.js";

const TOKEN_RE = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const REDACTED = "[REDACTED_TOKEN]";

let sentryEnabled = false;

/** Structure check only: https://{key}@{host}/{project} */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

interface ScrubbableEvent {
  message?: string;
  exception?: { values?: Array<{ value?: string }> };
}

/** Bot tokens can end up in error text (a failed login, a logged config dump). */
export function scrubEvent<E extends ScrubbableEvent>(event: E): E {
  if (event.message) {
    event.message = event.message.replace(TOKEN_RE, REDACTED);
  }
  for (const ex of event.exception?.values ?? []) {
    if (ex.value) ex.value = ex.value.replace(TOKEN_RE, REDACTED);
  }
  return event;
}

/**
 * Only activates with a well-formed SENTRY_DSN, and never under Vitest.
 */
export function initializeSentry(): void {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `grindboard@${process.env.npm_package_version ?? "unknown"}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
      initialScope: { tags: { guild: env.GUILD_ID, challenge: env.CHALLENGE_NAME } },
      beforeSend: (event) => scrubEvent(event),
      // Transient network noise; logged locally with more context anyway.
      ignoreErrors: ["AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });
    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;
  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;
  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>): void {
  if (!sentryEnabled) return;
  Sentry.setContext(name, context);
}

/**
 * Flush pending events before exit.
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;
  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
