/**
 * Grindboard — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js gateway handlers.
 * FLOWS: wrapEvent(name, handler) → runs under a fresh trace id → catches, classifies, logs, maybe reports
 * USAGE:
 *  client.on(Events.MessageDelete, wrapEvent("messageDelete", (msg) => onMessageDelete(deps, msg)));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { runWithCtx } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

const DEFAULT_EVENT_TIMEOUT_MS = Number.parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

/**
 * The returned handler never rejects. A timeout is logged as an error;
 * the underlying work keeps running.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    const contextIds = extractEventContext(args);
    await runWithCtx({ kind: "event", cmd: eventName }, async () => {
      let timer: NodeJS.Timeout | undefined;
      try {
        await Promise.race([
          Promise.resolve(handler(...args)),
          new Promise<void>((_, reject) => {
            timer = setTimeout(() => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)), timeoutMs);
            timer.unref();
          }),
        ]);
      } catch (err) {
        const classified = classifyError(err);
        logger.error(
          { evt: "event_error", event: eventName, ...errorContext(classified, contextIds), err },
          `[${eventName}] event handler failed: ${classified.message}`
        );
        if (shouldReportToSentry(classified)) {
          captureException(err, { event: eventName, errorKind: classified.kind, ...contextIds });
        }
      } finally {
        if (timer) clearTimeout(timer);
      }
    });
  };
}

function readId(value: unknown, key: string): string | undefined {
  if (!value || typeof value !== "object" || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
}

function readObject(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object" || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

/** Probes message/reaction/user shapes for ids to attach to error logs. */
function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};
  for (const arg of args) {
    const guildId = readId(arg, "guildId") ?? readId(readObject(arg, "guild"), "id");
    if (guildId) context.guildId = guildId;
    const channelId = readId(arg, "channelId");
    if (channelId) context.channelId = channelId;
    const userId = readId(readObject(arg, "author"), "id") ?? readId(readObject(arg, "user"), "id");
    if (userId && !context.userId) context.userId = userId;
    const messageId = readId(readObject(arg, "message"), "id");
    if (messageId) context.messageId = messageId;
    const entityId = readId(arg, "id");
    if (entityId && !context.entityId) context.entityId = entityId;
  }
  return context;
}
