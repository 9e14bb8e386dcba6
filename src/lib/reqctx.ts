/**
 * Grindboard — src/lib/reqctx.ts
 * WHAT: Async-local trace context shared by commands, buttons, gateway events and scheduled jobs.
 * FLOWS: runWithCtx(meta, fn) → ctx() / currentTraceId() anywhere below it
 * DOCS:
 *  - Node AsyncLocalStorage: https://nodejs.org/api/async_context.html#class-asynclocalstorage
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export type ReqKind = "slash" | "button" | "event" | "scheduler";

export type ReqContext = {
  traceId: string;
  /** Command name, button handler name, event name or job name */
  cmd?: string;
  kind?: ReqKind;
  userId?: string;
  guildId?: string | null;
  channelId?: string | null;
};

const storage = new AsyncLocalStorage<ReqContext>();

const ALPHABET = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const TRACE_LEN = 11;

export function newTraceId(): string {
  return Array.from(randomBytes(TRACE_LEN), (b) => ALPHABET[b % ALPHABET.length]).join("");
}

function inherit(parent: ReqContext | undefined, meta: Partial<ReqContext>): ReqContext {
  return {
    traceId: meta.traceId ?? parent?.traceId ?? newTraceId(),
    cmd: meta.cmd ?? parent?.cmd,
    kind: meta.kind ?? parent?.kind,
    userId: meta.userId ?? parent?.userId,
    guildId: meta.guildId ?? parent?.guildId ?? null,
    channelId: meta.channelId ?? parent?.channelId ?? null,
  };
}

/**
 * Unset fields come from the enclosing context. discord.js listeners start
 * with no context, which is why eventWrap and wrapCommand open one.
 */
export function runWithCtx<T>(meta: Partial<ReqContext>, fn: () => T): T {
  return storage.run(inherit(storage.getStore(), meta), fn);
}

export function ctx(): Partial<ReqContext> {
  return storage.getStore() ?? {};
}

export function currentTraceId(): string | undefined {
  return storage.getStore()?.traceId;
}
