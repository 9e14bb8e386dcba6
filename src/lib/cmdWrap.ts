/**
 * Grindboard — src/lib/cmdWrap.ts
 * WHAT: Interaction lifecycle helpers: tracing, step logging, error cards, safe defers/replies.
 * WHY: Discord wants a first response within 3 seconds; every command goes through the same guard rails.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → postErrorCard on failure
 *  - ensureDeferred(): deferReply unless already acknowledged
 *  - replyOrEdit(): reply / editReply / followUp depending on state; ephemeral by default
 * DOCS:
 *  - Interaction response rules: https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
  type ButtonInteraction,
} from "discord.js";
import { logger, redact, serializeErr } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { currentTraceId, newTraceId, runWithCtx } from "./reqctx.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";
import { postErrorCard } from "./errorCard.js";

type Phase = string;

export type InstrumentedInteraction = ChatInputCommandInteraction | ButtonInteraction;

export type CommandContext<I extends InstrumentedInteraction = ChatInputCommandInteraction> = {
  interaction: I;
  /** Mark the current execution phase ("validate", "db_write", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  /** Call before a store call so a failure card can show the statement */
  setLastSql: (sql: string | null) => void;
  readonly traceId: string;
};

type CommandExecutor<I extends InstrumentedInteraction> = (ctx: CommandContext<I>) => Promise<void>;

function inferKind(interaction: InstrumentedInteraction): "slash" | "button" {
  return interaction.isChatInputCommand() ? "slash" : "button";
}

/** REST metadata from a DiscordAPIError, body redacted and clipped. */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  const body = err.requestBody;
  if (body.json !== undefined) {
    bodySnippet = redact(JSON.stringify(body.json));
  } else if (body.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return { status: err.status, code: err.code, method: err.method, url: err.url, bodySnippet };
}

function errorCode(err: unknown): unknown {
  return serializeErr(err).code;
}

/**
 * wrapCommand
 * WHAT: Decorates a command or button handler with tracing, step logging and error-card handling.
 * RETURNS: A handler that never rejects; failures are logged, maybe sent to Sentry, and shown to the invoker.
 * PITFALLS:
 *  - Set ctx.setLastSql before store calls or the failure card shows "n/a".
 */
export function wrapCommand<I extends InstrumentedInteraction>(name: string, fn: CommandExecutor<I>) {
  return async (interaction: I): Promise<void> => {
    const traceId = currentTraceId() ?? newTraceId();
    const kind = inferKind(interaction);
    const startedAt = Date.now();
    let phase: Phase = "enter";
    let lastSql: string | null = null;

    const commandCtx: CommandContext<I> = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
        addBreadcrumb({ category: "cmd", message: name, data: { phase, traceId }, level: "info" });
      },
      currentPhase: () => phase,
      setLastSql: (sql: string | null) => {
        lastSql = sql;
      },
      traceId,
    };

    logger.info(
      { evt: "cmd_start", traceId, cmd: name, kind, userId: interaction.user.id, guildId: interaction.guildId ?? "dm" },
      "command start"
    );
    setTag("cmd", name);
    setTag("traceId", traceId);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    await runWithCtx(
      { traceId, cmd: name, kind, userId: interaction.user.id, guildId: interaction.guildId, channelId: interaction.channelId },
      async () => {
        try {
          await fn(commandCtx);
          logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
        } catch (error) {
          const classified = classifyError(error);
          const expected =
            classified.kind === "validation" || classified.kind === "not_found" || classified.kind === "conflict";
          const level = expected ? "warn" : "error";
          logger[level](
            { evt: "cmd_error", traceId, cmd: name, kind, phase, lastSql, ...errorContext(classified), err: error },
            `command error: ${classified.message}`
          );

          if (shouldReportToSentry(classified)) {
            setTag("errorKind", classified.kind);
            captureException(error, { cmd: name, phase, traceId, lastSql, errorKind: classified.kind });
          }

          try {
            await postErrorCard(interaction, { traceId, cmd: name, phase, classified, lastSql });
          } catch (cardErr) {
            logger.error({ err: cardErr, traceId, evt: "cmd_error_card_fail" }, "Failed to post error card");
          }
        }
      }
    );
  };
}

/** Mark a phase and run the work under it. */
export async function withStep<T, I extends InstrumentedInteraction>(
  ctx: CommandContext<I>,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * better-sqlite3 is synchronous, so this is too. The statement stays set
 * when run() throws so the failure card can show it.
 */
export function withSql<T>(ctx: { setLastSql: (sql: string | null) => void }, sql: string, run: () => T): T {
  ctx.setLastSql(sql);
  const result = run();
  ctx.setLastSql(null);
  return result;
}

export async function ensureDeferred(
  interaction: InstrumentedInteraction,
  opts: { ephemeral?: boolean } = {}
): Promise<void> {
  if (interaction.deferred || interaction.replied) return;
  const ephemeral = opts.ephemeral ?? true;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
  } catch (err) {
    const code = errorCode(err);
    const logPayload = { evt: "cmd_defer_fail", traceId: currentTraceId(), code, ...(discordRestMeta(err) ?? {}), err };
    if (code === 10062) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Picks reply / editReply / followUp from the interaction state.
 * Replies are ephemeral unless the payload says otherwise (flags: 0 for public).
 */
export async function replyOrEdit(interaction: InstrumentedInteraction, payload: InteractionReplyOptions): Promise<void> {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      await interaction.editReply(editPayload);
      return;
    }
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = errorCode(err);
    const logPayload = { evt: "cmd_reply_fail", traceId: currentTraceId(), code, ...(discordRestMeta(err) ?? {}), err };
    if (code === 10062) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (code === 40060) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
