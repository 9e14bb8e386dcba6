/**
 * Grindboard — src/lib/errorCard.ts
 * WHAT: Formats and posts the ephemeral card a user sees when a command fails.
 * FLOWS: classified error → expected? plain red "Error" embed : diagnostics card with trace id → replyOrEdit
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { logger, redact } from "./logger.js";
import { replyOrEdit, type InstrumentedInteraction } from "./cmdWrap.js";
import { userFriendlyMessage, type ClassifiedError } from "./errors.js";
import { COLORS } from "./constants.js";
import { errorEmbed } from "../ui/cards.js";

/**
 * Discord error codes are cryptic; nobody should have to search for "10062".
 */
export function hintFor(err: ClassifiedError): string {
  if (err.kind === "db_error") {
    return /no such table/i.test(err.message)
      ? "Schema missing. Restart the bot so the database is initialised."
      : "Database error. Try again in a moment.";
  }
  if (err.kind !== "discord_api") return "Unexpected error. Try again or contact staff.";

  switch (err.code) {
    case 10003:
      return "Channel not found. It may have been deleted or the bot lacks visibility.";
    case 10008:
      return "Message not found. It may have been deleted.";
    case 10062:
      return "Interaction expired; handler didn't defer in time.";
    case 40060:
      return "Already acknowledged; avoid double reply.";
    case 50001:
      return "Bot lacks access to this resource. Check channel visibility and role permissions.";
    case 50013:
      return "Missing Discord permission in this channel.";
    case 50035:
      return "Invalid request format. Report to staff with the trace id.";
    default:
      return "Discord rejected the request. Try again or contact staff.";
  }
}

function truncate(text: string, max: number): string {
  const cleaned = text.replace(/\s+/g, " ").trim();
  return cleaned.length <= max ? cleaned : `${cleaned.slice(0, max)}...`;
}

type ErrorCardDetails = {
  traceId: string;
  cmd: string;
  phase: string;
  classified: ClassifiedError;
  lastSql?: string | null;
};

export function buildErrorCard(details: ErrorCardDetails): EmbedBuilder {
  const { classified } = details;
  // These carry a message written for the invoker; config errors also name what to fix.
  if (
    classified.kind === "validation" ||
    classified.kind === "not_found" ||
    classified.kind === "conflict" ||
    classified.kind === "config"
  ) {
    return errorEmbed(classified.message);
  }

  return new EmbedBuilder()
    .setTitle("Command Error")
    .setDescription(userFriendlyMessage(classified))
    .setColor(COLORS.error)
    .addFields(
      { name: "Command", value: details.cmd, inline: true },
      { name: "Phase", value: details.phase || "unknown", inline: true },
      { name: "Kind", value: classified.kind, inline: true },
      { name: "Message", value: truncate(redact(classified.message), 200) || "No message provided" },
      { name: "Last SQL", value: details.lastSql ? truncate(details.lastSql, 140) : "n/a" },
      { name: "Trace", value: details.traceId, inline: true },
      { name: "Hint", value: hintFor(classified) }
    )
    .setFooter({ text: new Date().toISOString() });
}

export async function postErrorCard(interaction: InstrumentedInteraction, details: ErrorCardDetails): Promise<void> {
  try {
    await replyOrEdit(interaction, { embeds: [buildErrorCard(details)] });
  } catch (err) {
    logger.error({ err, traceId: details.traceId, evt: "error_card_fail" }, "failed to deliver error card");
  }
}
