/**
 * Grindboard — src/commands/sync.ts
 * WHAT: Guild-scoped slash-command sync via bulk overwrite.
 * FLOWS: serialize commands → REST PUT to the guild endpoint → log
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { getAllSlashCommands } from "./registry.js";
import { logger } from "../lib/logger.js";

export interface SyncTarget {
  token: string;
  clientId: string;
  guildId: string;
}

/**
 * PUT replaces the guild's whole command set, so removed commands disappear
 * too. Guild commands update instantly. Returns the number of commands sent.
 */
export async function syncCommandsToGuild(target: SyncTarget, rest?: Pick<REST, "put">): Promise<number> {
  const body = getAllSlashCommands();
  const client = rest ?? new REST({ version: "10" }).setToken(target.token);
  await client.put(Routes.applicationGuildCommands(target.clientId, target.guildId), { body });
  logger.info(
    { evt: "cmd_sync", guildId: target.guildId, count: body.length },
    "[cmdsync] synced commands to guild"
  );
  return body.length;
}
