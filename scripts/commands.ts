/**
 * Grindboard — scripts/commands.ts
 * WHAT: Print or deploy the slash-command set without starting the bot.
 * USAGE:
 *  tsx scripts/commands.ts print         # one line per command
 *  tsx scripts/commands.ts print --json  # full JSON bodies
 *  tsx scripts/commands.ts deploy        # bulk overwrite on GUILD_ID
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { getAllSlashCommands } from "../src/commands/registry.js";
import { syncCommandsToGuild } from "../src/commands/sync.js";
import { env } from "../src/lib/env.js";
import { logger } from "../src/lib/logger.js";

export function formatCommandTree(commands: RESTPostAPIChatInputApplicationCommandsJSONBody[]): string[] {
  return commands.map((command) => {
    const options = (command.options ?? []).map((opt) => ("required" in opt && opt.required ? opt.name : `${opt.name}?`));
    return `/${command.name} — options:[${options.join(", ")}]`;
  });
}

async function run(argv: string[]): Promise<void> {
  const [mode = "print", ...flags] = argv;
  const commands = getAllSlashCommands();

  if (mode === "print") {
    const out = flags.includes("--json") ? JSON.stringify(commands, null, 2) : formatCommandTree(commands).join("\n");
    process.stdout.write(`${out}\n`);
    return;
  }
  if (mode === "deploy") {
    const count = await syncCommandsToGuild({ token: env.DISCORD_TOKEN, clientId: env.CLIENT_ID, guildId: env.GUILD_ID });
    process.stdout.write(`Deployed ${count} commands to guild ${env.GUILD_ID}\n`);
    return;
  }
  throw new Error(`Unknown mode "${mode}". Use "print" or "deploy".`);
}

if (!process.env.VITEST_WORKER_ID) {
  run(process.argv.slice(2)).catch((err: unknown) => {
    logger.error({ err }, "[commands] failed");
    process.exitCode = 1;
  });
}
