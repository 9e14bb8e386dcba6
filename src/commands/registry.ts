/**
 * Grindboard — src/commands/registry.ts
 * WHAT: The one list of slash commands: JSON for registration, wrapped handlers for dispatch.
 * FLOWS:
 *  - getAllSlashCommands() → JSON bodies for REST sync and scripts/commands.ts
 *  - buildCommandMap(deps) → name → wrapCommand(handler bound to deps)
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ChatInputCommandInteraction, RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import { wrapCommand, type CommandContext } from "../lib/cmdWrap.js";
import type { BotDeps } from "../config.js";
import * as points from "./points.js";
import * as leaderboard from "./leaderboard.js";
import * as mytier from "./mytier.js";
import * as submitwin from "./submitwin.js";
import * as submitreferral from "./submitreferral.js";
import * as applyscaler from "./applyscaler.js";
import * as addpoints from "./addpoints.js";
import * as removepoints from "./removepoints.js";
import * as setpoints from "./setpoints.js";
import * as viewuser from "./viewuser.js";
import * as updateleaderboard from "./updateleaderboard.js";
import * as pendingsubmissions from "./pendingsubmissions.js";

export interface SlashCommandModule {
  data: { readonly name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  execute(ctx: CommandContext, deps: BotDeps): Promise<void>;
}

export const COMMAND_MODULES: readonly SlashCommandModule[] = [
  points,
  leaderboard,
  mytier,
  submitwin,
  submitreferral,
  applyscaler,
  addpoints,
  removepoints,
  setpoints,
  viewuser,
  updateleaderboard,
  pendingsubmissions,
];

export type SlashHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;

export function getAllSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return COMMAND_MODULES.map((mod) => mod.data.toJSON());
}

export function buildCommandMap(deps: BotDeps): Map<string, SlashHandler> {
  const commands = new Map<string, SlashHandler>();
  for (const mod of COMMAND_MODULES) {
    commands.set(
      mod.data.name,
      wrapCommand<ChatInputCommandInteraction>(mod.data.name, (ctx) => mod.execute(ctx, deps))
    );
  }
  return commands;
}
