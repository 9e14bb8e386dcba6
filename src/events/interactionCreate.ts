/**
 * Grindboard — src/events/interactionCreate.ts
 * WHAT: Routes slash commands to the registry and review buttons to the review flow.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ButtonInteraction, Interaction } from "discord.js";
import { logger } from "../lib/logger.js";
import { wrapCommand } from "../lib/cmdWrap.js";
import { parseReviewButtonId } from "../lib/componentIds.js";
import type { BotDeps } from "../config.js";
import { buildCommandMap } from "../commands/registry.js";
import { handleReviewButton } from "../features/reviewFlow.js";

export function createInteractionRouter(deps: BotDeps): (interaction: Interaction) => Promise<void> {
  const commands = buildCommandMap(deps);
  const reviewButton = wrapCommand<ButtonInteraction>("review_button", (ctx) => handleReviewButton(ctx, deps));

  return async (interaction: Interaction) => {
    if (interaction.isChatInputCommand()) {
      const handler = commands.get(interaction.commandName);
      if (!handler) {
        logger.warn({ evt: "cmd_unknown", cmd: interaction.commandName }, "[router] Unknown command");
        return;
      }
      await handler(interaction);
      return;
    }

    if (interaction.isButton() && parseReviewButtonId(interaction.customId)) {
      await reviewButton(interaction);
    }
  };
}
