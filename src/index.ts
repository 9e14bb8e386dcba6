/**
 * Grindboard — src/index.ts
 * WHAT: Process entrypoint. Opens the database, builds the client, wires handlers, logs in.
 * FLOWS:
 *  - main: Sentry → initDb (fatal on failure) → createStores → buildConfig → registerHandlers → login
 *  - Ready: presence → guild command sync → schedulers
 *  - SIGTERM/SIGINT: stop schedulers → destroy client → close DB → flush Sentry
 * DOCS:
 *  - discord.js Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { captureException, flushSentry, initializeSentry, setTag, addBreadcrumb } from "./lib/sentry.js";
import {
  ActivityType,
  Client,
  Events,
  GatewayIntentBits,
  Partials,
  type Message,
  type MessageReaction,
  type PartialMessage,
  type PartialMessageReaction,
  type TextBasedChannel,
} from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { schedulerHealthSummary } from "./lib/schedulerHealth.js";
import { closeDb, initDb } from "./db/db.js";
import { createStores } from "./store/index.js";
import { buildConfig, type BotDeps } from "./config.js";
import { syncCommandsToGuild } from "./commands/sync.js";
import { createInteractionRouter } from "./events/interactionCreate.js";
import { onMessageCreate } from "./events/messageCreate.js";
import { onReactionChange } from "./events/reactions.js";
import { onMessageDelete } from "./events/messageDelete.js";
import { onChannelPinsUpdate } from "./events/channelPinsUpdate.js";
import { startLeaderboardScheduler, stopLeaderboardScheduler } from "./scheduler/leaderboardScheduler.js";
import { startTierRoleScheduler, stopTierRoleScheduler } from "./scheduler/tierRoleScheduler.js";
import { startRetentionScheduler, stopRetentionScheduler } from "./scheduler/retentionScheduler.js";

export function createClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.GuildMessageReactions,
      GatewayIntentBits.DirectMessages,
    ],
    // Reactions and deletes on messages from before the last restart arrive as partials.
    partials: [Partials.Message, Partials.Channel, Partials.Reaction],
  });
}

async function onReady(client: Client<true>, deps: BotDeps): Promise<void> {
  logger.info({ tag: client.user.tag, id: client.user.id }, "Bot ready");
  setTag("bot_id", client.user.id);
  addBreadcrumb({ message: "Bot connected to Discord", category: "bot", level: "info" });

  client.user.setPresence({
    activities: [{ type: ActivityType.Watching, name: `${deps.config.challenge.name} 🔥` }],
  });

  try {
    await syncCommandsToGuild({ token: env.DISCORD_TOKEN, clientId: env.CLIENT_ID, guildId: deps.config.guildId });
  } catch (err) {
    logger.error({ evt: "cmd_sync_fail", guildId: deps.config.guildId, err }, "[cmdsync] failed to sync guild");
  }

  startLeaderboardScheduler(client, deps);
  startTierRoleScheduler(client, deps);
  startRetentionScheduler(deps.stores);
}

export function registerHandlers(client: Client, deps: BotDeps): void {
  client.once(
    Events.ClientReady,
    wrapEvent("clientReady", (ready: Client<true>) => onReady(ready, deps), 60_000)
  );
  client.on(Events.InteractionCreate, wrapEvent("interactionCreate", createInteractionRouter(deps)));
  client.on(
    Events.MessageCreate,
    wrapEvent("messageCreate", (message: Message) => onMessageCreate(deps, message))
  );
  client.on(
    Events.MessageReactionAdd,
    wrapEvent("messageReactionAdd", (reaction: MessageReaction | PartialMessageReaction) =>
      onReactionChange(deps, reaction)
    )
  );
  client.on(
    Events.MessageReactionRemove,
    wrapEvent("messageReactionRemove", (reaction: MessageReaction | PartialMessageReaction) =>
      onReactionChange(deps, reaction)
    )
  );
  client.on(
    Events.MessageDelete,
    wrapEvent("messageDelete", (message: Message | PartialMessage) => onMessageDelete(deps, message))
  );
  client.on(
    Events.ChannelPinsUpdate,
    wrapEvent("channelPinsUpdate", (channel: TextBasedChannel) => onChannelPinsUpdate(deps, channel))
  );
}

function installProcessHandlers(client: Client): void {
  process.on("unhandledRejection", (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  });

  process.on("uncaughtException", (error, origin) => {
    logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
    captureException(error, { context: "uncaughtException", origin });
    setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

    stopLeaderboardScheduler();
    stopTierRoleScheduler();
    stopRetentionScheduler();
    logger.info({ schedulers: schedulerHealthSummary() }, "[shutdown] Scheduler totals");

    client.removeAllListeners();
    await client.destroy();

    try {
      closeDb();
    } catch (err) {
      logger.warn({ err }, "[shutdown] Database close failed");
    }
    await flushSentry();
    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

async function main(): Promise<void> {
  initializeSentry();

  let deps: BotDeps;
  try {
    const db = initDb(env.DB_PATH);
    deps = { config: buildConfig(env), stores: createStores(db) };
  } catch (err) {
    logger.fatal({ evt: "db_init_fail", dbPath: env.DB_PATH, err }, "[startup] Database initialisation failed");
    await flushSentry();
    process.exit(1);
  }

  const client = createClient();
  registerHandlers(client, deps);
  installProcessHandlers(client);
  await client.login(env.DISCORD_TOKEN);
}

if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
