import type { Client } from "discord.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getDataDir } from "../config/paths.js";
import type { TriggerBotConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { GuildSettingsStore } from "../guilds/settings-store.js";
import { GuildPermissions } from "../triggers/permissions.js";
import { JsonTriggerRepository } from "../triggers/repository.js";
import { TriggerStore } from "../triggers/store.js";
import { DiscordTriggerBot } from "../channels/discord/index.js";
import { HealthServer } from "./health.js";

export interface BotContext {
  config: TriggerBotConfig;
  logger: Logger;
  store: TriggerStore;
  settings: GuildSettingsStore;
  bot: DiscordTriggerBot;
  healthServer: HealthServer | null;
  abortController: AbortController;
  shutdown: () => Promise<void>;
}

export interface StartOptions {
  /** Replaces the discord.js client, e.g. with a fake in tests. */
  clientFactory?: () => Client;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export async function startBot(
  configPath: string | undefined,
  version: string,
  options: StartOptions = {},
): Promise<BotContext> {
  // 1. Config and logger
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);
  if (!config.discord.token) {
    throw new Error("DISCORD_TOKEN environment variable is missing");
  }
  logger.info({ version }, "Starting triggerbot...");

  // 2. State
  const dataDir = ensureDir(getDataDir(config.storage.dataDir));
  const settings = new GuildSettingsStore(dataDir, logger);
  await settings.load();

  const permissions = new GuildPermissions(settings, {
    adminUserIds: config.triggers.adminUserIds,
    managerRoleId: config.triggers.managerRoleId,
  });
  const store = new TriggerStore({
    repository: new JsonTriggerRepository(dataDir),
    authorizer: permissions,
    logger,
    maxPerGuild: config.triggers.maxPerGuild,
  });
  const loaded = await store.load();
  logger.info({ dataDir, triggers: loaded }, "Triggers loaded");

  // 3. Discord
  const abortController = new AbortController();
  const bot = new DiscordTriggerBot(
    config.discord,
    { store, settings, permissions, logger },
    options.clientFactory,
  );
  bot.events.on("connected", (tag) => logger.info({ user: tag }, "Discord connected"));
  bot.events.on("disconnected", (reason) => logger.warn({ reason }, "Discord disconnected"));
  bot.events.on("error", (err) => logger.error({ err }, "Discord client error"));

  // 4. Health endpoint
  let healthServer: HealthServer | null = null;
  if (config.health.enabled) {
    healthServer = new HealthServer(
      { isConnected: () => bot.connected, triggerStats: () => store.stats() },
      config.health.port,
      config.health.hostname,
      version,
    );
    await healthServer.start();
    logger.info({ port: config.health.port }, "Health server started");
  }

  try {
    await bot.start(abortController.signal);
  } catch (err) {
    // Nothing may keep the event loop alive after a failed login
    await bot.stop().catch((stopErr: unknown) => {
      logger.error({ err: stopErr }, "Error stopping Discord client");
    });
    await healthServer?.stop();
    throw err;
  }

  // 5. Graceful shutdown
  let shutdownInProgress = false;
  const shutdown = async () => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    abortController.abort();
    try {
      await bot.stop();
    } catch (err) {
      logger.error({ err }, "Error stopping Discord client");
    }
    await healthServer?.stop();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  return {
    config,
    logger,
    store,
    settings,
    bot,
    healthServer,
    abortController,
    shutdown,
  };
}
