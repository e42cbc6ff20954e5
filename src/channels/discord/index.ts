import {
  Events,
  MessageFlags,
  REST,
  type ChatInputCommandInteraction,
  type Client,
  type Interaction,
  type Message,
} from "discord.js";
import { handleCommand, type CommandDeps } from "../../bot/command-handler.js";
import { handleMessage } from "../../bot/message-handler.js";
import type { DiscordConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import { TypedEventEmitter } from "../../utils/typed-emitter.js";
import { createDiscordClient } from "./client.js";
import { syncSlashCommands } from "./commands.js";
import {
  createResponder,
  normalizeDiscordMessage,
  parseTriggerCommand,
} from "./normalize.js";

export interface DiscordBotEvents {
  connected: (tag: string) => void;
  disconnected: (reason?: string) => void;
  error: (err: Error) => void;
}

export const GUILD_ONLY_REPLY = "This command can only be used in a server.";
export const GENERIC_FAILURE_REPLY = "Something went wrong handling that command.";

export class DiscordTriggerBot {
  readonly events = new TypedEventEmitter<DiscordBotEvents>();

  private client: Client | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly config: DiscordConfig,
    private readonly deps: CommandDeps,
    private readonly clientFactory: () => Client = createDiscordClient,
  ) {
    this.logger = deps.logger.child({ channel: "discord" });
  }

  get connected(): boolean {
    return this.client?.isReady() ?? false;
  }

  async start(signal: AbortSignal): Promise<void> {
    const token = this.config.token;
    if (!token) throw new Error("Discord bot token is required");

    const client = this.clientFactory();
    this.client = client;

    client.once(Events.ClientReady, (ready) => {
      this.logger.info({ user: ready.user.tag, guilds: ready.guilds.cache.size }, "Logged in");
      this.events.emit("connected", ready.user.tag);

      const applicationId = this.config.applicationId ?? ready.application.id;
      const rest = new REST().setToken(token);
      syncSlashCommands(rest, { applicationId, devGuildId: this.config.devGuildId }, this.logger)
        .catch((err: unknown) => {
          this.logger.error({ err }, "Failed to sync slash commands");
        });
    });

    client.on(Events.MessageCreate, (message) => {
      this.onMessage(message).catch((err: unknown) => {
        this.logger.error({ err, messageId: message.id }, "Failed to handle message");
      });
    });

    client.on(Events.InteractionCreate, (interaction) => {
      this.onInteraction(interaction).catch((err: unknown) => {
        this.logger.error({ err, interactionId: interaction.id }, "Failed to handle interaction");
      });
    });

    client.on(Events.ShardDisconnect, (event, shardId) => {
      this.events.emit("disconnected", `shard ${shardId} closed (${event.code})`);
    });

    client.on(Events.Error, (err) => {
      this.events.emit("error", err);
    });

    signal.addEventListener("abort", () => {
      this.stop().catch((err: unknown) => {
        this.logger.error({ err }, "Error stopping Discord client");
      });
    });

    await client.login(token);
  }

  async stop(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    await client.destroy();
    this.events.emit("disconnected", "stopped");
  }

  async onMessage(message: Message): Promise<void> {
    // Own messages never fire triggers
    if (message.author.id === this.client?.user?.id) return;
    await handleMessage(
      normalizeDiscordMessage(message),
      this.deps.store,
      createResponder(message),
      this.logger,
    );
  }

  async onInteraction(interaction: Interaction): Promise<void> {
    if (!interaction.isChatInputCommand()) return;

    const cmd = parseTriggerCommand(interaction);
    if (!cmd) {
      if (!interaction.inGuild()) await this.respond(interaction, GUILD_ONLY_REPLY);
      return;
    }

    this.logger.debug(
      { command: cmd.name, guildId: cmd.guildId, userId: interaction.user.id },
      "Command received",
    );

    let content: string;
    try {
      content = await handleCommand(cmd, this.deps);
    } catch (err) {
      this.logger.error({ err, command: cmd.name, guildId: cmd.guildId }, "Command failed");
      content = GENERIC_FAILURE_REPLY;
    }
    await this.respond(interaction, content);
  }

  private async respond(
    interaction: ChatInputCommandInteraction,
    content: string,
  ): Promise<void> {
    try {
      if (interaction.deferred || interaction.replied) {
        await interaction.followUp({ content, flags: MessageFlags.Ephemeral });
      } else {
        await interaction.reply({ content, flags: MessageFlags.Ephemeral });
      }
    } catch (err) {
      this.logger.warn({ err, interactionId: interaction.id }, "Failed to reply to interaction");
    }
  }
}
