import {
  PermissionFlagsBits,
  type ChatInputCommandInteraction,
  type Message,
} from "discord.js";
import type { InboundMessage, TriggerCommand, TriggerResponder } from "../../bot/types.js";
import type { Requester, TriggerAction } from "../../triggers/types.js";

export function normalizeDiscordMessage(msg: Message): InboundMessage {
  return {
    id: msg.id,
    guildId: msg.guildId,
    channelId: msg.channelId,
    authorId: msg.author.id,
    authorIsBot: msg.author.bot,
    text: msg.content,
  };
}

export function createResponder(msg: Message): TriggerResponder {
  return {
    async react(emoji) {
      await msg.react(emoji);
    },
    async reply(text) {
      await msg.reply({
        content: text,
        allowedMentions: { parse: [], repliedUser: false },
      });
    },
  };
}

export function requesterFromInteraction(
  interaction: ChatInputCommandInteraction,
): Requester {
  const roles = interaction.member?.roles;
  const roleIds = !roles ? [] : Array.isArray(roles) ? roles : [...roles.cache.keys()];
  const perms = interaction.memberPermissions;
  return {
    userId: interaction.user.id,
    roleIds,
    isAdministrator: perms?.has(PermissionFlagsBits.Administrator) ?? false,
    canManageGuild: perms?.has(PermissionFlagsBits.ManageGuild) ?? false,
  };
}

function parseAction(interaction: ChatInputCommandInteraction): TriggerAction {
  const type = interaction.options.getString("action", true);
  if (type === "reaction") {
    return { type, emoji: interaction.options.getString("emoji")?.trim() ?? "" };
  }
  return { type: "reply", response: interaction.options.getString("response") ?? "" };
}

/**
 * Maps a slash command to a TriggerCommand. Null for commands this bot does
 * not own and for anything invoked outside a guild.
 */
export function parseTriggerCommand(
  interaction: ChatInputCommandInteraction,
): TriggerCommand | null {
  const guildId = interaction.guildId;
  if (!guildId) return null;

  if (interaction.commandName === "setadminrole") {
    return {
      name: "setadminrole",
      guildId,
      requester: requesterFromInteraction(interaction),
      roleId: interaction.options.getRole("role", true).id,
    };
  }
  if (interaction.commandName !== "trigger") return null;

  switch (interaction.options.getSubcommand(true)) {
    case "addtrigger":
      return {
        name: "addtrigger",
        guildId,
        requester: requesterFromInteraction(interaction),
        phrase: interaction.options.getString("phrase", true),
        action: parseAction(interaction),
        overwrite: interaction.options.getBoolean("overwrite") ?? false,
      };
    case "listtriggers":
      return { name: "listtriggers", guildId };
    case "removetrigger":
      return {
        name: "removetrigger",
        guildId,
        requester: requesterFromInteraction(interaction),
        phrase: interaction.options.getString("phrase", true),
      };
    default:
      return null;
  }
}
