import { escapeMarkdown } from "discord.js";
import type { GuildSettingsStore } from "../guilds/settings-store.js";
import type { Logger } from "../logging/logger.js";
import type { GuildPermissions } from "../triggers/permissions.js";
import type { TriggerStore } from "../triggers/store.js";
import type { TriggerError, TriggerRecord } from "../triggers/types.js";
import type { TriggerCommand } from "./types.js";

export interface CommandDeps {
  readonly store: TriggerStore;
  readonly settings: GuildSettingsStore;
  readonly permissions: GuildPermissions;
  readonly logger: Logger;
}

export const MAX_REPLY_LENGTH = 2000;

export const UNAUTHORIZED_REPLY = "You don't have permission to manage triggers.";
export const PERSISTENCE_FAILURE_REPLY =
  "Something went wrong saving triggers. The change applies until the bot restarts.";

export function describeError(error: TriggerError): string {
  switch (error.kind) {
    case "unauthorized":
      return UNAUTHORIZED_REPLY;
    case "already_exists":
      return `A trigger for ‘${error.phrase}’ already exists. Use overwrite to replace it.`;
    case "not_found":
      return "That phrase was not registered.";
    case "limit_reached":
      return `Trigger limit (${error.limit}) reached.`;
    case "invalid_trigger":
      return error.reason;
    case "persistence_failure":
      return PERSISTENCE_FAILURE_REPLY;
  }
}

function describeRecord(record: TriggerRecord): string {
  const phrase = escapeMarkdown(record.phrase);
  return record.action.type === "reaction"
    ? `• **${phrase}** → reaction ${record.action.emoji}`
    : `• **${phrase}** → reply`;
}

/** One line per trigger, cut short with a count once the message limit is near. */
export function formatTriggerList(
  records: readonly TriggerRecord[],
  maxLength = MAX_REPLY_LENGTH,
): string {
  if (records.length === 0) return "No triggers set.";

  const lines: string[] = [];
  let length = 0;
  for (const [i, record] of records.entries()) {
    const line = describeRecord(record);
    const remaining = records.length - i;
    const footer = `…and ${remaining} more`;
    // +1 for the newline; reserve room for the footer unless this is the last line
    const needed = length + line.length + 1 + (remaining > 1 ? footer.length + 1 : 0);
    if (needed > maxLength) {
      lines.push(footer);
      break;
    }
    lines.push(line);
    length += line.length + 1;
  }
  return lines.join("\n");
}

/** Runs a parsed slash command and returns the ephemeral reply text. */
export async function handleCommand(
  cmd: TriggerCommand,
  deps: CommandDeps,
): Promise<string> {
  switch (cmd.name) {
    case "addtrigger": {
      const result = await deps.store.addTrigger(
        cmd.guildId,
        cmd.phrase,
        cmd.action,
        cmd.requester,
        { overwrite: cmd.overwrite },
      );
      if (!result.ok) return describeError(result.error);
      return `✅ Trigger for ‘${result.record.phrase}’ set to ${result.record.action.type}.`;
    }

    case "listtriggers":
      return formatTriggerList(deps.store.listTriggers(cmd.guildId));

    case "removetrigger": {
      const result = await deps.store.removeTrigger(cmd.guildId, cmd.phrase, cmd.requester);
      if (!result.ok) return describeError(result.error);
      return `🗑️ Trigger ‘${result.record.phrase}’ removed.`;
    }

    case "setadminrole": {
      if (!deps.permissions.canManage(cmd.guildId, cmd.requester)) {
        return UNAUTHORIZED_REPLY;
      }
      const persisted = await deps.settings.setAdminRole(cmd.guildId, cmd.roleId);
      if (!persisted) return PERSISTENCE_FAILURE_REPLY;
      return `✅ Admin role set to <@&${cmd.roleId}>.`;
    }
  }
}
