import {
  InteractionContextType,
  Routes,
  SlashCommandBuilder,
  type REST,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from "discord.js";
import type { Logger } from "../../logging/logger.js";

export function buildSlashCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  const trigger = new SlashCommandBuilder()
    .setName("trigger")
    .setDescription("Trigger management")
    .setContexts(InteractionContextType.Guild)
    .addSubcommand((sub) =>
      sub
        .setName("addtrigger")
        .setDescription("Add a trigger phrase → action")
        .addStringOption((o) =>
          o.setName("phrase").setDescription("Phrase to watch for").setRequired(true).setMaxLength(100),
        )
        .addStringOption((o) =>
          o
            .setName("action")
            .setDescription("What to do when the phrase is seen")
            .setRequired(true)
            .addChoices(
              { name: "reaction", value: "reaction" },
              { name: "reply", value: "reply" },
            ),
        )
        .addStringOption((o) =>
          o.setName("emoji").setDescription("Emoji to react with (reaction only)"),
        )
        .addStringOption((o) =>
          o
            .setName("response")
            .setDescription("Text to reply with (reply only)")
            .setMaxLength(2000),
        )
        .addBooleanOption((o) =>
          o.setName("overwrite").setDescription("Replace an existing trigger for this phrase"),
        ),
    )
    .addSubcommand((sub) =>
      sub.setName("listtriggers").setDescription("List all trigger phrases in this server"),
    )
    .addSubcommand((sub) =>
      sub
        .setName("removetrigger")
        .setDescription("Delete a trigger phrase")
        .addStringOption((o) =>
          o.setName("phrase").setDescription("Phrase to remove").setRequired(true),
        ),
    );

  const setAdminRole = new SlashCommandBuilder()
    .setName("setadminrole")
    .setDescription("Choose which role can manage triggers in this server")
    .setContexts(InteractionContextType.Guild)
    .addRoleOption((o) =>
      o.setName("role").setDescription("Role allowed to manage triggers").setRequired(true),
    );

  return [trigger.toJSON(), setAdminRole.toJSON()];
}

export interface SyncTarget {
  readonly applicationId: string;
  /** Guild-scoped commands update instantly; global ones can take up to an hour. */
  readonly devGuildId?: string;
}

export async function syncSlashCommands(
  rest: Pick<REST, "put">,
  target: SyncTarget,
  logger: Logger,
): Promise<void> {
  const body = buildSlashCommands();
  if (target.devGuildId) {
    await rest.put(Routes.applicationGuildCommands(target.applicationId, target.devGuildId), {
      body,
    });
    logger.info({ guildId: target.devGuildId, count: body.length }, "Guild commands synced");
    return;
  }
  await rest.put(Routes.applicationCommands(target.applicationId), { body });
  logger.info({ count: body.length }, "Global commands synced");
}
