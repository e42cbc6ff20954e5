import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getDataDir } from "../../config/paths.js";
import { JsonTriggerRepository } from "../../triggers/repository.js";

export class TriggersListCommand extends Command {
  static override paths = [["triggers", "list"]];

  static override usage = Command.Usage({
    description: "List stored triggers from the data directory",
    examples: [
      ["List every guild's triggers", "triggerbot triggers list"],
      ["List one guild", "triggerbot triggers list --guild 123456789012345678"],
    ],
  });

  guild = Option.String("--guild", {
    description: "Only show triggers for this guild id",
    required: false,
  });

  async execute(): Promise<number> {
    const config = loadConfig();
    const repo = new JsonTriggerRepository(getDataDir(config.storage.dataDir));

    let records;
    try {
      records = await repo.loadAll();
    } catch (err) {
      this.context.stdout.write(
        `Failed to read triggers: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }

    const shown = this.guild ? records.filter((r) => r.guildId === this.guild) : records;
    if (shown.length === 0) {
      this.context.stdout.write("No triggers stored.\n");
      return 0;
    }

    this.context.stdout.write(`Triggers (${shown.length}):\n`);
    for (const r of shown) {
      const target = r.action.type === "reaction" ? r.action.emoji : r.action.response;
      this.context.stdout.write(
        `  [${r.guildId}] ${r.phrase}  →  ${r.action.type}: ${target}  (by ${r.createdBy})\n`,
      );
    }
    return 0;
  }
}
