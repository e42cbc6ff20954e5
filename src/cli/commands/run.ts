import { Command, Option } from "clipanion";
import { createRequire } from "node:module";
import { startBot } from "../../gateway/lifecycle.js";

const require = createRequire(import.meta.url);
const pkg = require("../../../package.json") as { version: string };

export class RunCommand extends Command {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the trigger bot",
    examples: [
      ["Start with environment config", "DISCORD_TOKEN=... triggerbot run"],
      ["Start with a config file", "triggerbot run --config ./triggerbot.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number> {
    try {
      await startBot(this.config, pkg.version);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
    // Runs until SIGINT/SIGTERM
    await new Promise<never>(() => {});
    return 0;
  }
}
