import { Builtins, Cli } from "clipanion";
import { RunCommand } from "./commands/run.js";
import { TriggersListCommand } from "./commands/triggers-cmd.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";

export function createCli(version: string): Cli {
  const cli = new Cli({
    binaryLabel: "Trigger bot",
    binaryName: "triggerbot",
    binaryVersion: version,
  });

  cli.register(RunCommand);
  cli.register(TriggersListCommand);
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);
  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
