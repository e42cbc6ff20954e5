import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Writable } from "node:stream";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
  REDACTED,
} from "../../src/cli/commands/config-cmd.js";
import { TriggersListCommand } from "../../src/cli/commands/triggers-cmd.js";
import { GUILD, OTHER_GUILD } from "../helpers/fixtures.js";

function captureStdout(): { stream: Writable; output: () => string } {
  let buf = "";
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      buf += String(chunk);
      cb();
    },
  });
  return { stream, output: () => buf };
}

describe("CLI", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "triggerbot-cli-"));
    vi.stubEnv("TRIGGERBOT_CONFIG_PATH", join(tempDir, "triggerbot.config.json"));
    vi.stubEnv("DATA_DIR", tempDir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("triggers list", () => {
    function run(guild?: string) {
      const cmd = new TriggersListCommand();
      cmd.guild = guild;
      const { stream, output } = captureStdout();
      cmd.context = { ...cmd.context, stdout: stream };
      return cmd.execute().then((code) => ({ code, output: output() }));
    }

    beforeEach(() => {
      writeFileSync(
        join(tempDir, "triggers.json"),
        JSON.stringify([
          { guildId: GUILD, phrase: "gm", actionType: "reply", emojiOrResponse: "Good morning", createdBy: "u1", createdAt: 1 },
          { guildId: OTHER_GUILD, phrase: "hello", actionType: "reaction", emojiOrResponse: "👋", createdBy: "u2", createdAt: 2 },
        ]),
      );
    });

    it("prints every stored trigger", async () => {
      const { code, output } = await run();
      expect(code).toBe(0);
      expect(output).toBe(
        "Triggers (2):\n" +
          `  [${GUILD}] gm  →  reply: Good morning  (by u1)\n` +
          `  [${OTHER_GUILD}] hello  →  reaction: 👋  (by u2)\n`,
      );
    });

    it("filters by guild", async () => {
      const { output } = await run(OTHER_GUILD);
      expect(output).toBe(
        "Triggers (1):\n" + `  [${OTHER_GUILD}] hello  →  reaction: 👋  (by u2)\n`,
      );
    });

    it("says so when nothing matches", async () => {
      const { code, output } = await run("100000000000000099");
      expect(code).toBe(0);
      expect(output).toBe("No triggers stored.\n");
    });

    it("fails on a corrupt store", async () => {
      writeFileSync(join(tempDir, "triggers.json"), "{");
      const { code, output } = await run();
      expect(code).toBe(1);
      expect(output).toBe(`Failed to read triggers: Invalid JSON in ${join(tempDir, "triggers.json")}\n`);
    });
  });

  describe("config show", () => {
    it("redacts the token", async () => {
      writeFileSync(
        join(tempDir, "triggerbot.config.json"),
        JSON.stringify({ discord: { token: "test-token" } }),
      );
      const cmd = new ConfigShowCommand();
      const { stream, output } = captureStdout();
      cmd.context = { ...cmd.context, stdout: stream };

      expect(await cmd.execute()).toBe(0);
      const shown: unknown = JSON.parse(output());
      expect(shown).toMatchObject({ discord: { token: REDACTED } });
      expect(output()).not.toContain("test-token");
    });
  });

  describe("config validate", () => {
    function validate(configFile: string) {
      const cmd = new ConfigValidateCommand();
      cmd.configFile = configFile;
      const { stream, output } = captureStdout();
      cmd.context = { ...cmd.context, stdout: stream };
      return cmd.execute().then((code) => ({ code, output: output() }));
    }

    it("accepts a valid file", async () => {
      const path = join(tempDir, "valid.json");
      writeFileSync(path, JSON.stringify({ triggers: { maxPerGuild: 50 } }));
      expect(await validate(path)).toEqual({ code: 0, output: `Config is valid: ${path}\n` });
    });

    it("rejects an invalid file", async () => {
      const path = join(tempDir, "invalid.json");
      writeFileSync(path, JSON.stringify({ health: { port: "not-a-number" } }));
      const { code, output } = await validate(path);
      expect(code).toBe(1);
      expect(output.startsWith(`Config is INVALID: ${path}\n`)).toBe(true);
    });

    it("reports a missing file", async () => {
      const path = join(tempDir, "absent.json");
      expect(await validate(path)).toEqual({
        code: 1,
        output: `Config file not found: ${path}\n`,
      });
    });
  });
});
