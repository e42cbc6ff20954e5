import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { TriggerBotConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/**
 * Plain environment variables fill in whatever the config file leaves out,
 * so a bare `DISCORD_TOKEN=... triggerbot` works without any file.
 */
export function applyEnvDefaults(config: TriggerBotConfig): TriggerBotConfig {
  const env = process.env;
  return parseConfig({
    ...config,
    discord: {
      ...config.discord,
      token: config.discord.token ?? env["DISCORD_TOKEN"],
      applicationId: config.discord.applicationId ?? env["DISCORD_APPLICATION_ID"],
      devGuildId: config.discord.devGuildId ?? env["DEV_GUILD_ID"],
    },
    triggers: {
      ...config.triggers,
      managerRoleId: config.triggers.managerRoleId ?? env["TRIGGER_MANAGER_ROLE_ID"],
    },
    storage: {
      dataDir: config.storage.dataDir ?? env["DATA_DIR"],
    },
    logging: {
      ...config.logging,
      level: config.logging?.level ?? env["LOG_LEVEL"],
    },
  });
}

export function loadConfig(path?: string): TriggerBotConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return applyEnvDefaults(parseConfig({}));
    }
    throw err;
  }

  const substituted = substituteEnv(content);
  const raw = JSON.parse(substituted) as unknown;
  return applyEnvDefaults(parseConfig(raw));
}
