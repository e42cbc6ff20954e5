export interface TriggerBotConfig {
  readonly discord: DiscordConfig;
  readonly triggers: TriggersConfig;
  readonly storage: StorageConfig;
  readonly logging?: LoggingConfig;
  readonly health: HealthConfig;
}

export interface DiscordConfig {
  readonly token?: string;
  readonly applicationId?: string;
  /** Commands sync to this guild only, which takes effect immediately. */
  readonly devGuildId?: string;
}

export interface TriggersConfig {
  /** Default admin role for guilds that have not picked one with /setadminrole. */
  readonly managerRoleId?: string;
  /** Bot administrators: always allowed to manage triggers in any guild. */
  readonly adminUserIds: string[];
  readonly maxPerGuild: number;
}

export interface StorageConfig {
  readonly dataDir?: string;
}

export interface LoggingConfig {
  /** Defaults to info. */
  readonly level?: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface HealthConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}
