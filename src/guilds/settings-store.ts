import { join } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { AdminRoleLookup } from "../triggers/permissions.js";
import {
  readJsonFile,
  withFileLock,
  writeJsonFileAtomic,
} from "../utils/json-file.js";

export interface GuildSettings {
  readonly guildId: string;
  readonly adminRoleId: string | null;
}

const guildSettingsSchema = z.array(
  z.object({
    guildId: z.string().min(1),
    adminRoleId: z.string().nullable().default(null),
  }),
);

export class GuildSettingsStore implements AdminRoleLookup {
  readonly filePath: string;
  private readonly settings = new Map<string, GuildSettings>();

  constructor(
    dataDir: string,
    private readonly logger: Logger,
  ) {
    this.filePath = join(dataDir, "guild-settings.json");
  }

  async load(): Promise<void> {
    this.settings.clear();
    try {
      const rows = await readJsonFile(this.filePath, guildSettingsSchema);
      for (const row of rows ?? []) this.settings.set(row.guildId, row);
    } catch (err) {
      this.logger.warn({ err }, "Could not read guild settings, starting fresh");
    }
  }

  get(guildId: string): GuildSettings {
    return this.settings.get(guildId) ?? { guildId, adminRoleId: null };
  }

  getAdminRoleId(guildId: string): string | null {
    return this.get(guildId).adminRoleId;
  }

  /**
   * Applies the change in memory, then persists. Resolves to false when the
   * write failed; the new role still applies until restart.
   */
  async setAdminRole(guildId: string, roleId: string | null): Promise<boolean> {
    this.settings.set(guildId, { guildId, adminRoleId: roleId });
    try {
      const rows = [...this.settings.values()];
      await withFileLock(this.filePath, () => writeJsonFileAtomic(this.filePath, rows));
      this.logger.info({ guildId, roleId }, "Admin role updated");
      return true;
    } catch (err) {
      this.logger.error({ err, guildId }, "Failed to persist guild settings");
      return false;
    }
  }
}
