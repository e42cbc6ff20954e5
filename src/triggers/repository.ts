import { join } from "node:path";
import { z } from "zod";
import type { TriggerRecord } from "./types.js";
import {
  readJsonFile,
  withFileLock,
  writeJsonFileAtomic,
} from "../utils/json-file.js";

export interface TriggerRepository {
  loadAll(): Promise<TriggerRecord[]>;
  saveAll(records: readonly TriggerRecord[]): Promise<void>;
}

const storedTriggerSchema = z.object({
  guildId: z.string().min(1),
  phrase: z.string().min(1),
  actionType: z.enum(["reaction", "reply"]),
  emojiOrResponse: z.string().min(1),
  createdBy: z.string(),
  createdAt: z.number().default(0),
});

export type StoredTrigger = z.infer<typeof storedTriggerSchema>;

const storedTriggersSchema = z.array(storedTriggerSchema);

export function toStored(record: TriggerRecord): StoredTrigger {
  return {
    guildId: record.guildId,
    phrase: record.phrase,
    actionType: record.action.type,
    emojiOrResponse:
      record.action.type === "reaction" ? record.action.emoji : record.action.response,
    createdBy: record.createdBy,
    createdAt: record.createdAt,
  };
}

export function fromStored(row: StoredTrigger): TriggerRecord {
  return {
    guildId: row.guildId,
    phrase: row.phrase,
    action:
      row.actionType === "reaction"
        ? { type: "reaction", emoji: row.emojiOrResponse }
        : { type: "reply", response: row.emojiOrResponse },
    createdBy: row.createdBy,
    createdAt: row.createdAt,
  };
}

/** Flat `triggers.json` array, rewritten wholesale on every save. */
export class JsonTriggerRepository implements TriggerRepository {
  readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = join(dataDir, "triggers.json");
  }

  async loadAll(): Promise<TriggerRecord[]> {
    const rows = await readJsonFile(this.filePath, storedTriggersSchema);
    return (rows ?? []).map(fromStored);
  }

  async saveAll(records: readonly TriggerRecord[]): Promise<void> {
    await withFileLock(this.filePath, () =>
      writeJsonFileAtomic(this.filePath, records.map(toStored)),
    );
  }
}
