import type { Logger } from "../logging/logger.js";
import { findMatch, normalizePhrase } from "./matcher.js";
import type { TriggerAuthorizer } from "./permissions.js";
import type { TriggerRepository } from "./repository.js";
import type {
  AddTriggerOptions,
  Requester,
  TriggerAction,
  TriggerError,
  TriggerRecord,
  TriggerResult,
} from "./types.js";

export const DEFAULT_MAX_PER_GUILD = 100;
const MAX_RESPONSE_LENGTH = 2000;

export interface TriggerStoreOptions {
  readonly repository: TriggerRepository;
  readonly authorizer: TriggerAuthorizer;
  readonly logger: Logger;
  readonly maxPerGuild?: number;
  readonly now?: () => number;
}

function fail(error: TriggerError): TriggerResult {
  return { ok: false, error };
}

export function validateAction(action: TriggerAction): string | null {
  if (action.type === "reaction") {
    return action.emoji.trim() ? null : "You must supply an emoji for a reaction trigger.";
  }
  if (!action.response.trim()) {
    return "You must supply response text for a reply trigger.";
  }
  if (action.response.length > MAX_RESPONSE_LENGTH) {
    return `Response text must be at most ${MAX_RESPONSE_LENGTH} characters.`;
  }
  return null;
}

/**
 * In-memory trigger table, grouped per guild in insertion order. Memory is
 * the source of truth for the running process; every mutation is written
 * through to the repository.
 */
export class TriggerStore {
  private readonly byGuild = new Map<string, TriggerRecord[]>();
  private readonly repository: TriggerRepository;
  private readonly authorizer: TriggerAuthorizer;
  private readonly logger: Logger;
  private readonly maxPerGuild: number;
  private readonly now: () => number;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: TriggerStoreOptions) {
    this.repository = options.repository;
    this.authorizer = options.authorizer;
    this.logger = options.logger;
    this.maxPerGuild = options.maxPerGuild ?? DEFAULT_MAX_PER_GUILD;
    this.now = options.now ?? Date.now;
  }

  /** Replaces the in-memory table with the persisted one. Returns the record count. */
  async load(): Promise<number> {
    let records: TriggerRecord[];
    try {
      records = await this.repository.loadAll();
    } catch (err) {
      this.logger.warn({ err }, "Could not read stored triggers, starting fresh");
      records = [];
    }

    this.byGuild.clear();
    let count = 0;
    for (const stored of records) {
      const record = { ...stored, phrase: normalizePhrase(stored.phrase) };
      if (!record.phrase) continue;
      const list = this.guildList(record.guildId);
      // Hand-edited files may hold phrases that collide once normalized; first one wins
      if (list.some((r) => r.phrase === record.phrase)) continue;
      list.push(record);
      count++;
    }
    return count;
  }

  addTrigger(
    guildId: string,
    phrase: string,
    action: TriggerAction,
    requester: Requester,
    options: AddTriggerOptions = {},
  ): Promise<TriggerResult> {
    return this.serialize(async () => {
      if (!this.authorizer.canManage(guildId, requester)) {
        return fail({ kind: "unauthorized" });
      }

      const key = normalizePhrase(phrase);
      if (!key) return fail({ kind: "invalid_trigger", reason: "Phrase cannot be empty." });
      const invalid = validateAction(action);
      if (invalid) return fail({ kind: "invalid_trigger", reason: invalid });

      const list = this.guildList(guildId);
      const existing = list.findIndex((r) => r.phrase === key);
      if (existing !== -1 && !options.overwrite) {
        return fail({ kind: "already_exists", phrase: key });
      }
      if (existing === -1 && list.length >= this.maxPerGuild) {
        return fail({ kind: "limit_reached", limit: this.maxPerGuild });
      }

      const record: TriggerRecord = {
        guildId,
        phrase: key,
        action,
        createdBy: requester.userId,
        createdAt: this.now(),
      };
      if (existing === -1) {
        list.push(record);
      } else {
        list[existing] = record;
      }

      this.logger.info(
        { guildId, phrase: key, action: action.type, by: requester.userId },
        existing === -1 ? "Trigger added" : "Trigger replaced",
      );
      return this.flush(record);
    });
  }

  listTriggers(guildId: string): readonly TriggerRecord[] {
    return [...(this.byGuild.get(guildId) ?? [])];
  }

  removeTrigger(
    guildId: string,
    phrase: string,
    requester: Requester,
  ): Promise<TriggerResult> {
    return this.serialize(async () => {
      if (!this.authorizer.canManage(guildId, requester)) {
        return fail({ kind: "unauthorized" });
      }

      const key = normalizePhrase(phrase);
      const list = this.byGuild.get(guildId);
      const idx = list?.findIndex((r) => r.phrase === key) ?? -1;
      const record = idx === -1 ? undefined : list?.splice(idx, 1)[0];
      if (!record) return fail({ kind: "not_found", phrase: key });

      if (list?.length === 0) this.byGuild.delete(guildId);
      this.logger.info({ guildId, phrase: key, by: requester.userId }, "Trigger removed");
      return this.flush(record);
    });
  }

  match(guildId: string, text: string): TriggerRecord | null {
    return findMatch(this.byGuild.get(guildId) ?? [], text);
  }

  stats(): { guilds: number; total: number } {
    let total = 0;
    for (const list of this.byGuild.values()) total += list.length;
    return { guilds: this.byGuild.size, total };
  }

  private guildList(guildId: string): TriggerRecord[] {
    let list = this.byGuild.get(guildId);
    if (!list) {
      list = [];
      this.byGuild.set(guildId, list);
    }
    return list;
  }

  private async flush(record: TriggerRecord): Promise<TriggerResult> {
    const all = [...this.byGuild.values()].flat();
    try {
      await this.repository.saveAll(all);
      return { ok: true, record };
    } catch (err) {
      this.logger.error({ err, guildId: record.guildId }, "Failed to persist triggers");
      return fail({ kind: "persistence_failure", record, cause: err });
    }
  }

  /** Mutations run one at a time, in call order. */
  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.catch(() => undefined);
    return run;
  }
}
