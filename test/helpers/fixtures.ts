import type { TriggerAuthorizer } from "../../src/triggers/permissions.js";
import type { TriggerRepository } from "../../src/triggers/repository.js";
import type { Requester, TriggerRecord } from "../../src/triggers/types.js";
import { TriggerStore } from "../../src/triggers/store.js";
import { createSilentLogger } from "../../src/logging/logger.js";

export const GUILD = "100000000000000001";
export const OTHER_GUILD = "100000000000000002";
export const MOD_ROLE = "300000000000000001";
export const NOW = 1_700_000_000_000;

export function makeRequester(overrides: Partial<Requester> = {}): Requester {
  return {
    userId: "200000000000000001",
    roleIds: [],
    isAdministrator: false,
    canManageGuild: false,
    ...overrides,
  };
}

export const admin = makeRequester({ userId: "200000000000000009", isAdministrator: true });
export const member = makeRequester({ userId: "200000000000000002" });

/** Lets administrators through, nobody else. */
export const adminOnly: TriggerAuthorizer = {
  canManage: (_guildId, requester) => requester.isAdministrator,
};

export class MemoryTriggerRepository implements TriggerRepository {
  saved: TriggerRecord[] = [];
  saveCount = 0;
  failSaves = false;

  constructor(private readonly initial: TriggerRecord[] = []) {}

  async loadAll(): Promise<TriggerRecord[]> {
    return [...this.initial];
  }

  async saveAll(records: readonly TriggerRecord[]): Promise<void> {
    if (this.failSaves) throw new Error("disk full");
    this.saveCount++;
    this.saved = [...records];
  }
}

export function makeStore(
  repository: TriggerRepository = new MemoryTriggerRepository(),
  maxPerGuild?: number,
): TriggerStore {
  return new TriggerStore({
    repository,
    authorizer: adminOnly,
    logger: createSilentLogger(),
    maxPerGuild,
    now: () => NOW,
  });
}
