export type TriggerAction =
  | { readonly type: "reaction"; readonly emoji: string }
  | { readonly type: "reply"; readonly response: string };

export type TriggerActionType = TriggerAction["type"];

export interface TriggerRecord {
  readonly guildId: string;
  /** Trimmed and lower-cased; unique within the guild. */
  readonly phrase: string;
  readonly action: TriggerAction;
  readonly createdBy: string;
  readonly createdAt: number;
}

/** The member invoking a management command, as seen in one guild. */
export interface Requester {
  readonly userId: string;
  readonly roleIds: readonly string[];
  readonly isAdministrator: boolean;
  readonly canManageGuild: boolean;
}

export type TriggerError =
  | { readonly kind: "unauthorized" }
  | { readonly kind: "already_exists"; readonly phrase: string }
  | { readonly kind: "not_found"; readonly phrase: string }
  | { readonly kind: "limit_reached"; readonly limit: number }
  | { readonly kind: "invalid_trigger"; readonly reason: string }
  | {
      readonly kind: "persistence_failure";
      /** The mutation that is live in memory but did not reach disk. */
      readonly record: TriggerRecord;
      readonly cause: unknown;
    };

export type TriggerResult =
  | { readonly ok: true; readonly record: TriggerRecord }
  | { readonly ok: false; readonly error: TriggerError };

export interface AddTriggerOptions {
  /** Replace an existing trigger for the same phrase instead of failing. */
  readonly overwrite?: boolean;
}
