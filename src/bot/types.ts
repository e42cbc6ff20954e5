import type { Requester, TriggerAction } from "../triggers/types.js";

/** A chat message reduced to what trigger matching needs. */
export interface InboundMessage {
  readonly id: string;
  /** null for direct messages */
  readonly guildId: string | null;
  readonly channelId: string;
  readonly authorId: string;
  readonly authorIsBot: boolean;
  readonly text: string;
}

/** Performs trigger actions against the message that fired them. */
export interface TriggerResponder {
  react(emoji: string): Promise<void>;
  reply(text: string): Promise<void>;
}

export type TriggerCommand =
  | {
      readonly name: "addtrigger";
      readonly guildId: string;
      readonly requester: Requester;
      readonly phrase: string;
      readonly action: TriggerAction;
      readonly overwrite: boolean;
    }
  | { readonly name: "listtriggers"; readonly guildId: string }
  | {
      readonly name: "removetrigger";
      readonly guildId: string;
      readonly requester: Requester;
      readonly phrase: string;
    }
  | {
      readonly name: "setadminrole";
      readonly guildId: string;
      readonly requester: Requester;
      readonly roleId: string;
    };
