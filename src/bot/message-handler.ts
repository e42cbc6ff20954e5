import type { Logger } from "../logging/logger.js";
import type { TriggerStore } from "../triggers/store.js";
import type { TriggerRecord } from "../triggers/types.js";
import type { InboundMessage, TriggerResponder } from "./types.js";

/**
 * Fires the first matching trigger for a guild message. Resolves to the
 * record that fired, or null. Delivery failures are logged, not thrown.
 */
export async function handleMessage(
  msg: InboundMessage,
  store: TriggerStore,
  responder: TriggerResponder,
  logger: Logger,
): Promise<TriggerRecord | null> {
  if (msg.authorIsBot || !msg.guildId) return null;

  const record = store.match(msg.guildId, msg.text);
  if (!record) return null;

  const log = logger.child({ guildId: msg.guildId, messageId: msg.id, phrase: record.phrase });
  try {
    if (record.action.type === "reaction") {
      await responder.react(record.action.emoji);
    } else {
      await responder.reply(record.action.response);
    }
    log.debug({ action: record.action.type }, "Trigger fired");
  } catch (err) {
    log.warn({ err, action: record.action.type }, "Failed to perform trigger action");
  }
  return record;
}
