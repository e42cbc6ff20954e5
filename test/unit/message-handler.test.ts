import { describe, it, expect, vi } from "vitest";
import { handleMessage } from "../../src/bot/message-handler.js";
import type { InboundMessage, TriggerResponder } from "../../src/bot/types.js";
import { createSilentLogger } from "../../src/logging/logger.js";
import { GUILD, admin, makeStore } from "../helpers/fixtures.js";

const logger = createSilentLogger();

const msg = (text: string, overrides: Partial<InboundMessage> = {}): InboundMessage => ({
  id: "msg-1",
  guildId: GUILD,
  channelId: "ch-1",
  authorId: "user-1",
  authorIsBot: false,
  text,
  ...overrides,
});

function mockResponder() {
  return {
    react: vi.fn<(emoji: string) => Promise<void>>().mockResolvedValue(undefined),
    reply: vi.fn<(text: string) => Promise<void>>().mockResolvedValue(undefined),
  } satisfies TriggerResponder;
}

async function storeWithTriggers() {
  const store = makeStore();
  await store.addTrigger(GUILD, "hello there", { type: "reaction", emoji: "👋" }, admin);
  await store.addTrigger(GUILD, "gm", { type: "reply", response: "Good morning ☀️" }, admin);
  return store;
}

describe("handleMessage", () => {
  it("reacts when a reaction phrase appears in the message", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();

    const fired = await handleMessage(msg("oh hello there friend"), store, responder, logger);

    expect(fired?.phrase).toBe("hello there");
    expect(responder.react).toHaveBeenCalledWith("👋");
    expect(responder.reply).not.toHaveBeenCalled();
  });

  it("replies when a reply phrase is sent", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();

    await handleMessage(msg("gm"), store, responder, logger);

    expect(responder.reply).toHaveBeenCalledWith("Good morning ☀️");
    expect(responder.react).not.toHaveBeenCalled();
  });

  it("does nothing when no phrase matches", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();

    expect(await handleMessage(msg("good evening"), store, responder, logger)).toBeNull();
    expect(responder.react).not.toHaveBeenCalled();
    expect(responder.reply).not.toHaveBeenCalled();
  });

  it("performs only one action when several phrases match", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();

    const fired = await handleMessage(msg("gm, hello there"), store, responder, logger);

    expect(fired?.phrase).toBe("hello there");
    expect(responder.react).toHaveBeenCalledTimes(1);
    expect(responder.reply).not.toHaveBeenCalled();
  });

  it("ignores bot authors", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();

    expect(await handleMessage(msg("gm", { authorIsBot: true }), store, responder, logger)).toBeNull();
    expect(responder.reply).not.toHaveBeenCalled();
  });

  it("ignores direct messages", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();

    expect(await handleMessage(msg("gm", { guildId: null }), store, responder, logger)).toBeNull();
    expect(responder.reply).not.toHaveBeenCalled();
  });

  it("swallows delivery failures after logging them", async () => {
    const store = await storeWithTriggers();
    const responder = mockResponder();
    responder.react.mockRejectedValue(new Error("Missing Permissions"));

    const fired = await handleMessage(msg("hello there"), store, responder, logger);
    expect(fired?.phrase).toBe("hello there");
  });
});
