import type { TriggerRecord } from "./types.js";

export function normalizePhrase(phrase: string): string {
  return phrase.trim().toLowerCase();
}

/**
 * Case-insensitive substring match. When several phrases occur in the text
 * the earliest registered one wins, so at most one action fires per message.
 */
export function findMatch(
  records: readonly TriggerRecord[],
  text: string,
): TriggerRecord | null {
  if (records.length === 0 || text.length === 0) return null;
  const haystack = text.toLowerCase();
  return records.find((r) => haystack.includes(r.phrase)) ?? null;
}
