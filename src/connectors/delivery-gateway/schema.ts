import type { VocabularyEntry } from "../../modules/alert-export/types.js";
import { asIdentifier, asNonEmptyString, isObjectRecord } from "../../shared/payload.js";

export function parseLoginToken(payload: unknown): string {
  const token = isObjectRecord(payload) ? asNonEmptyString(payload.token) : undefined;
  if (!token) {
    throw new Error("Delivery gateway login response did not include a token");
  }
  return token;
}

function parseVocabularyEntry(item: unknown): VocabularyEntry | undefined {
  if (!isObjectRecord(item)) {
    return undefined;
  }
  const id = asIdentifier(item.id);
  const name = asNonEmptyString(item.name) ?? asNonEmptyString(item.eventName);
  if (!id || !name) {
    return undefined;
  }
  return { id, name };
}

/** Accepts a bare array of `{ id, name }` items; malformed items are dropped. */
export function parseVocabularyPayload(payload: unknown, vocabulary: string): VocabularyEntry[] {
  if (!Array.isArray(payload)) {
    throw new Error(`Delivery gateway ${vocabulary} response must be an array`);
  }

  const entries: VocabularyEntry[] = [];
  for (const item of payload) {
    const entry = parseVocabularyEntry(item);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}
