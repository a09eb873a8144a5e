import { readFile } from "node:fs/promises";

import { asIdentifier, asNonEmptyString, isObjectRecord } from "../../shared/payload.js";
import { StaticPolygonRegistry, type PolygonRegistryEntry } from "./registry.js";

function parseEntry(item: unknown): PolygonRegistryEntry | undefined {
  if (!isObjectRecord(item)) {
    return undefined;
  }
  const id = asIdentifier(item.id);
  if (!id) {
    return undefined;
  }
  return {
    id,
    displayName: asNonEmptyString(item.displayName)
  };
}

/**
 * Parses `{ polygons: [{ id, displayName }] }`. Entries without an id are
 * dropped; entries without a display name stay registered but unresolved.
 */
export function parsePolygonRegistry(payload: unknown): PolygonRegistryEntry[] {
  if (!isObjectRecord(payload)) {
    throw new Error("Polygon registry payload must be an object");
  }
  if (!Array.isArray(payload.polygons)) {
    throw new Error("Polygon registry payload must include a polygons array");
  }

  const entries: PolygonRegistryEntry[] = [];
  for (const item of payload.polygons) {
    const entry = parseEntry(item);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

export async function loadPolygonRegistryFile(path: string): Promise<StaticPolygonRegistry> {
  const text = await readFile(path, "utf8");
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Failed to parse polygon registry ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return new StaticPolygonRegistry(parsePolygonRegistry(payload));
}
