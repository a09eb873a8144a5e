import type { PolygonRegistry } from "../../modules/alert-engine/types.js";

export interface PolygonRegistryEntry {
  id: string;
  displayName: string | undefined;
}

/** In-memory registry; polygon order is the order of the entries given. */
export class StaticPolygonRegistry implements PolygonRegistry {
  private readonly displayNames = new Map<string, string | undefined>();

  constructor(entries: readonly PolygonRegistryEntry[]) {
    for (const entry of entries) {
      const displayName = entry.displayName?.trim();
      this.displayNames.set(entry.id, displayName === "" ? undefined : displayName);
    }
  }

  polygonIds(): readonly string[] {
    return [...this.displayNames.keys()];
  }

  displayNameOf(polygonId: string): string | undefined {
    return this.displayNames.get(polygonId);
  }

  get size(): number {
    return this.displayNames.size;
  }
}
