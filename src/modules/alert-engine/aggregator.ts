import { ALERT_KIND_ORDER, AlertKinds } from "./constants.js";
import type { AlertRecord, AlertStore, CityAlerts } from "./types.js";

function assignAlert(target: CityAlerts, record: AlertRecord): void {
  switch (record.kind) {
    case AlertKinds.HIGH_TEMPERATURE:
      target[AlertKinds.HIGH_TEMPERATURE] = record;
      return;
    case AlertKinds.LOW_TEMPERATURE:
      target[AlertKinds.LOW_TEMPERATURE] = record;
      return;
    case AlertKinds.LOW_HUMIDITY:
      target[AlertKinds.LOW_HUMIDITY] = record;
      return;
    case AlertKinds.HIGH_WIND:
      target[AlertKinds.HIGH_WIND] = record;
      return;
    case AlertKinds.HEAVY_RAIN:
      target[AlertKinds.HEAVY_RAIN] = record;
      return;
    default: {
      const unreachable: never = record;
      throw new Error(`Unhandled alert kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Merges per-family scan results into a fresh store. Each family owns one
 * kind slot per city, so merging never overwrites another family's record.
 */
export function aggregateAlerts(
  families: Iterable<ReadonlyMap<string, AlertRecord>>
): AlertStore {
  const store = new Map<string, CityAlerts>();

  for (const family of families) {
    for (const [city, record] of family) {
      let cityAlerts = store.get(city);
      if (!cityAlerts) {
        cityAlerts = {};
        store.set(city, cityAlerts);
      }
      assignAlert(cityAlerts, record);
    }
  }

  return store;
}

export function alertsInKindOrder(cityAlerts: Readonly<CityAlerts>): AlertRecord[] {
  const ordered: AlertRecord[] = [];
  for (const kind of ALERT_KIND_ORDER) {
    const record = cityAlerts[kind];
    if (record) {
      ordered.push(record);
    }
  }
  return ordered;
}

export function countAlerts(store: AlertStore): number {
  let total = 0;
  for (const cityAlerts of store.values()) {
    total += alertsInKindOrder(cityAlerts).length;
  }
  return total;
}
