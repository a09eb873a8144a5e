import { DEFAULT_EVENT_LABELS, type AlertKind } from "../alert-engine/constants.js";
import type { AlertVocabularyMatcher, VocabularyEntry } from "./types.js";

/**
 * Cities match on case-insensitive equal names. Events match when the kind's
 * label appears, case-insensitively, inside the event name. First match wins.
 * Labels not overridden keep their English defaults.
 */
export function createDefaultVocabularyMatcher(
  labelOverrides: Readonly<Partial<Record<AlertKind, string>>> = {}
): AlertVocabularyMatcher {
  const eventLabels: Readonly<Record<AlertKind, string>> = {
    ...DEFAULT_EVENT_LABELS,
    ...labelOverrides
  };
  return {
    matchCity(cityName: string, cities: readonly VocabularyEntry[]) {
      const wanted = cityName.toLowerCase();
      return cities.find((city) => city.name.toLowerCase() === wanted);
    },
    matchEvent(kind: AlertKind, events: readonly VocabularyEntry[]) {
      const label = eventLabels[kind].toLowerCase();
      if (label === "") {
        return undefined;
      }
      return events.find((event) => event.name.toLowerCase().includes(label));
    }
  };
}
