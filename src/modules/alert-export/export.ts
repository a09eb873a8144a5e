import { createNoopLogger } from "../../shared/logger.js";
import { alertsInKindOrder } from "../alert-engine/aggregator.js";
import { DEFAULT_LOCAL_UTC_OFFSET_SECONDS } from "../alert-engine/constants.js";
import { decodeTimeOfDay, localIsoDate } from "../alert-engine/conversions.js";
import type { AlertStore } from "../alert-engine/types.js";
import { createDefaultVocabularyMatcher } from "./matcher.js";
import type { AlertExportOptions, AlertExportRecord, AlertExportResult } from "./types.js";

/**
 * Builds the delivery gateway payload. A city or event missing from the
 * vocabularies is logged and skipped; the rest of the store is still exported.
 */
export function buildAlertExport(store: AlertStore, options: AlertExportOptions): AlertExportResult {
  const matcher = options.matcher ?? createDefaultVocabularyMatcher();
  const logger = options.logger ?? createNoopLogger();
  const offsetSeconds = options.offsetSeconds ?? DEFAULT_LOCAL_UTC_OFFSET_SECONDS;
  const generationDate = localIsoDate(options.now ?? new Date(), offsetSeconds);

  const result: AlertExportResult = { records: [], skipped: [] };

  for (const [cityName, cityAlerts] of store) {
    const city = matcher.matchCity(cityName, options.cities);
    if (!city) {
      logger.warn("city not found in vocabulary, skipping its alerts", { city: cityName });
      result.skipped.push({ city: cityName, reason: "city-not-found" });
      continue;
    }

    for (const record of alertsInKindOrder(cityAlerts)) {
      const event = matcher.matchEvent(record.kind, options.events);
      if (!event) {
        logger.warn("event not found for alert kind, skipping alert", {
          city: cityName,
          kind: record.kind
        });
        result.skipped.push({ city: cityName, kind: record.kind, reason: "event-not-found" });
        continue;
      }

      const decoded = decodeTimeOfDay(record.secondsSinceMidnightUtc0, generationDate, offsetSeconds);
      const exportRecord: AlertExportRecord = {
        eventId: event.id,
        cityId: city.id,
        value: record.value,
        thresholdValue: record.threshold,
        difference: record.difference,
        generationDate,
        referenceDate: decoded.date,
        unit: record.unit,
        time: decoded.formatted,
        secondsOffset: record.secondsSinceMidnightUtc0
      };
      result.records.push(exportRecord);
    }
  }

  return result;
}
