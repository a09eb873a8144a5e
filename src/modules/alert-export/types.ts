import type { Logger } from "../../shared/logger.js";
import type { AlertKind } from "../alert-engine/constants.js";

/** One item of a reference vocabulary served by the delivery gateway. */
export interface VocabularyEntry {
  id: string;
  name: string;
}

export interface AlertVocabularyMatcher {
  matchCity(cityName: string, cities: readonly VocabularyEntry[]): VocabularyEntry | undefined;
  matchEvent(kind: AlertKind, events: readonly VocabularyEntry[]): VocabularyEntry | undefined;
}

/** Wire shape expected by the delivery gateway's batch import. */
export interface AlertExportRecord {
  eventId: string;
  cityId: string;
  value: number;
  thresholdValue: number;
  difference: number;
  generationDate: string;
  referenceDate: string;
  unit: string;
  time: string;
  secondsOffset: number;
}

export type ExportSkipReason = "city-not-found" | "event-not-found";

export interface SkippedExport {
  city: string;
  kind?: AlertKind;
  reason: ExportSkipReason;
}

export interface AlertExportResult {
  records: AlertExportRecord[];
  skipped: SkippedExport[];
}

export interface AlertExportOptions {
  events: readonly VocabularyEntry[];
  cities: readonly VocabularyEntry[];
  matcher?: AlertVocabularyMatcher;
  now?: Date;
  offsetSeconds?: number;
  logger?: Logger;
}

export interface AlertSummaryOptions {
  /** Local calendar date the alert offsets are relative to, YYYY-MM-DD. */
  referenceDate: string;
  offsetSeconds?: number;
}
