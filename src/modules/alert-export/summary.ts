import { alertsInKindOrder } from "../alert-engine/aggregator.js";
import { DEFAULT_LOCAL_UTC_OFFSET_SECONDS } from "../alert-engine/constants.js";
import { decodeTimeOfDay } from "../alert-engine/conversions.js";
import type { AlertRecord, AlertStore } from "../alert-engine/types.js";
import type { AlertSummaryOptions } from "./types.js";

export const EMPTY_SUMMARY = "No alerts generated";

function withUnit(value: number, unit: string): string {
  const text = value.toFixed(1);
  return unit === "°C" || unit === "%" ? `${text}${unit}` : `${text} ${unit}`;
}

function headline(record: AlertRecord): string {
  const value = withUnit(record.value, record.unit);
  switch (record.kind) {
    case "high-temperature":
      return `High temperature: ${value} (${record.valueKelvin.toFixed(1)}K)`;
    case "low-temperature":
      return `Low temperature: ${value} (${record.valueKelvin.toFixed(1)}K)`;
    case "low-humidity":
      return `Low humidity: ${value}`;
    case "high-wind":
      return `High wind: ${value}`;
    case "heavy-rain":
      return `Heavy rain: ${value}`;
  }
}

function extraLines(record: AlertRecord): string[] {
  if (record.kind === "low-humidity") {
    return [
      `Average temperature (Tave): ${withUnit(record.averageTemperatureC, "°C")}`,
      `Dew point (TDave): ${withUnit(record.dewPointC, "°C")}`
    ];
  }
  return [];
}

function renderRecord(record: AlertRecord, referenceDate: string, offsetSeconds: number): string[] {
  const decoded = decodeTimeOfDay(record.secondsSinceMidnightUtc0, referenceDate, offsetSeconds);
  const details = [
    `Threshold: ${withUnit(record.threshold, record.unit)}`,
    `Difference: ${withUnit(record.difference, record.unit)}`,
    ...extraLines(record),
    `Seconds: ${record.secondsSinceMidnightUtc0}`,
    `Date: ${decoded.date}`,
    `Time: ${decoded.formatted}`
  ];
  return [`  - ${headline(record)}`, ...details.map((line) => `    ${line}`)];
}

/** Human-readable report of a store, for logs. Not a wire format. */
export function renderAlertSummary(store: AlertStore, options: AlertSummaryOptions): string {
  if (store.size === 0) {
    return EMPTY_SUMMARY;
  }

  const offsetSeconds = options.offsetSeconds ?? DEFAULT_LOCAL_UTC_OFFSET_SECONDS;
  const lines = ["=== ALERT SUMMARY ==="];
  for (const [city, cityAlerts] of store) {
    lines.push("", `City: ${city}`);
    for (const record of alertsInKindOrder(cityAlerts)) {
      lines.push(...renderRecord(record, options.referenceDate, offsetSeconds));
    }
  }
  return lines.join("\n");
}
