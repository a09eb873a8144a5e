import type { Logger } from "../../shared/logger.js";
import type { AlertKind, MeasurementCode } from "./constants.js";

export type Sample = Readonly<Partial<Record<MeasurementCode, number>>>;

/** Samples of one polygon keyed by seconds since midnight UTC-0. */
export type PolygonSamples = ReadonlyMap<number, Sample>;

export type PolygonTimeSeries = ReadonlyMap<string, PolygonSamples>;

interface AlertRecordBase {
  polygonId: string;
  value: number;
  threshold: number;
  difference: number;
  secondsSinceMidnightUtc0: number;
}

export interface HighTemperatureAlert extends AlertRecordBase {
  kind: "high-temperature";
  unit: "°C";
  valueKelvin: number;
}

export interface LowTemperatureAlert extends AlertRecordBase {
  kind: "low-temperature";
  unit: "°C";
  valueKelvin: number;
}

export interface LowHumidityAlert extends AlertRecordBase {
  kind: "low-humidity";
  unit: "%";
  averageTemperatureC: number;
  dewPointC: number;
}

export interface HighWindAlert extends AlertRecordBase {
  kind: "high-wind";
  unit: "km/h";
  speedSquared: number;
}

export interface HeavyRainAlert extends AlertRecordBase {
  kind: "heavy-rain";
  unit: "mm";
}

export type AlertRecord =
  | HighTemperatureAlert
  | LowTemperatureAlert
  | LowHumidityAlert
  | HighWindAlert
  | HeavyRainAlert;

export type AlertRecordOf<K extends AlertKind> = Extract<AlertRecord, { kind: K }>;

export type CityAlerts = { [K in AlertKind]?: AlertRecordOf<K> };

/** City display name to that city's alerts for one run. */
export type AlertStore = ReadonlyMap<string, Readonly<CityAlerts>>;

export type FamilyScanResult<K extends AlertKind> = Map<string, AlertRecordOf<K>>;

export interface PolygonRegistry {
  polygonIds(): readonly string[];
  displayNameOf(polygonId: string): string | undefined;
}

export interface AlertThresholds {
  minHumidityPct: number;
  maxWindSpeedSquared: number;
  maxRainMmPerHour: number;
}

export interface AlertScanEngineOptions {
  registry: PolygonRegistry;
  thresholds?: Partial<AlertThresholds>;
  heavyRainEnabled?: boolean;
  logger?: Logger;
}
