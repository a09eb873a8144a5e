import { createNoopLogger, type Logger } from "../../shared/logger.js";
import { aggregateAlerts, countAlerts } from "./aggregator.js";
import { DEFAULT_ALERT_THRESHOLDS } from "./constants.js";
import {
  scanHeavyRain,
  scanHighTemperature,
  scanHighWind,
  scanLowHumidity,
  scanLowTemperature
} from "./scanners.js";
import type {
  AlertRecord,
  AlertScanEngineOptions,
  AlertStore,
  AlertThresholds,
  FamilyScanResult,
  PolygonRegistry,
  PolygonTimeSeries
} from "./types.js";

function resolveThreshold(
  value: number | undefined,
  fallback: number,
  fieldName: string,
  range: { min: number; max: number }
): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isFinite(value) || value < range.min || value > range.max) {
    throw new Error(`${fieldName} must be a number between ${range.min} and ${range.max}`);
  }
  return value;
}

function resolveThresholds(overrides: Partial<AlertThresholds> = {}): AlertThresholds {
  return {
    minHumidityPct: resolveThreshold(
      overrides.minHumidityPct,
      DEFAULT_ALERT_THRESHOLDS.minHumidityPct,
      "minHumidityPct",
      { min: 0, max: 100 }
    ),
    maxWindSpeedSquared: resolveThreshold(
      overrides.maxWindSpeedSquared,
      DEFAULT_ALERT_THRESHOLDS.maxWindSpeedSquared,
      "maxWindSpeedSquared",
      { min: 0, max: Number.MAX_VALUE }
    ),
    maxRainMmPerHour: resolveThreshold(
      overrides.maxRainMmPerHour,
      DEFAULT_ALERT_THRESHOLDS.maxRainMmPerHour,
      "maxRainMmPerHour",
      { min: 0, max: Number.MAX_VALUE }
    )
  };
}

/**
 * Derives per-city alerts from a polygon time series. Holds configuration
 * only; every call to `run` builds a new store.
 */
export class AlertScanEngine {
  readonly thresholds: Readonly<AlertThresholds>;
  readonly heavyRainEnabled: boolean;

  private readonly registry: PolygonRegistry;
  private readonly logger: Logger;

  constructor({
    registry,
    thresholds,
    heavyRainEnabled = false,
    logger = createNoopLogger()
  }: AlertScanEngineOptions) {
    this.registry = registry;
    this.thresholds = Object.freeze(resolveThresholds(thresholds));
    this.heavyRainEnabled = heavyRainEnabled;
    this.logger = logger;
  }

  scanHighTemperature(series: PolygonTimeSeries): FamilyScanResult<"high-temperature"> {
    return scanHighTemperature(this.registry, series);
  }

  scanLowTemperature(series: PolygonTimeSeries): FamilyScanResult<"low-temperature"> {
    return scanLowTemperature(this.registry, series);
  }

  scanLowHumidity(series: PolygonTimeSeries): FamilyScanResult<"low-humidity"> {
    return scanLowHumidity(this.registry, series, this.thresholds.minHumidityPct);
  }

  scanHighWind(series: PolygonTimeSeries): FamilyScanResult<"high-wind"> {
    return scanHighWind(this.registry, series, this.thresholds.maxWindSpeedSquared);
  }

  scanHeavyRain(series: PolygonTimeSeries): FamilyScanResult<"heavy-rain"> {
    return scanHeavyRain(this.registry, series, this.thresholds.maxRainMmPerHour);
  }

  run(series: PolygonTimeSeries): AlertStore {
    const families: ReadonlyMap<string, AlertRecord>[] = [
      this.scanHighTemperature(series),
      this.scanLowTemperature(series),
      this.scanLowHumidity(series),
      this.scanHighWind(series)
    ];
    if (this.heavyRainEnabled) {
      families.push(this.scanHeavyRain(series));
    }

    const store = aggregateAlerts(families);
    this.logger.info("alert scan completed", {
      polygons: series.size,
      cities: store.size,
      alerts: countAlerts(store),
      heavy_rain_enabled: this.heavyRainEnabled
    });
    return store;
  }
}
