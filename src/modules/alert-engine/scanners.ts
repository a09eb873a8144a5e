import { AlertKinds, type MeasurementCode } from "./constants.js";
import { kelvinToCelsius, relativeHumidity, windMagnitudeToKmh } from "./conversions.js";
import type {
  AlertRecord,
  FamilyScanResult,
  HeavyRainAlert,
  HighTemperatureAlert,
  HighWindAlert,
  LowHumidityAlert,
  LowTemperatureAlert,
  PolygonRegistry,
  PolygonSamples,
  PolygonTimeSeries,
  Sample
} from "./types.js";

type TimedSample = readonly [seconds: number, sample: Sample];

type PolygonVisitor = (city: string, polygonId: string, samples: readonly TimedSample[]) => void;

function readMeasurement(sample: Sample, code: MeasurementCode): number | undefined {
  const value = sample[code];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function inTimeOrder(samples: PolygonSamples): TimedSample[] {
  return [...samples.entries()].sort(([left], [right]) => left - right);
}

/**
 * Visits every registered polygon that resolves to a display name and has
 * samples in the series, in registry order.
 */
function forEachResolvedPolygon(
  registry: PolygonRegistry,
  series: PolygonTimeSeries,
  visit: PolygonVisitor
): void {
  for (const polygonId of registry.polygonIds()) {
    const city = registry.displayNameOf(polygonId);
    if (!city) {
      continue;
    }
    const samples = series.get(polygonId);
    if (!samples || samples.size === 0) {
      continue;
    }
    visit(city, polygonId, inTimeOrder(samples));
  }
}

// Several polygons may share a display name; the more extreme record wins and
// the first one met is kept on a tie.
function keepMoreExtreme<T extends AlertRecord>(
  result: Map<string, T>,
  city: string,
  candidate: T,
  isMoreExtreme: (candidate: T, current: T) => boolean
): void {
  const current = result.get(city);
  if (!current || isMoreExtreme(candidate, current)) {
    result.set(city, candidate);
  }
}

export function scanHighTemperature(
  registry: PolygonRegistry,
  series: PolygonTimeSeries
): FamilyScanResult<"high-temperature"> {
  const result: FamilyScanResult<"high-temperature"> = new Map();

  forEachResolvedPolygon(registry, series, (city, polygonId, samples) => {
    let highest: HighTemperatureAlert | undefined;
    for (const [seconds, sample] of samples) {
      const kelvin = readMeasurement(sample, "Tmax");
      if (kelvin === undefined) {
        continue;
      }
      const celsius = kelvinToCelsius(kelvin);
      if (!highest || celsius > highest.value) {
        highest = {
          kind: AlertKinds.HIGH_TEMPERATURE,
          polygonId,
          value: celsius,
          valueKelvin: kelvin,
          threshold: 0,
          difference: 0,
          unit: "°C",
          secondsSinceMidnightUtc0: seconds
        };
      }
    }
    if (highest) {
      keepMoreExtreme(result, city, highest, (candidate, current) => candidate.value > current.value);
    }
  });

  return result;
}

export function scanLowTemperature(
  registry: PolygonRegistry,
  series: PolygonTimeSeries
): FamilyScanResult<"low-temperature"> {
  const result: FamilyScanResult<"low-temperature"> = new Map();

  forEachResolvedPolygon(registry, series, (city, polygonId, samples) => {
    let lowest: LowTemperatureAlert | undefined;
    for (const [seconds, sample] of samples) {
      const kelvin = readMeasurement(sample, "Tmin");
      if (kelvin === undefined) {
        continue;
      }
      const celsius = kelvinToCelsius(kelvin);
      if (!lowest || celsius < lowest.value) {
        lowest = {
          kind: AlertKinds.LOW_TEMPERATURE,
          polygonId,
          value: celsius,
          valueKelvin: kelvin,
          threshold: 0,
          difference: 0,
          unit: "°C",
          secondsSinceMidnightUtc0: seconds
        };
      }
    }
    if (lowest) {
      keepMoreExtreme(result, city, lowest, (candidate, current) => candidate.value < current.value);
    }
  });

  return result;
}

export function scanLowHumidity(
  registry: PolygonRegistry,
  series: PolygonTimeSeries,
  minHumidityPct: number
): FamilyScanResult<"low-humidity"> {
  const result: FamilyScanResult<"low-humidity"> = new Map();

  forEachResolvedPolygon(registry, series, (city, polygonId, samples) => {
    let driest: LowHumidityAlert | undefined;
    for (const [seconds, sample] of samples) {
      const averageKelvin = readMeasurement(sample, "Tave");
      const dewPointKelvin = readMeasurement(sample, "TDave");
      if (averageKelvin === undefined || dewPointKelvin === undefined) {
        continue;
      }
      const averageTemperatureC = kelvinToCelsius(averageKelvin);
      const dewPointC = kelvinToCelsius(dewPointKelvin);
      const humidity = relativeHumidity(averageTemperatureC, dewPointC);
      if (!driest || humidity < driest.value) {
        driest = {
          kind: AlertKinds.LOW_HUMIDITY,
          polygonId,
          value: humidity,
          threshold: minHumidityPct,
          difference: humidity - minHumidityPct,
          unit: "%",
          averageTemperatureC,
          dewPointC,
          secondsSinceMidnightUtc0: seconds
        };
      }
    }
    if (driest && driest.value < minHumidityPct) {
      keepMoreExtreme(result, city, driest, (candidate, current) => candidate.value < current.value);
    }
  });

  return result;
}

export function scanHighWind(
  registry: PolygonRegistry,
  series: PolygonTimeSeries,
  maxWindSpeedSquared: number
): FamilyScanResult<"high-wind"> {
  const result: FamilyScanResult<"high-wind"> = new Map();
  const thresholdKmh = windMagnitudeToKmh(maxWindSpeedSquared);
  if (thresholdKmh === undefined) {
    throw new Error("maxWindSpeedSquared must be a non-negative number");
  }

  forEachResolvedPolygon(registry, series, (city, polygonId, samples) => {
    let strongest: { seconds: number; speedSquared: number } | undefined;
    for (const [seconds, sample] of samples) {
      const u = readMeasurement(sample, "Umax");
      const v = readMeasurement(sample, "Vmax");
      if (u === undefined || v === undefined) {
        continue;
      }
      const speedSquared = u * u + v * v;
      if (speedSquared > maxWindSpeedSquared && (!strongest || speedSquared > strongest.speedSquared)) {
        strongest = { seconds, speedSquared };
      }
    }
    if (!strongest) {
      return;
    }

    const valueKmh = windMagnitudeToKmh(strongest.speedSquared);
    if (valueKmh === undefined) {
      return;
    }
    const record: HighWindAlert = {
      kind: AlertKinds.HIGH_WIND,
      polygonId,
      value: valueKmh,
      threshold: thresholdKmh,
      difference: valueKmh - thresholdKmh,
      unit: "km/h",
      speedSquared: strongest.speedSquared,
      secondsSinceMidnightUtc0: strongest.seconds
    };
    keepMoreExtreme(result, city, record, (candidate, current) => candidate.speedSquared > current.speedSquared);
  });

  return result;
}

export function scanHeavyRain(
  registry: PolygonRegistry,
  series: PolygonTimeSeries,
  maxRainMmPerHour: number
): FamilyScanResult<"heavy-rain"> {
  const result: FamilyScanResult<"heavy-rain"> = new Map();

  forEachResolvedPolygon(registry, series, (city, polygonId, samples) => {
    let wettest: HeavyRainAlert | undefined;
    for (const [seconds, sample] of samples) {
      const rain = readMeasurement(sample, "PRECmax");
      if (rain === undefined || rain <= maxRainMmPerHour) {
        continue;
      }
      if (!wettest || rain > wettest.value) {
        wettest = {
          kind: AlertKinds.HEAVY_RAIN,
          polygonId,
          value: rain,
          threshold: maxRainMmPerHour,
          difference: rain - maxRainMmPerHour,
          unit: "mm",
          secondsSinceMidnightUtc0: seconds
        };
      }
    }
    if (wettest) {
      keepMoreExtreme(result, city, wettest, (candidate, current) => candidate.value > current.value);
    }
  });

  return result;
}
