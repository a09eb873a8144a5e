import {
  SECONDS_PER_DAY,
  VALID_MEASUREMENT_CODES,
  type MeasurementCode
} from "../../modules/alert-engine/constants.js";
import type { PolygonSamples, PolygonTimeSeries, Sample } from "../../modules/alert-engine/types.js";
import { isObjectRecord } from "../../shared/payload.js";

const SECONDS_KEY_PATTERN = /^-?\d+$/;
const MAX_SAMPLE_OFFSET_SECONDS = 366 * SECONDS_PER_DAY;

function isMeasurementCode(code: string): code is MeasurementCode {
  return VALID_MEASUREMENT_CODES.has(code);
}

function parseSample(raw: unknown): Sample | undefined {
  if (!isObjectRecord(raw)) {
    return undefined;
  }

  const sample: Partial<Record<MeasurementCode, number>> = {};
  let measurements = 0;
  for (const [code, value] of Object.entries(raw)) {
    if (!isMeasurementCode(code) || typeof value !== "number" || !Number.isFinite(value)) {
      continue;
    }
    sample[code] = value;
    measurements += 1;
  }
  return measurements > 0 ? sample : undefined;
}

function parsePolygonSamples(raw: unknown): PolygonSamples {
  const samples = new Map<number, Sample>();
  if (!isObjectRecord(raw)) {
    return samples;
  }

  for (const [key, value] of Object.entries(raw)) {
    if (!SECONDS_KEY_PATTERN.test(key)) {
      continue;
    }
    const seconds = Number.parseInt(key, 10);
    if (Math.abs(seconds) > MAX_SAMPLE_OFFSET_SECONDS) {
      continue;
    }
    const sample = parseSample(value);
    if (sample) {
      samples.set(seconds, sample);
    }
  }
  return samples;
}

/**
 * Parses `{ polygons: { [polygonId]: { [seconds]: { [code]: number } } } }`.
 * Non-integer second keys, keys more than 366 days from midnight, unknown codes
 * and non-finite values are dropped.
 */
export function parseMeteogramSnapshot(payload: unknown): PolygonTimeSeries {
  if (!isObjectRecord(payload)) {
    throw new Error("Meteogram snapshot must be an object");
  }
  if (!isObjectRecord(payload.polygons)) {
    throw new Error("Meteogram snapshot must include a polygons object");
  }

  const series = new Map<string, PolygonSamples>();
  for (const [polygonId, rawSamples] of Object.entries(payload.polygons)) {
    const samples = parsePolygonSamples(rawSamples);
    if (samples.size > 0) {
      series.set(polygonId, samples);
    }
  }
  return series;
}
