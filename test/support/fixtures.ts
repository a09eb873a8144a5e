import { StaticPolygonRegistry } from "../../src/connectors/polygon-registry/registry.js";
import type { PolygonTimeSeries, Sample } from "../../src/modules/alert-engine/types.js";
import type { Logger } from "../../src/shared/logger.js";

export type TimedSampleInput = [seconds: number, sample: Sample];

export function seriesOf(polygons: Record<string, TimedSampleInput[]>): PolygonTimeSeries {
  const series = new Map<string, Map<number, Sample>>();
  for (const [polygonId, samples] of Object.entries(polygons)) {
    series.set(polygonId, new Map(samples));
  }
  return series;
}

export function registryOf(entries: Array<[id: string, displayName?: string]>): StaticPolygonRegistry {
  return new StaticPolygonRegistry(
    entries.map(([id, displayName]) => ({ id, displayName }))
  );
}

export interface RecordedLog {
  level: "info" | "warn" | "error";
  message: string;
  context: Record<string, unknown> | undefined;
}

export function createRecordingLogger(): Logger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    info(message, context) {
      entries.push({ level: "info", message, context });
    },
    warn(message, context) {
      entries.push({ level: "warn", message, context });
    },
    error(message, context) {
      entries.push({ level: "error", message, context });
    }
  };
}

export function assertClose(actual: number | undefined, expected: number, tolerance = 1e-9): void {
  if (actual === undefined || Math.abs(actual - expected) > tolerance) {
    throw new Error(`expected ${String(actual)} to be within ${tolerance} of ${expected}`);
  }
}
