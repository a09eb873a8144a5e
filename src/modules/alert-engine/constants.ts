export const AlertKinds = Object.freeze({
  HIGH_TEMPERATURE: "high-temperature",
  LOW_TEMPERATURE: "low-temperature",
  LOW_HUMIDITY: "low-humidity",
  HIGH_WIND: "high-wind",
  HEAVY_RAIN: "heavy-rain"
});

export type AlertKind = (typeof AlertKinds)[keyof typeof AlertKinds];

/** Rendering and export order. */
export const ALERT_KIND_ORDER: readonly AlertKind[] = Object.freeze([
  AlertKinds.HIGH_TEMPERATURE,
  AlertKinds.LOW_TEMPERATURE,
  AlertKinds.LOW_HUMIDITY,
  AlertKinds.HIGH_WIND,
  AlertKinds.HEAVY_RAIN
]);

export const MEASUREMENT_CODES = Object.freeze([
  "Tmax",
  "Tmin",
  "Tave",
  "TDave",
  "Umax",
  "Vmax",
  "PRECmax"
] as const);

export type MeasurementCode = (typeof MEASUREMENT_CODES)[number];

export const VALID_MEASUREMENT_CODES: ReadonlySet<string> = new Set(MEASUREMENT_CODES);

export const DEFAULT_ALERT_THRESHOLDS = Object.freeze({
  minHumidityPct: 60,
  // m²/s², compared against Umax² + Vmax²
  maxWindSpeedSquared: 11.08,
  maxRainMmPerHour: 15
});

export const SECONDS_PER_DAY = 86_400;

/** Local zone is UTC-3. */
export const DEFAULT_LOCAL_UTC_OFFSET_SECONDS = 10_800;

export const DEFAULT_EVENT_LABELS: Readonly<Record<AlertKind, string>> = Object.freeze({
  "high-temperature": "high temperature",
  "low-temperature": "low temperature",
  "low-humidity": "low humidity",
  "high-wind": "wind",
  "heavy-rain": "rain"
});
