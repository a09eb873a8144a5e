import { DEFAULT_LOCAL_UTC_OFFSET_SECONDS, SECONDS_PER_DAY } from "./constants.js";

const KELVIN_OFFSET = 273.15;
const MAGNUS_A = 17.27;
const MAGNUS_B = 237.7;
const MAGNUS_BASE_HPA = 6.112;
const MS_TO_KMH = 3.6;

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export interface DecodedTimeOfDay {
  hour: number;
  minute: number;
  /** Day of month of `date`. */
  day: number;
  /** Local calendar date, YYYY-MM-DD. */
  date: string;
  /** HH:MM */
  formatted: string;
}

export function kelvinToCelsius(kelvin: number): number {
  return kelvin - KELVIN_OFFSET;
}

function saturationVaporPressure(celsius: number): number {
  return MAGNUS_BASE_HPA * Math.exp((MAGNUS_A * celsius) / (celsius + MAGNUS_B));
}

/**
 * Relative humidity (%) from air temperature and dew point, both in °C, using
 * the Magnus-Tetens approximation. Always within [0, 100]; a ratio that is not
 * a number (both pressures degenerate near -237.7 °C) yields 100.
 */
export function relativeHumidity(temperatureC: number, dewPointC: number): number {
  const ratio = saturationVaporPressure(dewPointC) / saturationVaporPressure(temperatureC);
  const humidity = ratio * 100;
  if (Number.isNaN(humidity)) {
    return 100;
  }
  return Math.max(0, Math.min(100, humidity));
}

/**
 * Converts a squared wind speed (Umax² + Vmax², m²/s²) to km/h.
 * Returns undefined for negative, missing or non-finite input.
 */
export function windMagnitudeToKmh(speedSquared: number | undefined): number | undefined {
  if (speedSquared === undefined || !Number.isFinite(speedSquared) || speedSquared < 0) {
    return undefined;
  }
  return Math.sqrt(speedSquared) * MS_TO_KMH;
}

function parseIsoDate(isoDate: string): Date {
  const parsed = new Date(`${isoDate}T00:00:00.000Z`);
  if (
    !ISO_DATE_PATTERN.test(isoDate) ||
    !Number.isFinite(parsed.getTime()) ||
    parsed.toISOString().slice(0, 10) !== isoDate
  ) {
    throw new Error(`"${isoDate}" is not an ISO calendar date (YYYY-MM-DD)`);
  }
  return parsed;
}

export function shiftIsoDate(isoDate: string, days: number): string {
  const date = parseIsoDate(isoDate);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}

/** Calendar date of `instant` in the local zone `offsetSeconds` behind UTC. */
export function localIsoDate(
  instant: Date,
  offsetSeconds: number = DEFAULT_LOCAL_UTC_OFFSET_SECONDS
): string {
  return new Date(instant.getTime() - offsetSeconds * 1000).toISOString().slice(0, 10);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Decodes a seconds-since-midnight UTC-0 offset into local clock time and
 * calendar date. Values that land before local midnight belong to the
 * previous day of `referenceDate`, values past the next midnight to the
 * following one.
 */
export function decodeTimeOfDay(
  secondsUtc0: number,
  referenceDate: string,
  offsetSeconds: number = DEFAULT_LOCAL_UTC_OFFSET_SECONDS
): DecodedTimeOfDay {
  const localSeconds = Math.trunc(secondsUtc0) - offsetSeconds;
  const dayShift = Math.floor(localSeconds / SECONDS_PER_DAY);
  const secondsOfDay = localSeconds - dayShift * SECONDS_PER_DAY;

  const hour = Math.floor(secondsOfDay / 3600);
  const minute = Math.floor((secondsOfDay % 3600) / 60);
  const date = shiftIsoDate(referenceDate, dayShift);

  return {
    hour,
    minute,
    day: Number(date.slice(8, 10)),
    date,
    formatted: `${pad2(hour)}:${pad2(minute)}`
  };
}
