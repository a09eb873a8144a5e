import { ALERT_KIND_ORDER, type AlertKind } from "../modules/alert-engine/constants.js";

export interface AppConfig {
  redisUrl: string;
  runLedgerTtlSeconds: number;
  meteogramSnapshotPath: string;
  polygonRegistryPath: string;
  alertHumidityMinThreshold: number;
  alertWindMaxThreshold: number;
  alertRainMaxThreshold: number;
  alertHeavyRainEnabled: boolean;
  alertLocalUtcOffsetSeconds: number;
  /** Overrides of the label each alert kind is matched by in event names. */
  alertEventLabels: Partial<Record<AlertKind, string>>;
  deliveryGatewayBaseUrl: string;
  deliveryDispatchBaseUrl: string;
  deliveryGatewayEmail: string;
  deliveryGatewayPassword: string;
  deliveryGatewayTimeoutMs: number;
  deliveryMaxAttempts: number;
  deliveryRetryBaseDelayMs: number;
}

type EnvSource = NodeJS.ProcessEnv | Record<string, string | undefined>;

function parsePositiveInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${variableName} must be a positive integer`);
  }
  return parsed;
}

function parseNonNegativeInt(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${variableName} must be a non-negative integer`);
  }
  return parsed;
}

function parseNonNegativeNumber(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${variableName} must be a non-negative number`);
  }
  return parsed;
}

function parsePercentage(
  value: string | undefined,
  fallback: number,
  variableName: string
): number {
  if (value == null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 100) {
    throw new Error(`${variableName} must be a number between 0 and 100`);
  }
  return parsed;
}

function parseBoolean(
  value: string | undefined,
  fallback: boolean,
  variableName: string
): boolean {
  const normalized = parseOptionalString(value)?.toLowerCase();
  if (normalized === undefined) {
    return fallback;
  }
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new Error(`${variableName} must be "true" or "false"`);
}

function parseOptionalString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function isAlertKind(value: string): value is AlertKind {
  return ALERT_KIND_ORDER.some((kind) => kind === value);
}

// "high-temperature=temperatura alta,high-wind=vento"
function parseEventLabels(
  value: string | undefined,
  variableName: string
): Partial<Record<AlertKind, string>> {
  const labels: Partial<Record<AlertKind, string>> = {};
  const raw = parseOptionalString(value);
  if (raw === undefined) {
    return labels;
  }

  for (const entry of raw.split(",")) {
    const separator = entry.indexOf("=");
    const kind = separator > 0 ? entry.slice(0, separator).trim() : "";
    const label = separator > 0 ? entry.slice(separator + 1).trim() : "";
    if (kind === "" || label === "") {
      throw new Error(`${variableName} entries must look like <alert-kind>=<label>`);
    }
    if (!isAlertKind(kind)) {
      throw new Error(`${variableName} has unknown alert kind "${kind}"`);
    }
    labels[kind] = label;
  }
  return labels;
}

function requireString(value: string | undefined, variableName: string): string {
  const parsed = parseOptionalString(value);
  if (!parsed) {
    throw new Error(`${variableName} is required`);
  }
  return parsed;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  return {
    redisUrl: requireString(env.REDIS_URL, "REDIS_URL"),
    runLedgerTtlSeconds: parsePositiveInt(
      env.RUN_LEDGER_TTL_SECONDS,
      172_800,
      "RUN_LEDGER_TTL_SECONDS"
    ),
    meteogramSnapshotPath: requireString(env.METEOGRAM_SNAPSHOT_PATH, "METEOGRAM_SNAPSHOT_PATH"),
    polygonRegistryPath: requireString(env.POLYGON_REGISTRY_PATH, "POLYGON_REGISTRY_PATH"),
    alertHumidityMinThreshold: parsePercentage(
      env.ALERT_HUMIDITY_MIN_THRESHOLD,
      60,
      "ALERT_HUMIDITY_MIN_THRESHOLD"
    ),
    alertWindMaxThreshold: parseNonNegativeNumber(
      env.ALERT_WIND_MAX_THRESHOLD,
      11.08,
      "ALERT_WIND_MAX_THRESHOLD"
    ),
    alertRainMaxThreshold: parseNonNegativeNumber(
      env.ALERT_RAIN_MAX_THRESHOLD,
      15,
      "ALERT_RAIN_MAX_THRESHOLD"
    ),
    alertHeavyRainEnabled: parseBoolean(
      env.ALERT_HEAVY_RAIN_ENABLED,
      false,
      "ALERT_HEAVY_RAIN_ENABLED"
    ),
    alertLocalUtcOffsetSeconds: parseNonNegativeInt(
      env.ALERT_LOCAL_UTC_OFFSET_SECONDS,
      10_800,
      "ALERT_LOCAL_UTC_OFFSET_SECONDS"
    ),
    alertEventLabels: parseEventLabels(env.ALERT_EVENT_LABELS, "ALERT_EVENT_LABELS"),
    deliveryGatewayBaseUrl:
      parseOptionalString(env.DELIVERY_GATEWAY_BASE_URL) ?? "http://localhost:8002",
    deliveryDispatchBaseUrl:
      parseOptionalString(env.DELIVERY_DISPATCH_BASE_URL) ?? "http://localhost:8000",
    deliveryGatewayEmail: requireString(env.DELIVERY_GATEWAY_EMAIL, "DELIVERY_GATEWAY_EMAIL"),
    deliveryGatewayPassword: requireString(
      env.DELIVERY_GATEWAY_PASSWORD,
      "DELIVERY_GATEWAY_PASSWORD"
    ),
    deliveryGatewayTimeoutMs: parsePositiveInt(
      env.DELIVERY_GATEWAY_TIMEOUT_MS,
      10_000,
      "DELIVERY_GATEWAY_TIMEOUT_MS"
    ),
    deliveryMaxAttempts: parsePositiveInt(
      env.DELIVERY_MAX_ATTEMPTS,
      3,
      "DELIVERY_MAX_ATTEMPTS"
    ),
    deliveryRetryBaseDelayMs: parsePositiveInt(
      env.DELIVERY_RETRY_BASE_DELAY_MS,
      200,
      "DELIVERY_RETRY_BASE_DELAY_MS"
    )
  };
}
