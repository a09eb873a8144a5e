import assert from "node:assert/strict";
import test from "node:test";

import {
  DeliveryGatewayError,
  type DeliveryGatewayErrorDetails
} from "../../src/connectors/delivery-gateway/errors.js";
import type { DeliveryGateway } from "../../src/connectors/delivery-gateway/types.js";
import type { MeteogramSource } from "../../src/connectors/meteogram-snapshot/types.js";
import type { RunCompletion, RunLedger } from "../../src/infrastructure/redis/run-ledger.js";
import { AlertScanEngine } from "../../src/modules/alert-engine/service.js";
import type { PolygonTimeSeries } from "../../src/modules/alert-engine/types.js";
import type { AlertExportRecord, VocabularyEntry } from "../../src/modules/alert-export/types.js";
import { AlertRunService, NO_ALERTS_NOTE } from "../../src/modules/alert-run/service.js";
import { createRecordingLogger, registryOf, seriesOf } from "../support/fixtures.js";

const NOW = new Date("2026-10-19T15:00:00.000Z");

class InMemoryRunLedger implements RunLedger {
  readonly completions = new Map<string, RunCompletion>();

  async findCompletion(runKey: string): Promise<RunCompletion | undefined> {
    return this.completions.get(runKey);
  }

  async markCompleted(runKey: string, note?: string): Promise<void> {
    this.completions.set(runKey, { completed_at_utc: NOW.toISOString(), note });
  }
}

class FakeDeliveryGateway implements DeliveryGateway {
  readonly calls: string[] = [];
  readonly imported: AlertExportRecord[][] = [];
  importFailures = 0;
  importFailure: DeliveryGatewayErrorDetails = { operation: "import alerts", status: 503 };
  storeBeforeFailing = false;
  dispatchFailures = 0;
  loginError: Error | undefined;

  constructor(
    private readonly events: VocabularyEntry[],
    private readonly cities: VocabularyEntry[]
  ) {}

  async login(): Promise<void> {
    this.calls.push("login");
    if (this.loginError) {
      throw this.loginError;
    }
  }

  async fetchEvents(): Promise<VocabularyEntry[]> {
    this.calls.push("fetchEvents");
    return this.events;
  }

  async fetchCities(): Promise<VocabularyEntry[]> {
    this.calls.push("fetchCities");
    return this.cities;
  }

  async importAlerts(records: readonly AlertExportRecord[]): Promise<string> {
    this.calls.push("importAlerts");
    if (this.importFailures > 0) {
      this.importFailures -= 1;
      if (this.storeBeforeFailing) {
        this.imported.push([...records]);
      }
      throw new DeliveryGatewayError("gateway unavailable", this.importFailure);
    }
    this.imported.push([...records]);
    return "ok";
  }

  async startAlertDispatch(): Promise<void> {
    this.calls.push("startAlertDispatch");
    if (this.dispatchFailures > 0) {
      this.dispatchFailures -= 1;
      throw new DeliveryGatewayError("dispatch timed out", {
        operation: "start alert dispatch",
        timedOut: true
      });
    }
  }
}

function staticSource(series: PolygonTimeSeries): MeteogramSource & { loads: number } {
  return {
    loads: 0,
    async load() {
      this.loads += 1;
      return series;
    }
  };
}

const registry = registryOf([
  ["101", "Porto Alegre"],
  ["102", "Canoas"]
]);

const alertingSeries = seriesOf({
  "101": [[3_600, { Tmax: 310 }]],
  "102": [[100_800, { Umax: 3, Vmax: 3 }]]
});

function createService(options: {
  series?: PolygonTimeSeries;
  ledger?: InMemoryRunLedger;
  gateway?: FakeDeliveryGateway;
}) {
  const ledger = options.ledger ?? new InMemoryRunLedger();
  const gateway =
    options.gateway ??
    new FakeDeliveryGateway(
      [
        { id: "1", name: "High temperature" },
        { id: "4", name: "Strong wind" }
      ],
      [{ id: "10", name: "Porto Alegre" }]
    );
  const source = staticSource(options.series ?? alertingSeries);
  const logger = createRecordingLogger();
  const service = new AlertRunService({
    source,
    engine: new AlertScanEngine({ registry }),
    gateway,
    ledger,
    retryDelayMs: 0,
    logger
  });
  return { service, ledger, gateway, source, logger };
}

test("runOnce delivers the export and marks the local day complete", async () => {
  const { service, ledger, gateway, logger } = createService({});

  const result = await service.runOnce(NOW);

  assert.equal(result.runKey, "2026-10-19");
  assert.equal(result.status, "delivered");
  assert.equal(result.cities, 2);
  assert.equal(result.alerts, 2);
  assert.equal(result.exported, 1);
  assert.deepEqual(result.skipped, [{ city: "Canoas", reason: "city-not-found" }]);
  assert.ok(result.summary.startsWith("=== ALERT SUMMARY ==="));

  assert.deepEqual(gateway.calls, [
    "login",
    "fetchEvents",
    "fetchCities",
    "importAlerts",
    "startAlertDispatch"
  ]);
  assert.equal(gateway.imported.length, 1);
  assert.equal(gateway.imported[0]?.[0]?.eventId, "1");
  assert.equal(gateway.imported[0]?.[0]?.cityId, "10");
  assert.equal(gateway.imported[0]?.[0]?.referenceDate, "2026-10-18");
  assert.equal(gateway.imported[0]?.[0]?.time, "22:00");

  assert.deepEqual(ledger.completions.get("2026-10-19"), {
    completed_at_utc: NOW.toISOString(),
    note: undefined
  });
  assert.equal(logger.entries.at(-1)?.message, "alerts delivered");
});

test("runOnce skips a day that is already processed", async () => {
  const ledger = new InMemoryRunLedger();
  await ledger.markCompleted("2026-10-19");
  const { service, gateway, source } = createService({ ledger });

  const result = await service.runOnce(NOW);

  assert.equal(result.status, "already-processed");
  assert.equal(result.summary, "");
  assert.equal(result.store.size, 0);
  assert.equal(source.loads, 0);
  assert.deepEqual(gateway.calls, []);
});

test("runOnce marks a day without alerts and never contacts the gateway", async () => {
  const { service, ledger, gateway } = createService({
    series: seriesOf({ "101": [[0, { Tave: 298.15, TDave: 291.6 }]] })
  });

  const result = await service.runOnce(NOW);

  assert.equal(result.status, "no-alerts");
  assert.equal(result.summary, "No alerts generated");
  assert.equal(result.alerts, 0);
  assert.deepEqual(gateway.calls, []);
  assert.equal(ledger.completions.get("2026-10-19")?.note, NO_ALERTS_NOTE);
});

test("runOnce resends an import the gateway turned away with 503", async () => {
  const gateway = new FakeDeliveryGateway(
    [{ id: "1", name: "High temperature" }],
    [{ id: "10", name: "Porto Alegre" }]
  );
  gateway.importFailures = 1;
  const { service, logger } = createService({ gateway });

  const result = await service.runOnce(NOW);

  assert.equal(result.status, "delivered");
  assert.deepEqual(gateway.calls.slice(3), ["importAlerts", "importAlerts", "startAlertDispatch"]);
  const retryWarning = logger.entries.find((entry) => entry.message.endsWith("retrying"));
  assert.deepEqual(retryWarning, {
    level: "warn",
    message: "import alerts failed, retrying",
    context: { attempt: 1, attempts: 3, delayMs: 0, error: "gateway unavailable" }
  });
});

test("runOnce does not retry a rejected import", async () => {
  const gateway = new FakeDeliveryGateway(
    [{ id: "1", name: "High temperature" }],
    [{ id: "10", name: "Porto Alegre" }]
  );
  gateway.importFailures = 1;
  gateway.importFailure = { operation: "import alerts", status: 400 };
  const { service, ledger } = createService({ gateway });

  await assert.rejects(service.runOnce(NOW), /gateway unavailable/);

  assert.deepEqual(gateway.calls.slice(3), ["importAlerts"]);
  assert.equal(ledger.completions.size, 0);
});

test("runOnce never resends an import that timed out after the gateway stored it", async () => {
  const gateway = new FakeDeliveryGateway(
    [{ id: "1", name: "High temperature" }],
    [{ id: "10", name: "Porto Alegre" }]
  );
  gateway.importFailures = 1;
  gateway.storeBeforeFailing = true;
  gateway.importFailure = { operation: "import alerts", timedOut: true };
  const { service, ledger } = createService({ gateway });

  await assert.rejects(service.runOnce(NOW), /gateway unavailable/);

  assert.equal(gateway.imported.length, 1);
  assert.deepEqual(gateway.calls.slice(3), ["importAlerts"]);
  assert.equal(ledger.completions.size, 0);
});

test("runOnce does not resend an import answered with 409", async () => {
  const gateway = new FakeDeliveryGateway(
    [{ id: "1", name: "High temperature" }],
    [{ id: "10", name: "Porto Alegre" }]
  );
  gateway.importFailures = 1;
  gateway.importFailure = { operation: "import alerts", status: 409 };
  const { service } = createService({ gateway });

  await assert.rejects(service.runOnce(NOW), /gateway unavailable/);

  assert.deepEqual(gateway.calls.slice(3), ["importAlerts"]);
});

test("runOnce retries a dispatch start that timed out", async () => {
  const gateway = new FakeDeliveryGateway(
    [{ id: "1", name: "High temperature" }],
    [{ id: "10", name: "Porto Alegre" }]
  );
  gateway.dispatchFailures = 1;
  const { service, ledger } = createService({ gateway });

  const result = await service.runOnce(NOW);

  assert.equal(result.status, "delivered");
  assert.equal(gateway.imported.length, 1);
  assert.deepEqual(gateway.calls.slice(3), [
    "importAlerts",
    "startAlertDispatch",
    "startAlertDispatch"
  ]);
  assert.equal(ledger.completions.size, 1);
});

test("runOnce leaves the day unmarked when delivery fails", async () => {
  const gateway = new FakeDeliveryGateway([], []);
  gateway.loginError = new Error("login refused");
  const { service, ledger, logger } = createService({ gateway });

  await assert.rejects(service.runOnce(NOW), /login refused/);

  assert.equal(ledger.completions.size, 0);
  assert.deepEqual(logger.entries.at(-1), {
    level: "error",
    message: "alert run failed",
    context: { run_key: "2026-10-19", error: "login refused" }
  });
});
