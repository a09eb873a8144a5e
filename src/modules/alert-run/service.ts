import {
  isRetryableDeliveryError,
  isUnsentImportError
} from "../../connectors/delivery-gateway/errors.js";
import type { DeliveryGateway } from "../../connectors/delivery-gateway/types.js";
import type { MeteogramSource } from "../../connectors/meteogram-snapshot/types.js";
import type { RunLedger } from "../../infrastructure/redis/run-ledger.js";
import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import { retryWithPolicy, type RetryAttempt, type RetryPolicy } from "../../shared/retry.js";
import { countAlerts } from "../alert-engine/aggregator.js";
import { DEFAULT_LOCAL_UTC_OFFSET_SECONDS } from "../alert-engine/constants.js";
import { localIsoDate } from "../alert-engine/conversions.js";
import type { AlertScanEngine } from "../alert-engine/service.js";
import { buildAlertExport } from "../alert-export/export.js";
import { createDefaultVocabularyMatcher } from "../alert-export/matcher.js";
import { renderAlertSummary } from "../alert-export/summary.js";
import type { AlertVocabularyMatcher } from "../alert-export/types.js";
import type { AlertRunServiceOptions, AlertRunSummary } from "./types.js";

export const NO_ALERTS_NOTE = "no alerts generated";

/**
 * One daily pass: scan the meteogram, report, deliver the export and mark the
 * local calendar day as processed. A failed run leaves the day unmarked.
 */
export class AlertRunService {
  private readonly source: MeteogramSource;
  private readonly engine: AlertScanEngine;
  private readonly gateway: DeliveryGateway;
  private readonly ledger: RunLedger;
  private readonly matcher: AlertVocabularyMatcher;
  private readonly offsetSeconds: number;
  private readonly importPolicy: RetryPolicy;
  private readonly dispatchPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor({
    source,
    engine,
    gateway,
    ledger,
    matcher = createDefaultVocabularyMatcher(),
    offsetSeconds = DEFAULT_LOCAL_UTC_OFFSET_SECONDS,
    maxDeliveryAttempts = 3,
    retryDelayMs = 200,
    logger = createNoopLogger()
  }: AlertRunServiceOptions) {
    this.source = source;
    this.engine = engine;
    this.gateway = gateway;
    this.ledger = ledger;
    this.matcher = matcher;
    this.offsetSeconds = offsetSeconds;
    this.importPolicy = {
      attempts: maxDeliveryAttempts,
      baseDelayMs: retryDelayMs,
      isRetryable: isUnsentImportError
    };
    this.dispatchPolicy = {
      attempts: maxDeliveryAttempts,
      baseDelayMs: retryDelayMs,
      isRetryable: isRetryableDeliveryError
    };
    this.logger = logger;
  }

  async runOnce(now: Date = new Date()): Promise<AlertRunSummary> {
    const runKey = localIsoDate(now, this.offsetSeconds);

    try {
      return await this.execute(runKey, now);
    } catch (error) {
      this.logger.error("alert run failed", {
        run_key: runKey,
        error: errorMessage(error)
      });
      throw error;
    }
  }

  private async execute(runKey: string, now: Date): Promise<AlertRunSummary> {
    const completion = await this.ledger.findCompletion(runKey);
    if (completion) {
      this.logger.info("run already processed, skipping", {
        run_key: runKey,
        completed_at_utc: completion.completed_at_utc
      });
      return {
        runKey,
        status: "already-processed",
        cities: 0,
        alerts: 0,
        exported: 0,
        skipped: [],
        summary: "",
        store: new Map()
      };
    }

    const series = await this.source.load();
    this.logger.info("meteogram loaded", { run_key: runKey, polygons: series.size });

    const store = this.engine.run(series);
    const summary = renderAlertSummary(store, {
      referenceDate: runKey,
      offsetSeconds: this.offsetSeconds
    });
    const alerts = countAlerts(store);

    if (alerts === 0) {
      await this.ledger.markCompleted(runKey, NO_ALERTS_NOTE);
      this.logger.info("no alerts generated, run marked complete", { run_key: runKey });
      return {
        runKey,
        status: "no-alerts",
        cities: 0,
        alerts: 0,
        exported: 0,
        skipped: [],
        summary,
        store
      };
    }

    await this.gateway.login();
    const [events, cities] = await Promise.all([
      this.gateway.fetchEvents(),
      this.gateway.fetchCities()
    ]);

    const { records, skipped } = buildAlertExport(store, {
      events,
      cities,
      matcher: this.matcher,
      now,
      offsetSeconds: this.offsetSeconds,
      logger: this.logger
    });

    await retryWithPolicy(
      "import alerts",
      () => this.gateway.importAlerts(records),
      this.importPolicy,
      this.logRetry
    );
    await retryWithPolicy(
      "start alert dispatch",
      () => this.gateway.startAlertDispatch(),
      this.dispatchPolicy,
      this.logRetry
    );
    await this.ledger.markCompleted(runKey);

    this.logger.info("alerts delivered", {
      run_key: runKey,
      cities: store.size,
      alerts,
      exported: records.length,
      skipped: skipped.length
    });

    return {
      runKey,
      status: "delivered",
      cities: store.size,
      alerts,
      exported: records.length,
      skipped,
      summary,
      store
    };
  }

  private readonly logRetry = ({ operation, attempt, attempts, delayMs, error }: RetryAttempt) => {
    this.logger.warn(`${operation} failed, retrying`, {
      attempt,
      attempts,
      delayMs,
      error: errorMessage(error)
    });
  };
}
