import type { DeliveryGateway } from "../../connectors/delivery-gateway/types.js";
import type { MeteogramSource } from "../../connectors/meteogram-snapshot/types.js";
import type { RunLedger } from "../../infrastructure/redis/run-ledger.js";
import type { Logger } from "../../shared/logger.js";
import type { AlertScanEngine } from "../alert-engine/service.js";
import type { AlertStore } from "../alert-engine/types.js";
import type { AlertVocabularyMatcher, SkippedExport } from "../alert-export/types.js";

export type AlertRunStatus = "already-processed" | "no-alerts" | "delivered";

export interface AlertRunSummary {
  runKey: string;
  status: AlertRunStatus;
  cities: number;
  alerts: number;
  exported: number;
  skipped: SkippedExport[];
  /** Rendered report; empty when the run was skipped. */
  summary: string;
  store: AlertStore;
}

export interface AlertRunServiceOptions {
  source: MeteogramSource;
  engine: AlertScanEngine;
  gateway: DeliveryGateway;
  ledger: RunLedger;
  matcher?: AlertVocabularyMatcher;
  offsetSeconds?: number;
  maxDeliveryAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
}
