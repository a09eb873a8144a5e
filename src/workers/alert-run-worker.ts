import { loadConfig } from "../config/env.js";
import { DeliveryGatewayClient } from "../connectors/delivery-gateway/client.js";
import { JsonFileMeteogramSource } from "../connectors/meteogram-snapshot/source.js";
import { loadPolygonRegistryFile } from "../connectors/polygon-registry/schema.js";
import { closeRedisClient, createConnectedRedisClient } from "../infrastructure/redis/client.js";
import { RedisRunLedger } from "../infrastructure/redis/run-ledger.js";
import { AlertScanEngine } from "../modules/alert-engine/service.js";
import { createDefaultVocabularyMatcher } from "../modules/alert-export/matcher.js";
import { AlertRunService } from "../modules/alert-run/service.js";
import { createConsoleLogger } from "../shared/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger("alert-run-worker");

  const registry = await loadPolygonRegistryFile(config.polygonRegistryPath);
  logger.info("polygon registry loaded", { polygons: registry.size });

  const redis = await createConnectedRedisClient({
    url: config.redisUrl,
    clientName: "meteogram-alert-run-worker",
    logger
  });

  try {
    const service = new AlertRunService({
      source: new JsonFileMeteogramSource(config.meteogramSnapshotPath),
      engine: new AlertScanEngine({
        registry,
        thresholds: {
          minHumidityPct: config.alertHumidityMinThreshold,
          maxWindSpeedSquared: config.alertWindMaxThreshold,
          maxRainMmPerHour: config.alertRainMaxThreshold
        },
        heavyRainEnabled: config.alertHeavyRainEnabled,
        logger
      }),
      gateway: new DeliveryGatewayClient({
        baseUrl: config.deliveryGatewayBaseUrl,
        dispatchBaseUrl: config.deliveryDispatchBaseUrl,
        email: config.deliveryGatewayEmail,
        password: config.deliveryGatewayPassword,
        requestTimeoutMs: config.deliveryGatewayTimeoutMs
      }),
      ledger: new RedisRunLedger(redis, config.runLedgerTtlSeconds),
      matcher: createDefaultVocabularyMatcher(config.alertEventLabels),
      offsetSeconds: config.alertLocalUtcOffsetSeconds,
      maxDeliveryAttempts: config.deliveryMaxAttempts,
      retryDelayMs: config.deliveryRetryBaseDelayMs,
      logger
    });

    const result = await service.runOnce();
    if (result.summary) {
      console.log(result.summary);
    }
    console.log("Run summary:", {
      runKey: result.runKey,
      status: result.status,
      cities: result.cities,
      alerts: result.alerts,
      exported: result.exported,
      skipped: result.skipped.length
    });
  } finally {
    await closeRedisClient(redis, logger);
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
