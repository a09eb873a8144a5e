import { createClient } from "redis";

import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";

export interface RedisClientOptions {
  url: string;
  clientName?: string;
  logger?: Logger;
}

export type AppRedisClient = ReturnType<typeof createClient>;

export async function createConnectedRedisClient(
  options: RedisClientOptions
): Promise<AppRedisClient> {
  const logger = options.logger ?? createNoopLogger();
  const clientOptions: Parameters<typeof createClient>[0] = {
    url: options.url,
    socket: {
      reconnectStrategy(retries: number) {
        return Math.min(retries * 100, 2_000);
      }
    }
  };
  if (options.clientName) {
    clientOptions.name = options.clientName;
  }

  const client = createClient(clientOptions);
  client.on("error", (error: unknown) => {
    logger.warn("redis client error", { error: errorMessage(error) });
  });

  await client.connect();
  const pong = await client.ping();
  if (pong !== "PONG") {
    await client.quit();
    throw new Error("Redis ping failed during startup");
  }

  logger.info("redis connected", { client_name: options.clientName });
  return client;
}

/** Quits gracefully; falls back to a hard disconnect when QUIT fails. */
export async function closeRedisClient(
  client: AppRedisClient,
  logger: Logger = createNoopLogger()
): Promise<void> {
  try {
    await client.quit();
  } catch (error) {
    logger.warn("redis quit failed, forcing disconnect", { error: errorMessage(error) });
    await client.disconnect();
  }
}
