import { isObjectRecord } from "../../shared/payload.js";
import type { AppRedisClient } from "./client.js";

export interface RunCompletion {
  completed_at_utc: string;
  note: string | undefined;
}

/** Remembers which run keys (local calendar dates) have already been processed. */
export interface RunLedger {
  findCompletion(runKey: string): Promise<RunCompletion | undefined>;
  markCompleted(runKey: string, note?: string): Promise<void>;
}

function completionKey(runKey: string): string {
  if (!runKey || runKey.trim() === "") {
    throw new Error("Run key must be non-empty");
  }
  return `alert-run:completed:${runKey}`;
}

function parseCompletion(raw: string): RunCompletion {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { completed_at_utc: raw, note: undefined };
  }
  if (!isObjectRecord(parsed)) {
    return { completed_at_utc: raw, note: undefined };
  }

  return {
    completed_at_utc:
      typeof parsed.completed_at_utc === "string" ? parsed.completed_at_utc : raw,
    note: typeof parsed.note === "string" ? parsed.note : undefined
  };
}

/**
 * Key pattern: alert-run:completed:{runKey}
 * Value: JSON { completed_at_utc, note }, expiring after ttlSeconds.
 */
export class RedisRunLedger implements RunLedger {
  constructor(
    private readonly redis: AppRedisClient,
    private readonly ttlSeconds: number
  ) {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error("RedisRunLedger ttlSeconds must be a positive integer");
    }
  }

  async findCompletion(runKey: string): Promise<RunCompletion | undefined> {
    const raw = await this.redis.get(completionKey(runKey));
    if (raw == null) {
      return undefined;
    }
    return parseCompletion(raw);
  }

  async markCompleted(runKey: string, note?: string): Promise<void> {
    const completion: RunCompletion = {
      completed_at_utc: new Date().toISOString(),
      note
    };
    await this.redis.set(completionKey(runKey), JSON.stringify(completion), {
      EX: this.ttlSeconds
    });
  }
}
