import Redis from "ioredis";
import { logger } from "../logger";

/** The handful of list commands the queue needs. */
export interface QueueClient {
  lpush(key: string, value: string): Promise<number>;
  /** Atomically pops the tail of `source` and pushes it onto the head of `destination`. */
  lmove(source: string, destination: string): Promise<string | null>;
  lrem(key: string, count: number, value: string): Promise<number>;
  quit(): Promise<unknown>;
}

export function createRedisQueueClient(redisUrl: string): QueueClient {
  const redis = new Redis(redisUrl, {
    // exponential back-off capped at 10 s
    retryStrategy: (times: number) => Math.min(times * 100, 10_000),
    enableReadyCheck: true,
    maxRetriesPerRequest: 3,
  });
  redis.on("error", (err) => {
    logger.error({ err }, "Redis client error");
  });
  redis.on("ready", () => {
    logger.info("Redis queue connection ready");
  });

  return {
    lpush: (key, value) => redis.lpush(key, value),
    lmove: (source, destination) => redis.lmove(source, destination, "RIGHT", "LEFT"),
    lrem: (key, count, value) => redis.lrem(key, count, value),
    quit: () => redis.quit(),
  };
}
