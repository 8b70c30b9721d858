import type { FastifyBaseLogger } from "fastify";
import { Redis } from "ioredis";

/**
 * With the offline queue off and a single retry, a Redis outage surfaces as
 * a fast error that the store guard resolves under the failure policy. The
 * caller connects explicitly before loading scripts.
 */
export function createRedisClient(url: string, logger: FastifyBaseLogger): Redis {
  const redis = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    enableAutoPipelining: true,
    lazyConnect: true
  });

  redis.on("error", (error: unknown) => {
    logger.error({ err: error }, "Redis client error");
  });

  return redis;
}
