/**
 * @file redisClient.ts
 * @description Redis connection (ioredis) backing the durable task store
 */

import { Redis } from "ioredis";
import { Logger } from "../utils/logger";

/**
 * @interface KeyValueClient
 * @description The subset of the Redis command set the task store relies on
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  quit(): Promise<unknown>;
}

/**
 * @function createRedisClient
 * @description Opens a client for the given URL and logs its connection events
 */
export function createRedisClient(url: string): KeyValueClient {
  const client = new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on("error", (err: Error) => {
    Logger.error(`Redis client error: ${err.message}`);
  });

  client.on("connect", () => {
    Logger.info("Redis connected");
  });

  return client;
}
