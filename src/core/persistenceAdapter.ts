/**
 * @file persistenceAdapter.ts
 * @description Durable storage of generation task records and backend selection
 */

import { EnvConfig } from "../config/env";
import { PersistedTaskRecord, UnitStatus } from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { isRecord } from "../utils/utils";
import { createRedisClient } from "../clients/redisClient";
import { FilePersistence } from "./filePersistence";
import { RedisPersistence } from "./redisPersistence";

export type PersistenceKind = "redis" | "file";

/**
 * @interface PersistenceAdapter
 * @description Key/value store of task records keyed by task_id
 */
export interface PersistenceAdapter {
  readonly kind: PersistenceKind;
  save(taskId: string, record: PersistedTaskRecord): Promise<void>;
  get(taskId: string): Promise<PersistedTaskRecord | null>;
  list(): Promise<PersistedTaskRecord[]>;
  delete(taskId: string): Promise<boolean>;
  close(): Promise<void>;
}

const STATUSES: string[] = Object.values(UnitStatus);

export function isUnitStatus(value: unknown): value is UnitStatus {
  return typeof value === "string" && STATUSES.includes(value);
}

/**
 * @function isPersistedTaskRecord
 * @description Validates a record read back from storage
 */
export function isPersistedTaskRecord(
  value: unknown
): value is PersistedTaskRecord {
  return (
    isRecord(value) &&
    typeof value.task_id === "string" &&
    isUnitStatus(value.status) &&
    isRecord(value.req) &&
    (value.error === null || typeof value.error === "string")
  );
}

/**
 * @function createPersistenceAdapter
 * @description Picks the backend once: Redis when REDIS_URL is set, else the local JSON file
 */
export function createPersistenceAdapter(
  config: Pick<EnvConfig, "REDIS_URL" | "DATA_FILE">
): PersistenceAdapter {
  if (config.REDIS_URL) {
    Logger.info("Task persistence: Redis");
    return new RedisPersistence(createRedisClient(config.REDIS_URL));
  }
  Logger.info(`Task persistence: file ${config.DATA_FILE}`);
  return new FilePersistence(config.DATA_FILE);
}
