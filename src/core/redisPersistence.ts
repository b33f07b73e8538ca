/**
 * @file redisPersistence.ts
 * @description Task records stored as JSON strings under generation_task:<task_id>
 */

import { KeyValueClient } from "../clients/redisClient";
import { PersistedTaskRecord } from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { isPersistedTaskRecord, PersistenceAdapter } from "./persistenceAdapter";

export const REDIS_KEY_PREFIX = "generation_task:";

export class RedisPersistence implements PersistenceAdapter {
  public readonly kind = "redis";

  constructor(private readonly client: KeyValueClient) {}

  private key(taskId: string): string {
    return `${REDIS_KEY_PREFIX}${taskId}`;
  }

  private decode(key: string, raw: string | null): PersistedTaskRecord | null {
    if (raw === null) return null;
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isPersistedTaskRecord(parsed)) {
        return parsed;
      }
      Logger.warn(`Ignoring malformed task record at ${key}`);
    } catch (error) {
      Logger.warn(
        `Ignoring unreadable task record at ${key}: ${
          error instanceof Error ? error.message : "Unknown error"
        }`
      );
    }
    return null;
  }

  public async save(taskId: string, record: PersistedTaskRecord): Promise<void> {
    await this.client.set(this.key(taskId), JSON.stringify(record));
  }

  public async get(taskId: string): Promise<PersistedTaskRecord | null> {
    const key = this.key(taskId);
    return this.decode(key, await this.client.get(key));
  }

  public async list(): Promise<PersistedTaskRecord[]> {
    const keys = await this.client.keys(`${REDIS_KEY_PREFIX}*`);
    const records = await Promise.all(
      keys.map(async (key) => this.decode(key, await this.client.get(key)))
    );
    return records.filter(
      (record): record is PersistedTaskRecord => record !== null
    );
  }

  public async delete(taskId: string): Promise<boolean> {
    return (await this.client.del(this.key(taskId))) > 0;
  }

  public async close(): Promise<void> {
    await this.client.quit();
  }
}
