/**
 * @file filePersistence.ts
 * @description Task records kept in one local JSON object keyed by task_id
 */

import { promises as fs } from "fs";
import { PersistedTaskRecord } from "../interfaces/workflow";
import { atomicWrite } from "../utils/atomicWrite";
import { Logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";
import { isRecord } from "../utils/utils";
import { isPersistedTaskRecord, PersistenceAdapter } from "./persistenceAdapter";

type TaskTable = Map<string, PersistedTaskRecord>;

/**
 * @class FilePersistence
 * @description Every operation reads the whole table under one mutex; writes go
 * through a temp file and a rename
 */
export class FilePersistence implements PersistenceAdapter {
  public readonly kind = "file";
  private readonly lock = new Mutex();

  constructor(private readonly filePath: string) {}

  /**
   * @method readTable
   * @description Loads the table. A missing or corrupt file reads as empty.
   */
  private async readTable(): Promise<TaskTable> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        return new Map();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      Logger.warn(
        `Task file ${this.filePath} is not valid JSON, treating it as empty: ${
          error instanceof Error ? error.message : "Unknown error"
        }`
      );
      return new Map();
    }
    if (!isRecord(parsed)) {
      Logger.warn(`Task file ${this.filePath} is not an object, treating it as empty`);
      return new Map();
    }

    const table: TaskTable = new Map();
    for (const [taskId, record] of Object.entries(parsed)) {
      if (isPersistedTaskRecord(record)) {
        table.set(taskId, record);
      } else {
        Logger.warn(`Skipping malformed task record ${taskId}`);
      }
    }
    return table;
  }

  private async writeTable(table: TaskTable): Promise<void> {
    await atomicWrite(
      this.filePath,
      JSON.stringify(Object.fromEntries(table), null, 2)
    );
  }

  public async save(taskId: string, record: PersistedTaskRecord): Promise<void> {
    await this.lock.runExclusive(async () => {
      const table = await this.readTable();
      table.set(taskId, record);
      await this.writeTable(table);
    });
  }

  public async get(taskId: string): Promise<PersistedTaskRecord | null> {
    return this.lock.runExclusive(async () => {
      const table = await this.readTable();
      return table.get(taskId) ?? null;
    });
  }

  public async list(): Promise<PersistedTaskRecord[]> {
    return this.lock.runExclusive(async () =>
      Array.from((await this.readTable()).values())
    );
  }

  public async delete(taskId: string): Promise<boolean> {
    return this.lock.runExclusive(async () => {
      const table = await this.readTable();
      if (!table.delete(taskId)) {
        return false;
      }
      await this.writeTable(table);
      return true;
    });
  }

  public async close(): Promise<void> {
    await this.lock.runExclusive(() => undefined);
  }
}
