/**
 * @file generationExecutor.test.ts
 * @description Tests for background generation tasks
 */

import { beforeEach, describe, expect, it, jest } from "@jest/globals";
import { GenerationExecutor } from "../../../src/core/generationExecutor";
import { PersistenceAdapter } from "../../../src/core/persistenceAdapter";
import { RedisPersistence } from "../../../src/core/redisPersistence";
import { WorkerPool } from "../../../src/core/workerPool";
import { InvalidStateError } from "../../../src/errors/workflowError";
import { PersistedTaskRecord, UnitStatus } from "../../../src/interfaces/workflow";
import { Logger } from "../../../src/utils/logger";
import { GatedGenerationEngine, StubGenerationEngine } from "../../mocks/engines";
import { waitFor } from "../../mocks/fixtures";
import { MemoryKeyValueClient } from "../../mocks/memoryKeyValue";

jest.mock("../../../src/utils/logger");

/**
 * Store whose every call fails, as when the Redis server is unreachable
 */
class UnavailablePersistence implements PersistenceAdapter {
  public readonly kind = "redis";

  public async save(): Promise<void> {
    throw new Error("store unavailable");
  }

  public async get(): Promise<PersistedTaskRecord | null> {
    throw new Error("store unavailable");
  }

  public async list(): Promise<PersistedTaskRecord[]> {
    throw new Error("store unavailable");
  }

  public async delete(): Promise<boolean> {
    throw new Error("store unavailable");
  }

  public async close(): Promise<void> {
    return undefined;
  }
}

/**
 * Redis-backed store that loses the write of a completed task a given number of times
 */
class LostCompletionPersistence extends RedisPersistence {
  constructor(client: MemoryKeyValueClient, private failures: number) {
    super(client);
  }

  public async save(taskId: string, record: PersistedTaskRecord): Promise<void> {
    if (record.status === UnitStatus.COMPLETED && this.failures > 0) {
      this.failures--;
      throw new Error("write lost");
    }
    await super.save(taskId, record);
  }
}

describe("GenerationExecutor", () => {
  let client: MemoryKeyValueClient;
  let persistence: RedisPersistence;
  let pool: WorkerPool;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new MemoryKeyValueClient();
    persistence = new RedisPersistence(client);
    pool = new WorkerPool("generation", { maxConcurrent: 1 });
  });

  describe("submit", () => {
    it("should report pending first and the engine result once done", async () => {
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);

      const submitted = await executor.submit({ name: "Acme" }, "t1");
      expect(submitted).toEqual({ task_id: "t1", status: UnitStatus.PENDING });
      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.PENDING,
      });

      await executor.whenIdle();

      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.COMPLETED,
        result: { ok: true },
      });
      expect(await persistence.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.COMPLETED,
        req: { name: "Acme" },
        result: { ok: true },
        error: null,
      });
    });

    it("should generate an id when none is given", async () => {
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);

      const first = await executor.submit({});
      const second = await executor.submit({});

      expect(first.task_id).not.toBe(second.task_id);
      await executor.whenIdle();
    });

    it("should answer pending and queue nothing when cancelled during submission", async () => {
      const engine = new StubGenerationEngine();
      const executor = new GenerationExecutor(engine, persistence, pool);

      const submitting = executor.submit({ name: "Acme" }, "t2");
      expect(await executor.cancel("t2")).toBe(true);

      expect(await submitting).toEqual({ task_id: "t2", status: UnitStatus.PENDING });
      await executor.whenIdle();
      expect(engine.calls).toEqual([]);
      expect(pool.getQueueStatus().completedTasks).toBe(0);
      expect(await executor.get("t2")).toEqual({
        task_id: "t2",
        status: UnitStatus.FAILED,
        error: "cancelled by user",
      });
    });

    it("should reject an id that is already in use", async () => {
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);
      await executor.submit({}, "t1");

      await expect(executor.submit({}, "t1")).rejects.toBeInstanceOf(InvalidStateError);
      await executor.whenIdle();
    });

    it("should record an engine failure as the task error", async () => {
      const executor = new GenerationExecutor(
        new StubGenerationEngine(null, "render failed"),
        persistence,
        pool
      );

      await executor.submit({ prompt: "fox" }, "t1");
      await executor.whenIdle();

      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.FAILED,
        error: "render failed",
      });
    });
  });

  describe("cancel", () => {
    it("should never run a task cancelled while queued", async () => {
      const engine = new GatedGenerationEngine();
      const executor = new GenerationExecutor(engine, persistence, pool);
      await executor.submit({}, "first");
      await executor.submit({}, "second");

      expect(await executor.cancel("second")).toBe(true);
      expect(await executor.get("second")).toEqual({
        task_id: "second",
        status: UnitStatus.FAILED,
        error: "cancelled by user",
      });

      await waitFor(() => engine.calls.length === 1);
      engine.release();
      await executor.whenIdle();

      expect(engine.calls).toEqual(["first"]);
      expect((await executor.get("first"))?.status).toBe(UnitStatus.COMPLETED);
      expect((await executor.get("second"))?.status).toBe(UnitStatus.FAILED);
    });

    it("should fail a running task at once and never complete it", async () => {
      const engine = new GatedGenerationEngine();
      const executor = new GenerationExecutor(engine, persistence, pool);
      await executor.submit({}, "t1");
      await waitFor(() => engine.calls.length === 1);

      expect(await executor.cancel("t1")).toBe(true);
      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.FAILED,
        error: "cancelled by user",
      });

      await executor.whenIdle();
      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.FAILED,
        error: "cancelled by user",
      });
    });

    it("should not cancel a finished task", async () => {
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);
      await executor.submit({}, "t1");
      await executor.whenIdle();

      expect(await executor.cancel("t1")).toBe(false);
      expect((await executor.get("t1"))?.status).toBe(UnitStatus.COMPLETED);
      expect(Logger.warn).toHaveBeenCalledWith(
        "Task t1 is already completed and can no longer be cancelled"
      );
    });

    it("should return false for an unknown task", async () => {
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);
      expect(await executor.cancel("missing")).toBe(false);
    });

    it("should mark a task known only to the store as failed", async () => {
      await persistence.save("remote", {
        task_id: "remote",
        status: UnitStatus.RUNNING,
        req: { prompt: "fox" },
        result: null,
        error: null,
      });
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);

      expect(await executor.cancel("remote", "shutdown")).toBe(true);
      expect(await persistence.get("remote")).toEqual({
        task_id: "remote",
        status: UnitStatus.FAILED,
        req: { prompt: "fox" },
        result: null,
        error: "shutdown",
      });
    });
  });

  describe("list and delete", () => {
    it("should merge memory with the store, preferring stored records", async () => {
      await persistence.save("remote", {
        task_id: "remote",
        status: UnitStatus.COMPLETED,
        req: {},
        result: "stored",
        error: null,
      });
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);
      await executor.submit({}, "local");
      await executor.whenIdle();

      const views = await executor.list();
      const byId = new Map(views.map((view) => [view.task_id, view]));

      expect(views).toHaveLength(2);
      expect(byId.get("remote")).toEqual({
        task_id: "remote",
        status: UnitStatus.COMPLETED,
        result: "stored",
      });
      expect(byId.get("local")?.status).toBe(UnitStatus.COMPLETED);
    });

    it("should forget a deleted task everywhere", async () => {
      const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);
      await executor.submit({}, "t1");
      await executor.whenIdle();

      expect(await executor.delete("t1")).toBe(true);
      expect(await executor.get("t1")).toBeNull();
      expect(client.data.has("generation_task:t1")).toBe(false);
      expect(await executor.delete("t1")).toBe(false);
    });

    it("should stop a running task that is deleted without writing it back", async () => {
      const engine = new GatedGenerationEngine();
      const executor = new GenerationExecutor(engine, persistence, pool);
      await executor.submit({}, "t1");
      await waitFor(() => engine.calls.length === 1);

      expect(await executor.delete("t1")).toBe(true);
      await executor.whenIdle();

      expect(await executor.get("t1")).toBeNull();
      expect(client.data.size).toBe(0);
    });
  });

  describe("retention", () => {
    it("should keep only maxTasks finished tasks in memory", async () => {
      const executor = new GenerationExecutor(
        new StubGenerationEngine(),
        persistence,
        pool,
        2
      );
      await executor.submit({}, "a");
      await executor.submit({}, "b");
      await executor.submit({}, "c");
      await executor.whenIdle();

      expect(executor.trackedCount).toBe(2);
      expect(await executor.get("a")).toEqual({
        task_id: "a",
        status: UnitStatus.COMPLETED,
        result: { ok: true },
      });
    });
  });

  describe("persistence failures", () => {
    it("should serve the completed task from memory while its final write is missing", async () => {
      const store = new LostCompletionPersistence(client, Number.POSITIVE_INFINITY);
      const executor = new GenerationExecutor(new StubGenerationEngine(), store, pool, 1);

      await executor.submit({ name: "Acme" }, "t1");
      await executor.whenIdle();
      await executor.submit({}, "t2");
      await executor.whenIdle();

      const completed = { task_id: "t1", status: UnitStatus.COMPLETED, result: { ok: true } };
      expect((await store.get("t1"))?.status).toBe(UnitStatus.RUNNING);
      expect(executor.trackedCount).toBe(2);
      expect(await executor.get("t1")).toEqual(completed);
      expect(await executor.list()).toEqual([
        completed,
        { task_id: "t2", status: UnitStatus.COMPLETED, result: { ok: true } },
      ]);
    });

    it("should write the final state again on the next read", async () => {
      const store = new LostCompletionPersistence(client, 1);
      const executor = new GenerationExecutor(new StubGenerationEngine(), store, pool);

      await executor.submit({ name: "Acme" }, "t1");
      await executor.whenIdle();
      expect((await store.get("t1"))?.status).toBe(UnitStatus.RUNNING);

      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.COMPLETED,
        result: { ok: true },
      });
      expect(await store.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.COMPLETED,
        req: { name: "Acme" },
        result: { ok: true },
        error: null,
      });
    });

    it("should keep serving tasks from memory", async () => {
      const executor = new GenerationExecutor(
        new StubGenerationEngine(),
        new UnavailablePersistence(),
        pool
      );

      await executor.submit({}, "t1");
      await executor.whenIdle();

      expect(await executor.get("t1")).toEqual({
        task_id: "t1",
        status: UnitStatus.COMPLETED,
        result: { ok: true },
      });
      expect(await executor.list()).toHaveLength(1);
      expect(Logger.error).toHaveBeenCalled();
    });
  });

  it("should expose the pool status", async () => {
    const executor = new GenerationExecutor(new StubGenerationEngine(), persistence, pool);
    await executor.submit({}, "t1");
    await executor.whenIdle();

    expect(executor.getQueueStatus()).toMatchObject({
      maxConcurrent: 1,
      completedTasks: 1,
      queuedTasks: 0,
    });
  });
});
