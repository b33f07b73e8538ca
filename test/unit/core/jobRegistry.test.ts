/**
 * @file jobRegistry.test.ts
 * @description Tests for JobRegistry
 */

import { beforeEach, describe, expect, it, jest } from "@jest/globals";
import { JobRegistry, JobRunner } from "../../../src/core/jobRegistry";
import { advanceProgress, fail, succeed } from "../../../src/core/lifecycle";
import {
  InvalidStateError,
  NotFoundError,
} from "../../../src/errors/workflowError";
import { UnitStatus } from "../../../src/interfaces/workflow";
import { createBrief } from "../../mocks/fixtures";

jest.mock("../../../src/utils/logger");

describe("JobRegistry", () => {
  let registry: JobRegistry;

  beforeEach(() => {
    registry = new JobRegistry();
  });

  describe("create", () => {
    it("should insert a pending job with zero progress", () => {
      const brief = createBrief();
      const jobId = registry.create(brief);
      const job = registry.get(jobId);

      expect(job).toMatchObject({
        id: jobId,
        status: UnitStatus.PENDING,
        progress: 0,
        brief,
      });
      expect(job?.startedAt).toBeUndefined();
    });

    it("should hand out distinct ids to concurrent creates", async () => {
      const ids = await Promise.all(
        Array.from({ length: 25 }, async () => registry.create(createBrief()))
      );
      expect(new Set(ids).size).toBe(25);
      expect(registry.size).toBe(25);
    });
  });

  describe("list", () => {
    it("should return the newest jobs first", () => {
      const first = registry.create(createBrief({ brand_name: "A" }));
      const second = registry.create(createBrief({ brand_name: "B" }));

      expect(registry.list().map((job) => job.id)).toEqual([second, first]);
    });

    it("should honour the limit", () => {
      registry.create(createBrief());
      registry.create(createBrief());
      const newest = registry.create(createBrief());

      expect(registry.list(1).map((job) => job.id)).toEqual([newest]);
    });
  });

  describe("start", () => {
    it("should reject an unknown id", async () => {
      await expect(registry.start("missing", async () => undefined)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it("should run a job only once", async () => {
      const jobId = registry.create(createBrief());
      const runner = jest.fn<JobRunner>(async (job) => {
        succeed(job, { ok: true });
      });

      await Promise.all([registry.start(jobId, runner), registry.start(jobId, runner)]);
      await registry.start(jobId, runner);

      expect(runner).toHaveBeenCalledTimes(1);
      expect(registry.get(jobId)?.status).toBe(UnitStatus.COMPLETED);
    });

    it("should mark the job running before the runner is called", async () => {
      const jobId = registry.create(createBrief());
      const seen: UnitStatus[] = [];

      await registry.start(jobId, async (job) => {
        seen.push(job.status);
        succeed(job, {});
      });

      expect(seen).toEqual([UnitStatus.RUNNING]);
      expect(registry.get(jobId)?.startedAt).toBeInstanceOf(Date);
    });
  });

  describe("getResults", () => {
    it("should refuse a pending job", () => {
      const jobId = registry.create(createBrief());
      expect(() => registry.getResults(jobId)).toThrow(InvalidStateError);
      expect(() => registry.getResults(jobId)).toThrow("Job has not started yet");
    });

    it("should refuse a running job", async () => {
      const jobId = registry.create(createBrief());
      let message = "";
      await registry.start(jobId, async () => {
        try {
          registry.getResults(jobId);
        } catch (error) {
          message = error instanceof Error ? error.message : "";
        }
      });
      expect(message).toBe("Job is still running");
    });

    it("should report the failure of a failed job", async () => {
      const jobId = registry.create(createBrief());
      await registry.start(jobId, async (job) => fail(job, "boom"));

      expect(() => registry.getResults(jobId)).toThrow("Job failed: boom");
    });

    it("should return the results of a completed job", async () => {
      const jobId = registry.create(createBrief());
      await registry.start(jobId, async (job) => succeed(job, { brand_identity: "x" }));

      expect(registry.getResults(jobId)).toEqual({ brand_identity: "x" });
    });

    it("should reject an unknown id", () => {
      expect(() => registry.getResults("missing")).toThrow("Job missing not found");
    });
  });

  describe("retention", () => {
    it("should evict the oldest finished job once over capacity", async () => {
      registry = new JobRegistry(2);
      const evicted: string[] = [];
      registry.addEvictionListener((jobId) => evicted.push(jobId));

      const a = registry.create(createBrief());
      const b = registry.create(createBrief());
      const c = registry.create(createBrief());
      expect(registry.size).toBe(3);

      await registry.start(a, async (job) => succeed(job, {}));

      expect(evicted).toEqual([a]);
      expect(registry.has(a)).toBe(false);
      expect(registry.has(b)).toBe(true);
      expect(registry.has(c)).toBe(true);
    });

    it("should never evict pending or running jobs", async () => {
      registry = new JobRegistry(1);
      const running = registry.create(createBrief());
      let release: () => void = () => undefined;
      const started = registry.start(
        running,
        (job) =>
          new Promise<void>((resolve) => {
            release = () => {
              advanceProgress(job, 100);
              succeed(job, {});
              resolve();
            };
          })
      );
      const pending = registry.create(createBrief());

      expect(registry.has(running)).toBe(true);
      expect(registry.has(pending)).toBe(true);

      release();
      await started;
      expect(registry.has(running)).toBe(false);
      expect(registry.has(pending)).toBe(true);
    });

    it("should keep going when an eviction listener throws", async () => {
      registry = new JobRegistry(1);
      const after = jest.fn();
      registry.addEvictionListener(() => {
        throw new Error("listener broke");
      });
      registry.addEvictionListener(after);

      const jobId = registry.create(createBrief());
      await registry.start(jobId, async (job) => succeed(job, {}));
      registry.create(createBrief());

      expect(after).toHaveBeenCalledWith(jobId);
    });
  });
});
