/**
 * @file errorHandler.test.ts
 * @description Tests for the ErrorHandler class
 */

import { describe, expect, it, jest } from "@jest/globals";
import express from "express";
import request from "supertest";
import { ErrorHandler } from "../../../src/core/errorHandler";
import {
  GenerationError,
  GenerationErrorCode,
} from "../../../src/errors/generationError";
import {
  CancellationRaceError,
  ExecutionFailureError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from "../../../src/errors/workflowError";

jest.mock("../../../src/utils/logger");

function appThrowing(error: unknown): express.Express {
  const app = express();
  app.get("/", (req, res) => ErrorHandler.handleHttpError(error, res));
  return app;
}

describe("ErrorHandler", () => {
  describe("describe", () => {
    it("should extract a message from anything thrown", () => {
      expect(ErrorHandler.describe(new Error("boom"))).toBe("boom");
      expect(ErrorHandler.describe("plain")).toBe("plain");
      expect(ErrorHandler.describe(42)).toBe("Unknown error");
    });
  });

  describe("toExecutionFailure", () => {
    it("should wrap what a worker raised with the unit id", () => {
      const failure = ErrorHandler.toExecutionFailure("j1", new Error("step broke"));

      expect(failure).toBeInstanceOf(ExecutionFailureError);
      expect(failure.reason).toBe("step broke");
      expect(failure.message).toBe("Execution of j1 failed: step broke");
      expect(failure.code).toBe("EXECUTION_FAILURE");
    });

    it("should pass an existing execution failure through", () => {
      const original = new ExecutionFailureError("t1", "engine down");

      expect(ErrorHandler.toExecutionFailure("t2", original)).toBe(original);
    });
  });

  describe("handleHttpError", () => {
    it("should answer 404 for an unknown id", async () => {
      const response = await request(appThrowing(new NotFoundError("Job", "j1"))).get("/");

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: "Job j1 not found", code: "NOT_FOUND" });
    });

    it("should answer 400 for a validation error", async () => {
      const response = await request(
        appThrowing(new ValidationError(["prompt is required", "variants must be an integer between 1 and 8"]))
      ).get("/");

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: "prompt is required; variants must be an integer between 1 and 8",
        code: "INVALID_REQUEST",
      });
    });

    it("should answer 400 for an invalid state", async () => {
      const response = await request(
        appThrowing(new InvalidStateError("Job is still running"))
      ).get("/");

      expect(response.status).toBe(400);
      expect(response.body.code).toBe("INVALID_STATE");
    });

    it("should answer 409 for a cancellation race", async () => {
      const response = await request(
        appThrowing(new CancellationRaceError("t1", "completed"))
      ).get("/");

      expect(response.status).toBe(409);
      expect(response.body.error).toBe(
        "Task t1 is already completed and can no longer be cancelled"
      );
    });

    it("should answer 502 for an engine error", async () => {
      const response = await request(
        appThrowing(new GenerationError(GenerationErrorCode.TIMEOUT, 408, "too slow"))
      ).get("/");

      expect(response.status).toBe(502);
      expect(response.body).toEqual({ error: "TIMEOUT: too slow", code: "TIMEOUT" });
    });

    it("should hide the details of unexpected errors", async () => {
      const response = await request(appThrowing(new Error("secret detail"))).get("/");

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ error: "Internal server error" });
    });
  });
});
