/**
 * @file cancellationToken.test.ts
 * @description Tests for cooperative cancellation
 */

import { describe, expect, it, jest } from "@jest/globals";
import {
  CancellationToken,
  CANCELLED_BY_USER,
} from "../../../src/core/cancellationToken";
import { TaskCancellationError } from "../../../src/errors/workflowError";

describe("CancellationToken", () => {
  it("should start uncancelled", () => {
    const token = new CancellationToken("t1");
    expect(token.isCancelled).toBe(false);
    expect(token.reason).toBeNull();
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it("should keep the first reason and report repeated cancels", () => {
    const token = new CancellationToken("t1");
    expect(token.cancel()).toBe(true);
    expect(token.cancel("shutdown")).toBe(false);
    expect(token.reason).toBe(CANCELLED_BY_USER);
  });

  it("should throw a TaskCancellationError at checkpoints once cancelled", () => {
    const token = new CancellationToken("t1");
    token.cancel();
    expect(() => token.throwIfCancelled()).toThrow(TaskCancellationError);
    expect(() => token.throwIfCancelled()).toThrow(
      "Task t1 was cancelled: cancelled by user"
    );
  });

  it("should notify listeners once", () => {
    const token = new CancellationToken("t1");
    const listener = jest.fn();
    token.onCancel(listener);

    token.cancel("stop");
    token.cancel("again");

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith("stop");
  });

  it("should not call a detached listener", () => {
    const token = new CancellationToken("t1");
    const listener = jest.fn();
    const detach = token.onCancel(listener);
    detach();
    token.cancel();
    expect(listener).not.toHaveBeenCalled();
  });

  it("should call a listener immediately when already cancelled", () => {
    const token = new CancellationToken("t1");
    token.cancel("late");
    const listener = jest.fn();
    token.onCancel(listener);
    expect(listener).toHaveBeenCalledWith("late");
  });
});
