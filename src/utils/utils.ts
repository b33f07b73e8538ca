/**
 * @file utils.ts
 * @description General utility functions shared by the workflow engine
 */
import { CancellationToken } from "../core/cancellationToken";

/**
 * @function isRecord
 * @description Narrows an unknown value to a plain JSON object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * @async
 * @function sleep
 * @description Waits for the given delay. With a token, the wait ends early once it is cancelled.
 * @throws {TaskCancellationError} When the token is cancelled before or during the wait
 */
export async function sleep(
  ms: number,
  token?: CancellationToken
): Promise<void> {
  token?.throwIfCancelled();
  await new Promise<void>((resolve) => {
    const timer = setTimeout(() => {
      detach();
      resolve();
    }, ms);
    const detach = token
      ? token.onCancel(() => {
          clearTimeout(timer);
          resolve();
        })
      : () => undefined;
  });
  token?.throwIfCancelled();
}
