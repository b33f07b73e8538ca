/**
 * @file fixtures.ts
 * @description Shared test data and async helpers
 */

import { defaultConfig, EnvConfig } from "../../src/config/env";
import {
  BrandBrief,
  BrandMood,
  StylePreference,
} from "../../src/interfaces/workflow";

export function createTestConfig(overrides: Partial<EnvConfig> = {}): EnvConfig {
  return {
    ...defaultConfig,
    NODE_ENV: "test",
    DEMO_MODE: true,
    DATA_FILE: "unused.json",
    ...overrides,
  };
}

export function createBrief(overrides: Partial<BrandBrief> = {}): BrandBrief {
  return {
    brand_name: "Acme",
    industry: "Software",
    target_audience: "Developers",
    brand_values: [],
    style_preference: StylePreference.MODERN,
    desired_mood: BrandMood.INNOVATIVE,
    brand_voice: "",
    mission: "",
    vision: "",
    competitors: [],
    unique_selling_proposition: "",
    marketing_goals: [],
    budget_considerations: "",
    timeline: "",
    ...overrides,
  };
}

/**
 * @function flushAsync
 * @description Lets pending immediates (pool dispatch) and microtasks run
 */
export function flushAsync(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/**
 * @function waitFor
 * @description Polls the predicate until it holds
 * @throws {Error} When it still does not hold after the given number of attempts
 */
export async function waitFor(
  predicate: () => boolean,
  attempts: number = 200
): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    if (predicate()) return;
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
  throw new Error("Condition not met in time");
}

export interface SseFrame {
  event: string;
  data: unknown;
}

/**
 * @function parseFrames
 * @description Splits an SSE body into its "event:" / "data:" frames
 */
export function parseFrames(text: string): SseFrame[] {
  return text
    .split("\n\n")
    .filter((frame) => frame.length > 0)
    .map((frame) => {
      const [eventLine, dataLine] = frame.split("\n");
      const data: unknown = JSON.parse(dataLine.replace("data: ", ""));
      return { event: eventLine.replace("event: ", ""), data };
    });
}
