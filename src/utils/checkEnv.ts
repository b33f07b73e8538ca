/**
 * @file checkEnv.ts
 * @description Environment validation utilities
 */

import { EnvConfig, defaultConfig, requiredEnvVars } from "../config/env";
import { Logger } from "./logger";

/**
 * @function parsePositiveInt
 * @description Parses a positive integer variable, falling back to the default when unset
 */
function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: keyof EnvConfig,
  fallback: number,
  invalid: string[]
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    invalid.push(`${name}=${raw}`);
    return fallback;
  }
  return value;
}

function parseList(raw: string | undefined, fallback: string[]): string[] {
  if (!raw) return fallback;
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * @function validateEnv
 * @description Validates environment variables and returns a complete config
 * @throws {Error} If required variables are missing or numeric variables are malformed
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const demoMode = env.DEMO_MODE === "true";

  if (!demoMode) {
    const missingVars = requiredEnvVars.filter((varName) => !env[varName]);
    if (missingVars.length > 0) {
      const errorMessage = `Missing required environment variables: ${missingVars.join(
        ", "
      )} (set DEMO_MODE=true to run without external engines)`;
      Logger.error(errorMessage);
      throw new Error(errorMessage);
    }
  }

  const invalid: string[] = [];
  const config: EnvConfig = {
    PORT: parsePositiveInt(env, "PORT", defaultConfig.PORT, invalid),
    HOST: env.HOST || defaultConfig.HOST,
    NODE_ENV: env.NODE_ENV || defaultConfig.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL || defaultConfig.LOG_LEVEL,
    WORKER_POOL_SIZE: parsePositiveInt(
      env,
      "WORKER_POOL_SIZE",
      defaultConfig.WORKER_POOL_SIZE,
      invalid
    ),
    WORKFLOW_POOL_SIZE: parsePositiveInt(
      env,
      "WORKFLOW_POOL_SIZE",
      defaultConfig.WORKFLOW_POOL_SIZE,
      invalid
    ),
    MAX_JOBS: parsePositiveInt(env, "MAX_JOBS", defaultConfig.MAX_JOBS, invalid),
    MAX_TASKS: parsePositiveInt(
      env,
      "MAX_TASKS",
      defaultConfig.MAX_TASKS,
      invalid
    ),
    JOB_LIST_LIMIT: parsePositiveInt(
      env,
      "JOB_LIST_LIMIT",
      defaultConfig.JOB_LIST_LIMIT,
      invalid
    ),
    KEEPALIVE_INTERVAL_MS: parsePositiveInt(
      env,
      "KEEPALIVE_INTERVAL_MS",
      defaultConfig.KEEPALIVE_INTERVAL_MS,
      invalid
    ),
    REDIS_URL: env.REDIS_URL || defaultConfig.REDIS_URL,
    DATA_FILE: env.DATA_FILE || defaultConfig.DATA_FILE,
    DEMO_MODE: demoMode,
    GENERATION_API_URL: env.GENERATION_API_URL || defaultConfig.GENERATION_API_URL,
    GENERATION_API_KEY: env.GENERATION_API_KEY || defaultConfig.GENERATION_API_KEY,
    WORKFLOW_API_URL: env.WORKFLOW_API_URL || defaultConfig.WORKFLOW_API_URL,
    CORS_ORIGINS: parseList(env.CORS_ORIGINS, defaultConfig.CORS_ORIGINS),
  };

  if (invalid.length > 0) {
    const errorMessage = `Invalid numeric environment variables: ${invalid.join(
      ", "
    )}`;
    Logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  Logger.debug("Environment configuration:", config);
  return config;
}

/**
 * @function getEnvConfig
 * @description Gets the validated environment configuration
 */
export function getEnvConfig(): EnvConfig {
  return validateEnv();
}
