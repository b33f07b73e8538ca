/**
 * @file env.ts
 * @description Environment configuration and validation
 */

import dotenv from "dotenv";

dotenv.config();

export interface EnvConfig {
  PORT: number;
  HOST: string;
  NODE_ENV: string;
  LOG_LEVEL: string;
  WORKER_POOL_SIZE: number;
  WORKFLOW_POOL_SIZE: number;
  MAX_JOBS: number;
  MAX_TASKS: number;
  JOB_LIST_LIMIT: number;
  KEEPALIVE_INTERVAL_MS: number;
  REDIS_URL: string;
  DATA_FILE: string;
  DEMO_MODE: boolean;
  GENERATION_API_URL: string;
  GENERATION_API_KEY: string;
  WORKFLOW_API_URL: string;
  CORS_ORIGINS: string[];
}

/**
 * @constant defaultConfig
 * @description Default configuration values
 */
export const defaultConfig: EnvConfig = {
  PORT: 8000,
  HOST: "localhost",
  NODE_ENV: "development",
  LOG_LEVEL: "info",
  WORKER_POOL_SIZE: 4,
  WORKFLOW_POOL_SIZE: 4,
  MAX_JOBS: 100,
  MAX_TASKS: 500,
  JOB_LIST_LIMIT: 20,
  KEEPALIVE_INTERVAL_MS: 30000, // 30 seconds
  REDIS_URL: "",
  DATA_FILE: ".data/generation_tasks.json",
  DEMO_MODE: false,
  GENERATION_API_URL: "",
  GENERATION_API_KEY: "",
  WORKFLOW_API_URL: "",
  CORS_ORIGINS: [
    "http://localhost:5173",
    "http://localhost:3000",
    "http://127.0.0.1:5173",
    "http://127.0.0.1:3000",
  ],
};

/**
 * @constant requiredEnvVars
 * @description Variables that must be set unless DEMO_MODE is enabled
 */
export const requiredEnvVars: (keyof EnvConfig)[] = [
  "GENERATION_API_URL",
  "WORKFLOW_API_URL",
];
