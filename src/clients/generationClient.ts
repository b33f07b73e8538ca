/**
 * @file generationClient.ts
 * @description HTTP client for the remote generation service: submit, then poll until done
 */

import axios, { AxiosRequestConfig } from "axios";
import { CancellationToken } from "../core/cancellationToken";
import {
  GenerationError,
  GenerationErrorCode,
  toGenerationError,
} from "../errors/generationError";
import {
  GenerationContext,
  GenerationEngine,
  GenerationRequest,
} from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { isRecord, sleep } from "../utils/utils";

type RemoteStatus = "queued" | "processing" | "completed" | "failed";

interface RemoteGeneration {
  id: string;
  status: RemoteStatus;
  result?: unknown;
  error?: string;
}

const REMOTE_STATUSES: string[] = ["queued", "processing", "completed", "failed"];

function isRemoteGeneration(value: unknown): value is RemoteGeneration {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.status === "string" &&
    REMOTE_STATUSES.includes(value.status)
  );
}

export interface GenerationClientConfig {
  baseUrl: string;
  apiKey?: string;
  /** Delay between status polls in milliseconds */
  pollInterval?: number;
  /** Give up after this many milliseconds. Without it, only cancellation stops the polling. */
  timeout?: number;
}

/**
 * @class GenerationClient
 * @description GenerationEngine backed by GENERATION_API_URL. The cancellation
 * token is checked between polls and aborts any request in flight.
 */
export class GenerationClient implements GenerationEngine {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly pollInterval: number;
  private readonly timeout?: number;

  constructor(config: GenerationClientConfig) {
    if (!config.baseUrl) {
      throw new GenerationError(
        GenerationErrorCode.INVALID_REQUEST,
        400,
        "Generation API URL is required"
      );
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey || "";
    this.pollInterval = config.pollInterval ?? 3000;
    this.timeout = config.timeout;
  }

  /**
   * @private
   * @method getRequestConfig
   * @description Headers plus an abort signal tied to the token
   */
  private getRequestConfig(signal: AbortSignal): AxiosRequestConfig {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return { headers, signal };
  }

  private parseGeneration(data: unknown, action: string): RemoteGeneration {
    if (!isRemoteGeneration(data)) {
      throw new GenerationError(
        GenerationErrorCode.INVALID_RESPONSE,
        502,
        `Unexpected response during ${action}`
      );
    }
    return data;
  }

  /**
   * @method generate
   * @description Runs one generation request to completion
   * @throws {GenerationError} When the remote service fails, times out or answers garbage
   * @throws {TaskCancellationError} Once the token is cancelled
   */
  public async generate(
    request: GenerationRequest,
    context: GenerationContext
  ): Promise<unknown> {
    const { taskId, token } = context;
    const controller = new AbortController();
    const detach = token.onCancel(() => controller.abort());
    try {
      const submitted = await this.submit(request, controller.signal, token);
      Logger.debug(`Task ${taskId} submitted as remote generation ${submitted.id}`);
      return await this.waitForCompletion(submitted, controller.signal, token);
    } finally {
      detach();
    }
  }

  private async submit(
    request: GenerationRequest,
    signal: AbortSignal,
    token: CancellationToken
  ): Promise<RemoteGeneration> {
    try {
      const response = await axios.post<unknown>(
        `${this.baseUrl}/generations`,
        request,
        this.getRequestConfig(signal)
      );
      return this.parseGeneration(response.data, "generation submit");
    } catch (error) {
      token.throwIfCancelled();
      throw toGenerationError(error, "generation submit");
    }
  }

  /**
   * @method waitForCompletion
   * @description Polls the remote generation until it settles
   */
  private async waitForCompletion(
    submitted: RemoteGeneration,
    signal: AbortSignal,
    token: CancellationToken
  ): Promise<unknown> {
    const startTime = Date.now();
    let current = submitted;
    while (true) {
      if (current.status === "completed") {
        return current.result ?? null;
      }
      if (current.status === "failed") {
        throw new GenerationError(
          GenerationErrorCode.GENERATION_FAILED,
          500,
          current.error || `Remote generation ${current.id} failed`
        );
      }
      if (this.timeout !== undefined && Date.now() - startTime > this.timeout) {
        throw new GenerationError(
          GenerationErrorCode.TIMEOUT,
          408,
          `Generation timed out after ${this.timeout}ms`
        );
      }

      await sleep(this.pollInterval, token);
      try {
        const response = await axios.get<unknown>(
          `${this.baseUrl}/generations/${encodeURIComponent(current.id)}`,
          this.getRequestConfig(signal)
        );
        current = this.parseGeneration(response.data, "status check");
      } catch (error) {
        token.throwIfCancelled();
        throw toGenerationError(error, "status check");
      }
    }
  }
}
