/**
 * @file workflowClient.ts
 * @description HTTP client for the remote brand identity and marketing steps
 */

import axios from "axios";
import {
  GenerationError,
  GenerationErrorCode,
  toGenerationError,
} from "../errors/generationError";
import {
  BrandBrief,
  JobStartParams,
  WorkflowEngine,
} from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { isRecord } from "../utils/utils";

export interface WorkflowClientConfig {
  baseUrl: string;
  apiKey?: string;
  /** Request timeout in milliseconds; none by default */
  timeout?: number;
}

/**
 * @class WorkflowClient
 * @description WorkflowEngine backed by WORKFLOW_API_URL
 */
export class WorkflowClient implements WorkflowEngine {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeout?: number;

  constructor(config: WorkflowClientConfig) {
    if (!config.baseUrl) {
      throw new GenerationError(
        GenerationErrorCode.INVALID_REQUEST,
        400,
        "Workflow API URL is required"
      );
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey || "";
    this.timeout = config.timeout;
  }

  private getRequestHeaders() {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    // axios treats 0 as no timeout
    return { headers, timeout: this.timeout ?? 0 };
  }

  private async post(
    path: string,
    payload: Record<string, unknown>,
    action: string
  ): Promise<Record<string, unknown>> {
    try {
      Logger.debug(`Calling workflow step ${path}`);
      const response = await axios.post<unknown>(
        `${this.baseUrl}${path}`,
        payload,
        this.getRequestHeaders()
      );
      if (!isRecord(response.data)) {
        throw new GenerationError(
          GenerationErrorCode.INVALID_RESPONSE,
          502,
          `Unexpected response during ${action}`
        );
      }
      return response.data;
    } catch (error) {
      throw toGenerationError(error, action);
    }
  }

  /**
   * @method runBrandIdentity
   * @description Logo concepts, color palette and style guide for the brief
   */
  public runBrandIdentity(
    brief: BrandBrief,
    params: JobStartParams
  ): Promise<Record<string, unknown>> {
    return this.post(
      "/brand-identity",
      { brand_brief: brief, model: params.model ?? null },
      "brand identity creation"
    );
  }

  /**
   * @method runMarketing
   * @description Social media, email and video content built on the style guide
   */
  public runMarketing(
    brief: BrandBrief,
    styleGuide: Record<string, unknown>,
    params: JobStartParams
  ): Promise<Record<string, unknown>> {
    return this.post(
      "/marketing",
      { brand_brief: brief, style_guide: styleGuide, model: params.model ?? null },
      "marketing campaign development"
    );
  }
}
