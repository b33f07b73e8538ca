/**
 * @file artisticLogo.ts
 * @description Artistic logo generation requests
 */

import { ValidationError } from "../errors/workflowError";
import { isRecord } from "../utils/utils";

export const MAX_LOGO_VARIANTS = 8;

/**
 * @interface ArtisticLogoRequest
 * @description Parameters of one logo generation task
 */
export interface ArtisticLogoRequest {
  brand_name: string;
  prompt: string;
  style: string;
  variants: number;
  resolution: string;
  model?: string;
  [key: string]: unknown;
}

export interface LogoVariant {
  file_path: string;
  model: string | null;
  prompt: string;
  style: string;
  resolution: string;
}

export interface ArtisticLogoResult {
  brand: string;
  variants: LogoVariant[];
}

const RESOLUTION_PATTERN = /^[1-9]\d{1,4}x[1-9]\d{1,4}$/;

/**
 * @function parseArtisticLogoRequest
 * @description Validates a submission body and applies defaults
 * @throws {ValidationError} Listing every problem found
 */
export function parseArtisticLogoRequest(body: unknown): ArtisticLogoRequest {
  if (!isRecord(body)) {
    throw new ValidationError(["Request body must be a JSON object"]);
  }
  const issues: string[] = [];

  const brandName = body.brand_name;
  if (typeof brandName !== "string" || brandName.trim() === "") {
    issues.push("brand_name is required");
  }
  const prompt = body.prompt;
  if (typeof prompt !== "string") {
    issues.push("prompt is required");
  }

  let style = "vector";
  if (body.style !== undefined) {
    if (typeof body.style === "string" && body.style.trim() !== "") {
      style = body.style;
    } else {
      issues.push("style must be a non-empty string");
    }
  }

  let variants = 1;
  if (body.variants !== undefined) {
    const value = body.variants;
    if (
      typeof value === "number" &&
      Number.isInteger(value) &&
      value >= 1 &&
      value <= MAX_LOGO_VARIANTS
    ) {
      variants = value;
    } else {
      issues.push(`variants must be an integer between 1 and ${MAX_LOGO_VARIANTS}`);
    }
  }

  let resolution = "512x512";
  if (body.resolution !== undefined) {
    if (typeof body.resolution === "string" && RESOLUTION_PATTERN.test(body.resolution)) {
      resolution = body.resolution;
    } else {
      issues.push("resolution must look like 512x512");
    }
  }

  let model: string | undefined;
  if (body.model !== undefined && body.model !== null) {
    if (typeof body.model === "string") {
      model = body.model;
    } else {
      issues.push("model must be a string");
    }
  }

  if (issues.length > 0 || typeof brandName !== "string" || typeof prompt !== "string") {
    throw new ValidationError(issues);
  }

  const request: ArtisticLogoRequest = {
    brand_name: brandName,
    prompt,
    style,
    variants,
    resolution,
  };
  if (model !== undefined) {
    request.model = model;
  }
  return request;
}
