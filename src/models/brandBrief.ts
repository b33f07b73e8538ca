/**
 * @file brandBrief.ts
 * @description Validation of incoming brand briefs
 */

import { ValidationError } from "../errors/workflowError";
import {
  BrandBrief,
  BrandMood,
  StylePreference,
} from "../interfaces/workflow";
import { isRecord, isStringArray } from "../utils/utils";

const STYLE_PREFERENCES: string[] = Object.values(StylePreference);
const BRAND_MOODS: string[] = Object.values(BrandMood);

function isStylePreference(value: unknown): value is StylePreference {
  return typeof value === "string" && STYLE_PREFERENCES.includes(value);
}

function isBrandMood(value: unknown): value is BrandMood {
  return typeof value === "string" && BRAND_MOODS.includes(value);
}

/**
 * @function parseBrandBrief
 * @description Checks a request body and fills in the optional fields
 * @throws {ValidationError} Listing every problem found
 */
export function parseBrandBrief(body: unknown): BrandBrief {
  if (!isRecord(body)) {
    throw new ValidationError(["Request body must be a JSON object"]);
  }
  const issues: string[] = [];

  const requiredString = (field: string): string => {
    const value = body[field];
    if (typeof value !== "string" || value.trim() === "") {
      issues.push(`${field} is required`);
      return "";
    }
    return value;
  };
  const optionalString = (field: string): string => {
    const value = body[field];
    if (value === undefined || value === null) return "";
    if (typeof value !== "string") {
      issues.push(`${field} must be a string`);
      return "";
    }
    return value;
  };
  const optionalList = (field: string): string[] => {
    const value = body[field];
    if (value === undefined || value === null) return [];
    if (!isStringArray(value)) {
      issues.push(`${field} must be an array of strings`);
      return [];
    }
    return value;
  };

  const brandName = requiredString("brand_name");
  const industry = requiredString("industry");
  const targetAudience = requiredString("target_audience");

  let style = StylePreference.MODERN;
  if (body.style_preference !== undefined) {
    if (isStylePreference(body.style_preference)) {
      style = body.style_preference;
    } else {
      issues.push(
        `style_preference must be one of: ${STYLE_PREFERENCES.join(", ")}`
      );
    }
  }

  let mood = BrandMood.INNOVATIVE;
  if (body.desired_mood !== undefined) {
    if (isBrandMood(body.desired_mood)) {
      mood = body.desired_mood;
    } else {
      issues.push(`desired_mood must be one of: ${BRAND_MOODS.join(", ")}`);
    }
  }

  const brief: BrandBrief = {
    brand_name: brandName,
    industry,
    target_audience: targetAudience,
    brand_values: optionalList("brand_values"),
    style_preference: style,
    desired_mood: mood,
    brand_voice: optionalString("brand_voice"),
    mission: optionalString("mission"),
    vision: optionalString("vision"),
    competitors: optionalList("competitors"),
    unique_selling_proposition: optionalString("unique_selling_proposition"),
    marketing_goals: optionalList("marketing_goals"),
    budget_considerations: optionalString("budget_considerations"),
    timeline: optionalString("timeline"),
  };

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
  return brief;
}
