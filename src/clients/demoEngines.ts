/**
 * @file demoEngines.ts
 * @description Demo engines that simulate the remote services with placeholder assets
 */

import {
  ArtisticLogoResult,
  parseArtisticLogoRequest,
} from "../models/artisticLogo";
import {
  BrandBrief,
  GenerationContext,
  GenerationEngine,
  GenerationRequest,
  JobStartParams,
  WorkflowEngine,
} from "../interfaces/workflow";
import { Logger } from "../utils/logger";
import { sleep } from "../utils/utils";

export interface DemoEngineOptions {
  /** Simulated processing time per step in milliseconds */
  stepDelay?: number;
}

function slug(value: string): string {
  return value.replace(/\s+/g, "").toLowerCase();
}

/**
 * @class DemoGenerationEngine
 * @description Produces placeholder logo variants. Checks the token once per variant.
 */
export class DemoGenerationEngine implements GenerationEngine {
  private readonly stepDelay: number;

  constructor(options: DemoEngineOptions = {}) {
    this.stepDelay = options.stepDelay ?? 1000;
  }

  public async generate(
    request: GenerationRequest,
    context: GenerationContext
  ): Promise<ArtisticLogoResult> {
    const logo = parseArtisticLogoRequest(request);
    Logger.debug(`Demo generation of ${logo.variants} variant(s) for task ${context.taskId}`);
    const result: ArtisticLogoResult = { brand: logo.brand_name, variants: [] };
    for (let index = 1; index <= logo.variants; index++) {
      await sleep(this.stepDelay, context.token);
      result.variants.push({
        file_path: `assets/logos/${slug(logo.brand_name)}_${logo.style}_variant_${index}.png`,
        model: logo.model ?? null,
        prompt: logo.prompt,
        style: logo.style,
        resolution: logo.resolution,
      });
    }
    return result;
  }
}

/**
 * @class DemoWorkflowEngine
 * @description Fixed brand identity and marketing results derived from the brief
 */
export class DemoWorkflowEngine implements WorkflowEngine {
  private readonly stepDelay: number;

  constructor(options: DemoEngineOptions = {}) {
    this.stepDelay = options.stepDelay ?? 2000;
  }

  public async runBrandIdentity(
    brief: BrandBrief,
    params: JobStartParams
  ): Promise<Record<string, unknown>> {
    await sleep(this.stepDelay);
    return {
      model: params.model ?? null,
      logo_concepts: [1, 2, 3].map((index) => ({
        id: `logo_${index}`,
        name: `Concept ${index}`,
        description: `Logo concept for ${brief.brand_name}`,
        rationale: "Modern design approach aligned with brand values",
        style: brief.style_preference,
        file_path: `assets/logos/${slug(brief.brand_name)}_concept_${index}.png`,
        use_cases: ["Website", "Business cards", "Social media"],
      })),
      color_palette: {
        primary: { name: "Primary", hex: "#1a1a2e", rgb: "26, 26, 46", usage: "Main brand color" },
        secondary: { name: "Secondary", hex: "#16213e", rgb: "22, 33, 62", usage: "Supporting elements" },
        accent: { name: "Accent", hex: "#0f3460", rgb: "15, 52, 96", usage: "CTAs and highlights" },
        neutral: { name: "Neutral", hex: "#e8e8e8", rgb: "232, 232, 232", usage: "Backgrounds" },
        rationale: "Colors chosen to convey professionalism and innovation",
      },
      style_guide: {
        typography: { primary_font: "Inter", secondary_font: "Roboto" },
        imagery: { style: brief.style_preference, photography: "clean and professional" },
        voice_and_tone: brief.brand_voice || "Professional yet approachable",
        usage_guidelines: "Maintain consistency across all touchpoints",
      },
    };
  }

  public async runMarketing(
    brief: BrandBrief,
    styleGuide: Record<string, unknown>,
    params: JobStartParams
  ): Promise<Record<string, unknown>> {
    await sleep(this.stepDelay);
    return {
      model: params.model ?? null,
      voice_and_tone: styleGuide.voice_and_tone ?? null,
      social_media: {
        platforms: ["Instagram", "LinkedIn", "X"],
        posts_per_platform: 3,
        content_themes: ["Brand awareness", "Product features", "Customer stories"],
        sample_posts: [],
      },
      email_campaigns: {
        campaign_types: ["Welcome", "Product launch"],
        emails_per_campaign: 3,
        sample_emails: [],
      },
      video_content: {
        platforms: ["YouTube", "TikTok"],
        videos_per_platform: 2,
        content_concepts: [
          { title: `Meet ${brief.brand_name}`, audience: brief.target_audience },
        ],
      },
    };
  }
}
