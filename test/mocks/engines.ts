/**
 * @file engines.ts
 * @description Controllable engines for executor, orchestrator and route tests
 */

import {
  BrandBrief,
  GenerationContext,
  GenerationEngine,
  GenerationRequest,
  JobStartParams,
  WorkflowEngine,
} from "../../src/interfaces/workflow";

/**
 * @class StubGenerationEngine
 * @description Answers every request with the given result, or fails with the given message
 */
export class StubGenerationEngine implements GenerationEngine {
  public readonly calls: string[] = [];

  constructor(
    private readonly result: unknown = { ok: true },
    private readonly failure?: string
  ) {}

  public async generate(
    request: GenerationRequest,
    context: GenerationContext
  ): Promise<unknown> {
    this.calls.push(context.taskId);
    if (this.failure) {
      throw new Error(this.failure);
    }
    return this.result;
  }
}

/**
 * @class GatedGenerationEngine
 * @description Holds every call open until release() or until its token is cancelled
 */
export class GatedGenerationEngine implements GenerationEngine {
  public readonly calls: string[] = [];
  private releases: Array<() => void> = [];

  constructor(private readonly result: unknown = { ok: true }) {}

  public async generate(
    request: GenerationRequest,
    context: GenerationContext
  ): Promise<unknown> {
    this.calls.push(context.taskId);
    await new Promise<void>((resolve) => {
      this.releases.push(() => resolve());
      context.token.onCancel(() => resolve());
    });
    context.token.throwIfCancelled();
    return this.result;
  }

  public release(): void {
    const pending = this.releases;
    this.releases = [];
    pending.forEach((resolve) => resolve());
  }
}

/**
 * @class StubWorkflowEngine
 * @description Records the arguments of each step and returns fixed outputs
 */
export class StubWorkflowEngine implements WorkflowEngine {
  public readonly identityCalls: JobStartParams[] = [];
  public readonly marketingCalls: Array<Record<string, unknown>> = [];

  constructor(private readonly identityFailure?: string) {}

  public async runBrandIdentity(
    brief: BrandBrief,
    params: JobStartParams
  ): Promise<Record<string, unknown>> {
    this.identityCalls.push(params);
    if (this.identityFailure) {
      throw new Error(this.identityFailure);
    }
    return {
      logo_concepts: [`${brief.brand_name} mark`],
      style_guide: { voice_and_tone: "calm" },
    };
  }

  public async runMarketing(
    brief: BrandBrief,
    styleGuide: Record<string, unknown>
  ): Promise<Record<string, unknown>> {
    this.marketingCalls.push(styleGuide);
    return { campaign: `${brief.brand_name} launch` };
  }
}
