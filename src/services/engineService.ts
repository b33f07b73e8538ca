/**
 * @file engineService.ts
 * @description Selects the generation and workflow engines from configuration
 */

import { DemoGenerationEngine, DemoWorkflowEngine } from "../clients/demoEngines";
import { GenerationClient } from "../clients/generationClient";
import { WorkflowClient } from "../clients/workflowClient";
import { EnvConfig } from "../config/env";
import { GenerationEngine, WorkflowEngine } from "../interfaces/workflow";
import { Logger } from "../utils/logger";

export interface Engines {
  generation: GenerationEngine;
  workflow: WorkflowEngine;
}

/**
 * @function getEngines
 * @description Demo engines when DEMO_MODE is on, HTTP clients otherwise
 */
export function getEngines(
  config: Pick<
    EnvConfig,
    "DEMO_MODE" | "GENERATION_API_URL" | "GENERATION_API_KEY" | "WORKFLOW_API_URL"
  >
): Engines {
  Logger.info(`EngineService: DEMO_MODE=${config.DEMO_MODE}`);

  if (config.DEMO_MODE) {
    Logger.info("Using demo engines");
    return {
      generation: new DemoGenerationEngine(),
      workflow: new DemoWorkflowEngine(),
    };
  }
  Logger.info("Using remote engines");
  return {
    generation: new GenerationClient({
      baseUrl: config.GENERATION_API_URL,
      apiKey: config.GENERATION_API_KEY,
    }),
    workflow: new WorkflowClient({
      baseUrl: config.WORKFLOW_API_URL,
      apiKey: config.GENERATION_API_KEY,
    }),
  };
}
