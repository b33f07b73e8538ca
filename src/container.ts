/**
 * @file container.ts
 * @description Builds the service graph once and hands it to the HTTP layer
 */

import { EnvConfig } from "./config/env";
import { GenerationExecutor } from "./core/generationExecutor";
import {
  createBrandWorkflowSteps,
  JobOrchestrator,
  WorkflowStepDefinition,
} from "./core/jobOrchestrator";
import { JobRegistry } from "./core/jobRegistry";
import {
  createPersistenceAdapter,
  PersistenceAdapter,
} from "./core/persistenceAdapter";
import { ProgressBroadcaster } from "./core/progressBroadcaster";
import { WorkerPool } from "./core/workerPool";
import { Engines, getEngines } from "./services/engineService";
import { ProgressSocketService } from "./services/progressSocketService";
import { StreamingService } from "./services/streamingService";

export interface Container {
  config: EnvConfig;
  registry: JobRegistry;
  broadcaster: ProgressBroadcaster;
  orchestrator: JobOrchestrator;
  executor: GenerationExecutor;
  persistence: PersistenceAdapter;
  workflowPool: WorkerPool;
  generationPool: WorkerPool;
  streaming: StreamingService;
  sockets: ProgressSocketService;
}

/**
 * @interface ContainerOverrides
 * @description Replacements for the collaborators chosen from configuration
 */
export interface ContainerOverrides {
  engines?: Partial<Engines>;
  persistence?: PersistenceAdapter;
  steps?: WorkflowStepDefinition[];
}

function resolveEngines(
  config: EnvConfig,
  overrides: Partial<Engines> = {}
): Engines {
  if (overrides.generation && overrides.workflow) {
    return { generation: overrides.generation, workflow: overrides.workflow };
  }
  const defaults = getEngines(config);
  return {
    generation: overrides.generation ?? defaults.generation,
    workflow: overrides.workflow ?? defaults.workflow,
  };
}

/**
 * @function buildContainer
 * @description Wires registry, broadcaster, pools, orchestrator and executor
 */
export function buildContainer(
  config: EnvConfig,
  overrides: ContainerOverrides = {}
): Container {
  const engines = resolveEngines(config, overrides.engines);
  const persistence =
    overrides.persistence ?? createPersistenceAdapter(config);
  const registry = new JobRegistry(config.MAX_JOBS);
  const broadcaster = new ProgressBroadcaster(registry);
  registry.addEvictionListener((jobId) => broadcaster.clear(jobId));

  const workflowPool = new WorkerPool("workflow", {
    maxConcurrent: config.WORKFLOW_POOL_SIZE,
  });
  const generationPool = new WorkerPool("generation", {
    maxConcurrent: config.WORKER_POOL_SIZE,
  });

  const orchestrator = new JobOrchestrator(
    registry,
    broadcaster,
    workflowPool,
    overrides.steps ?? createBrandWorkflowSteps(engines.workflow)
  );
  const executor = new GenerationExecutor(
    engines.generation,
    persistence,
    generationPool,
    config.MAX_TASKS
  );

  const streamOptions = {
    registry,
    broadcaster,
    keepaliveIntervalMs: config.KEEPALIVE_INTERVAL_MS,
  };

  return {
    config,
    registry,
    broadcaster,
    orchestrator,
    executor,
    persistence,
    workflowPool,
    generationPool,
    streaming: new StreamingService(streamOptions),
    sockets: new ProgressSocketService(streamOptions),
  };
}
