/**
 * @file workflow.ts
 * @description Type definitions for jobs, generation tasks and progress events
 */

import { CancellationToken } from "../core/cancellationToken";

/**
 * @enum UnitStatus
 * @description Lifecycle states shared by jobs and generation tasks
 */
export enum UnitStatus {
  PENDING = "pending",
  RUNNING = "running",
  COMPLETED = "completed",
  FAILED = "failed",
}

/**
 * @enum WorkflowStep
 * @description Phases of the brand workflow
 */
export enum WorkflowStep {
  INITIALIZING = "initializing",
  BRAND_IDENTITY = "brand_identity",
  MARKETING = "marketing",
  FINALIZING = "finalizing",
}

/**
 * @enum ProgressEventType
 * @description Kinds of messages delivered on a progress stream
 */
export enum ProgressEventType {
  CONNECTED = "connected",
  PROGRESS = "progress",
  STEP_COMPLETE = "step_complete",
  COMPLETED = "completed",
  ERROR = "error",
  KEEPALIVE = "keepalive",
}

export enum StylePreference {
  MODERN = "modern",
  CLASSIC = "classic",
  MINIMALIST = "minimalist",
  PLAYFUL = "playful",
  PROFESSIONAL = "professional",
  LUXURY = "luxury",
  TECH = "tech",
  NATURAL = "natural",
}

export enum BrandMood {
  TRUSTWORTHY = "trustworthy",
  INNOVATIVE = "innovative",
  ENERGETIC = "energetic",
  CALMING = "calming",
  PROFESSIONAL = "professional",
  FRIENDLY = "friendly",
}

/**
 * @type TaskOutcome
 * @description How a unit of work ended; failure is data, not a thrown error
 */
export type TaskOutcome<T> =
  | { kind: "success"; value: T }
  | { kind: "failure"; error: string };

/**
 * @interface TrackedUnit
 * @description Fields common to every trackable asynchronous unit of work
 */
export interface TrackedUnit<TResult> {
  id: string;
  status: UnitStatus;
  /** Integer 0-100, never decreasing */
  progress: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  outcome?: TaskOutcome<TResult>;
}

/**
 * @interface BrandBrief
 * @description Input of the brand workflow
 */
export interface BrandBrief {
  brand_name: string;
  industry: string;
  target_audience: string;
  brand_values: string[];
  style_preference: StylePreference;
  desired_mood: BrandMood;
  brand_voice: string;
  mission: string;
  vision: string;
  competitors: string[];
  unique_selling_proposition: string;
  marketing_goals: string[];
  budget_considerations: string;
  timeline: string;
}

/**
 * @type WorkflowResults
 * @description Opaque result bag keyed by step output name
 */
export type WorkflowResults = Record<string, unknown>;

/**
 * @interface Job
 * @description A multi-step workflow run
 */
export interface Job extends TrackedUnit<WorkflowResults> {
  brief: BrandBrief;
  currentStep?: WorkflowStep;
}

/**
 * @interface JobStartParams
 * @description Options applied when a job starts running
 */
export interface JobStartParams {
  model?: string;
}

/**
 * @interface ProgressEvent
 * @description A single message on a job's progress stream
 */
export interface ProgressEvent {
  type: ProgressEventType;
  jobId: string;
  step?: WorkflowStep;
  progress: number;
  message: string;
  timestamp: string;
}

/**
 * @type GenerationRequest
 * @description Opaque parameters of a generation task
 */
export type GenerationRequest = Record<string, unknown>;

/**
 * @interface PersistedTaskRecord
 * @description Durable projection of a generation task
 */
export interface PersistedTaskRecord {
  task_id: string;
  status: UnitStatus;
  req: GenerationRequest;
  result: unknown;
  error: string | null;
}

/**
 * @interface TaskView
 * @description Polling response for a generation task
 */
export interface TaskView {
  task_id: string;
  status: UnitStatus;
  result?: unknown;
  error?: string;
}

/**
 * @interface GenerationContext
 * @description Context handed to the engine for one task run
 */
export interface GenerationContext {
  taskId: string;
  token: CancellationToken;
}

/**
 * @interface GenerationEngine
 * @description The external capability that performs a generation request
 */
export interface GenerationEngine {
  generate(
    request: GenerationRequest,
    context: GenerationContext
  ): Promise<unknown>;
}

/**
 * @interface StepContext
 * @description Context handed to each workflow step body
 */
export interface StepContext {
  job: Job;
  params: JobStartParams;
  /** Outputs of the steps that already ran, keyed by result name */
  results: WorkflowResults;
}

/**
 * @interface WorkflowEngine
 * @description The external capability behind the brand workflow steps
 */
export interface WorkflowEngine {
  runBrandIdentity(
    brief: BrandBrief,
    params: JobStartParams
  ): Promise<Record<string, unknown>>;
  runMarketing(
    brief: BrandBrief,
    styleGuide: Record<string, unknown>,
    params: JobStartParams
  ): Promise<Record<string, unknown>>;
}
