/**
 * @file workflowRoutes.ts
 * @description Express routes for jobs and generation tasks
 */

import express from "express";
import {
  GenerationController,
  LOGO_JOBS_PATH,
} from "../controllers/generationController";
import { WorkflowController } from "../controllers/workflowController";

export function createRouter(
  workflow: WorkflowController,
  generation: GenerationController
): express.Router {
  const router = express.Router();

  // Service
  router.get("/", workflow.getServiceInfo);
  router.get("/health", workflow.healthCheck);

  // Brand workflow jobs
  router.post("/api/jobs", workflow.createJob);
  router.get("/api/jobs", workflow.listJobs);
  router.get("/api/jobs/:jobId", workflow.getJob);
  router.get("/api/jobs/:jobId/results", workflow.getJobResults);
  router.get("/api/jobs/:jobId/events", workflow.streamJobEvents);

  // Artistic logo generation tasks
  router.post(LOGO_JOBS_PATH, generation.submitLogoJob);
  router.get(LOGO_JOBS_PATH, generation.listLogoJobs);
  router.get(`${LOGO_JOBS_PATH}/:taskId`, generation.getLogoJob);
  router.post(`${LOGO_JOBS_PATH}/:taskId/cancel`, generation.cancelLogoJob);
  router.delete(`${LOGO_JOBS_PATH}/:taskId`, generation.deleteLogoJob);

  return router;
}
