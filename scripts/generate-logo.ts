/**
 * Script to generate an artistic logo through the generation task API.
 * It submits a task, polls it until it settles, and can cancel it after a delay
 * (CANCEL_AFTER_MS) to exercise cooperative cancellation.
 */

import axios, { AxiosError } from "axios";

// Configuration
const CONFIG = {
  serverUrl: process.env.SERVER_URL || "http://localhost:8000",
  pollingInterval: 2000, // 2 seconds
  maxRetries: 90, // 3 minutes maximum waiting time
  cancelAfterMs: Number(process.env.CANCEL_AFTER_MS || 0),
};

const JOBS_URL = `${CONFIG.serverUrl}/api/generate/artistic-logo/jobs`;

interface TaskStatus {
  task_id: string;
  status: "pending" | "running" | "completed" | "failed";
  result?: unknown;
  error?: string;
}

interface SubmitResponse {
  task_id: string;
  status: string;
  location: string;
}

/**
 * Checks if the server is running by making a health check request
 * @returns {Promise<boolean>} True if server is running, false otherwise
 */
async function isServerRunning(): Promise<boolean> {
  try {
    const response = await axios.get(`${CONFIG.serverUrl}/health`);
    return response.status === 200;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      console.error("Server connection error:", error.message);
    } else {
      console.error("Unknown error:", error);
    }
    return false;
  }
}

/**
 * Submits a logo generation task
 * @returns {Promise<string>} Task ID
 */
async function createLogoTask(params: {
  brand_name: string;
  prompt: string;
  style?: string;
  variants?: number;
  resolution?: string;
  model?: string;
}): Promise<string> {
  try {
    const response = await axios.post<SubmitResponse>(JOBS_URL, params);
    console.log("Server response:", response.status, response.data);
    return response.data.task_id;
  } catch (error) {
    if (error instanceof AxiosError) {
      console.error("API Response:", error.response?.data);
      throw new Error(`Failed to create logo task: ${error.message}`);
    }
    throw new Error("Failed to create logo task: Unknown error");
  }
}

async function checkTaskStatus(taskId: string): Promise<TaskStatus> {
  const response = await axios.get<TaskStatus>(`${JOBS_URL}/${taskId}`);
  return response.data;
}

async function cancelTask(taskId: string): Promise<TaskStatus> {
  const response = await axios.post<TaskStatus>(`${JOBS_URL}/${taskId}/cancel`);
  return response.data;
}

/**
 * Main function: submit, optionally cancel, and poll to the end
 */
async function generateLogo(params: {
  brand_name: string;
  prompt: string;
  style?: string;
  variants?: number;
  resolution?: string;
}): Promise<unknown> {
  if (!(await isServerRunning())) {
    throw new Error(`Server is not reachable at ${CONFIG.serverUrl}`);
  }

  const taskId = await createLogoTask(params);
  console.log(`Task created with ID: ${taskId}`);

  if (CONFIG.cancelAfterMs > 0) {
    await new Promise((resolve) => setTimeout(resolve, CONFIG.cancelAfterMs));
    const cancelled = await cancelTask(taskId);
    console.log(`Cancel requested, task is now ${cancelled.status}`);
  }

  for (let retries = 0; retries < CONFIG.maxRetries; retries++) {
    const status = await checkTaskStatus(taskId);
    if (status.status === "completed") {
      console.log("Logo generation completed successfully!");
      return status.result;
    }
    if (status.status === "failed") {
      throw new Error(`Logo generation failed: ${status.error}`);
    }
    console.log(`Task status: ${status.status}. Waiting...`);
    await new Promise((resolve) => setTimeout(resolve, CONFIG.pollingInterval));
  }
  throw new Error("Timeout waiting for logo generation");
}

// Example usage
if (require.main === module) {
  generateLogo({
    brand_name: "Example Brand",
    prompt: "A geometric fox made of overlapping triangles",
    style: "vector",
    variants: 2,
    resolution: "512x512",
  })
    .then((result) => {
      console.log("Generated logo:", JSON.stringify(result, null, 2));
    })
    .catch((error) => {
      console.error(
        "Failed to generate logo:",
        error instanceof Error ? error.message : error
      );
      process.exit(1);
    });
}

export { generateLogo, isServerRunning };
