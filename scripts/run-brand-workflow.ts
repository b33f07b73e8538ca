/**
 * Script to run the brand workflow end to end: submits a brand brief,
 * follows the job over its WebSocket stream and prints the final results.
 */

import axios, { AxiosError } from "axios";
import WebSocket from "ws";

// Configuration
const CONFIG = {
  serverUrl: process.env.SERVER_URL || "http://localhost:8000",
  model: process.env.MODEL || "",
};

interface JobResponse {
  job_id: string;
  status: string;
  progress: number;
}

interface StreamMessage {
  type: string;
  job_id?: string;
  step?: string | null;
  progress?: number;
  message?: string;
}

function isStreamMessage(value: unknown): value is StreamMessage {
  return (
    typeof value === "object" &&
    value !== null &&
    "type" in value &&
    typeof value.type === "string"
  );
}

/**
 * Submits a brand brief and returns the job id
 */
async function createJob(brief: Record<string, unknown>): Promise<string> {
  try {
    const query = CONFIG.model ? `?model=${encodeURIComponent(CONFIG.model)}` : "";
    const response = await axios.post<JobResponse>(
      `${CONFIG.serverUrl}/api/jobs${query}`,
      brief
    );
    console.log("Job accepted:", response.data);
    return response.data.job_id;
  } catch (error) {
    if (error instanceof AxiosError) {
      console.error("API Response:", error.response?.data);
      throw new Error(`Failed to create job: ${error.message}`);
    }
    throw new Error("Failed to create job: Unknown error");
  }
}

/**
 * Prints stream messages until the job ends
 * @returns Whether the job completed
 */
function followJob(jobId: string): Promise<boolean> {
  const wsUrl = `${CONFIG.serverUrl.replace(/^http/, "ws")}/ws/${jobId}`;
  return new Promise<boolean>((resolve, reject) => {
    const ws = new WebSocket(wsUrl);
    let completed = false;

    ws.on("message", (data: WebSocket.RawData) => {
      const text = data.toString();
      if (text === "pong") return;
      const parsed: unknown = JSON.parse(text);
      if (!isStreamMessage(parsed)) return;
      if (parsed.type === "keepalive") {
        ws.send("ping");
        return;
      }
      console.log(
        `[${parsed.type}] ${parsed.progress ?? 0}% ${parsed.step ?? ""} ${parsed.message ?? ""}`
      );
      if (parsed.type === "completed") completed = true;
    });
    ws.on("close", () => resolve(completed));
    ws.on("error", (error: Error) => reject(error));
  });
}

async function runBrandWorkflow(brief: Record<string, unknown>): Promise<unknown> {
  const jobId = await createJob(brief);
  const completed = await followJob(jobId);
  if (!completed) {
    const job = await axios.get(`${CONFIG.serverUrl}/api/jobs/${jobId}`);
    throw new Error(`Workflow did not complete: ${JSON.stringify(job.data)}`);
  }
  const results = await axios.get(`${CONFIG.serverUrl}/api/jobs/${jobId}/results`);
  return results.data;
}

// Example usage
if (require.main === module) {
  runBrandWorkflow({
    brand_name: "Example Brand",
    industry: "Outdoor equipment",
    target_audience: "Weekend hikers aged 25-40",
    brand_values: ["durability", "simplicity"],
    style_preference: "natural",
    desired_mood: "energetic",
  })
    .then((results) => {
      console.log("Workflow results:", JSON.stringify(results, null, 2));
    })
    .catch((error) => {
      console.error(
        "Workflow failed:",
        error instanceof Error ? error.message : error
      );
      process.exit(1);
    });
}

export { runBrandWorkflow };
