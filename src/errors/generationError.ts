import axios from "axios";

/**
 * @enum {string}
 * @description Enumeration of possible error codes for the external generation and workflow engines
 */
export enum GenerationErrorCode {
  INVALID_REQUEST = "INVALID_REQUEST",
  API_ERROR = "API_ERROR",
  NETWORK_ERROR = "NETWORK_ERROR",
  GENERATION_FAILED = "GENERATION_FAILED",
  INVALID_RESPONSE = "INVALID_RESPONSE",
  TIMEOUT = "TIMEOUT",
}

/**
 * @class GenerationError
 * @description Custom error class for engine client operations
 * @extends Error
 */
export class GenerationError extends Error {
  /**
   * @constructor
   * @param {GenerationErrorCode} code - The error code
   * @param {number} status - HTTP status code if applicable
   * @param {string} [details] - Additional error details
   */
  constructor(
    public readonly code: GenerationErrorCode,
    public readonly status: number,
    public readonly details?: string
  ) {
    super(`${code}: ${details || "An error occurred"}`);
    this.name = "GenerationError";
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * @function toGenerationError
 * @description Wraps a failed engine call, keeping GenerationErrors as they are
 */
export function toGenerationError(error: unknown, action: string): Error {
  if (error instanceof GenerationError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    return new GenerationError(
      GenerationErrorCode.NETWORK_ERROR,
      error.response?.status || 500,
      `Network error during ${action}: ${error.message}`
    );
  }
  if (error instanceof Error) {
    return error;
  }
  return new GenerationError(
    GenerationErrorCode.API_ERROR,
    500,
    `Unknown error during ${action}`
  );
}
