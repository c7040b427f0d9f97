import { InvalidSearchInputError } from "../domain/errors.js";
import { createLogger, describeError } from "../utils/logger.js";

const logger = createLogger("tools");

export interface ToolTextResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function jsonResult(payload: unknown): ToolTextResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Input problems are reported back verbatim; anything else becomes a generic
 * failure so partial retrieval state is never presented as an answer.
 */
export function errorResult(tool: string, error: unknown): ToolTextResult {
  if (error instanceof InvalidSearchInputError) {
    return {
      content: [{ type: "text", text: error.message }],
      isError: true,
    };
  }

  logger.error(`${tool} failed.`, { reason: describeError(error) });
  return {
    content: [
      {
        type: "text",
        text: "The guideline search failed. Please try again later.",
      },
    ],
    isError: true,
  };
}
