import { KnowledgeBaseError } from "../domain/errors.js";
import { describeError } from "../utils/logger.js";

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function jsonResult(payload: unknown): ToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function errorCode(error: unknown): string {
  if (error instanceof KnowledgeBaseError) {
    return error.code;
  }
  if (error instanceof RangeError) {
    return "invalid_argument";
  }
  return "internal";
}

export function errorResult(error: unknown): ToolResult {
  return {
    ...jsonResult({ error: describeError(error), code: errorCode(error) }),
    isError: true,
  };
}
