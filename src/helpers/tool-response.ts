import {
  AuthError,
  ConflictError,
  ExternalServiceUnavailableError,
  InvalidCredentialsError,
  NotFoundError,
  pgErrorCode,
} from "./errors.js";

/**
 * Standard prefix injected into every tool description so the LLM
 * always has app context regardless of which tool it reads first.
 */
export const APP_CONTEXT = `[FitTrack, personal fitness dashboard. Workout plans, diet plans, food inventory, meal and workout logs, body metrics and progress for the signed-in user.
All tools return JSON. Dates are YYYY-MM-DD; weights are kg, heights cm.]

`;

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: true;
}

/** Full JSON in content; the model needs to see errors too. */
export function toolResponse(data: Record<string, unknown>, isError?: boolean): ToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data) }],
    ...(isError ? { isError: true as const } : {}),
  };
}

/**
 * Classifies an error and returns a user-facing message.
 * Tells the caller whether retrying could help.
 */
export function classifyError(err: unknown): { message: string; retryable: boolean } {
  if (!(err instanceof Error)) {
    return { message: "An unexpected error occurred. Please try again.", retryable: true };
  }

  if (
    err instanceof NotFoundError ||
    err instanceof ConflictError ||
    err instanceof InvalidCredentialsError ||
    err instanceof AuthError
  ) {
    return { message: err.message, retryable: false };
  }
  if (err instanceof ExternalServiceUnavailableError) {
    return { message: err.message, retryable: true };
  }

  const code = pgErrorCode(err);
  if (code === "23505") {
    return { message: "A duplicate entry already exists.", retryable: false };
  }
  if (code === "23503") {
    return { message: "Referenced record not found.", retryable: false };
  }
  if (code === "23502") {
    return { message: "Required field is missing.", retryable: false };
  }

  const msg = err.message.toLowerCase();
  if (msg.includes("timeout") || msg.includes("timed out")) {
    return { message: "The operation timed out. Please try again.", retryable: true };
  }
  if (msg.includes("connection") || msg.includes("econnrefused") || msg.includes("enotfound")) {
    return { message: "Connection error. Please try again in a moment.", retryable: true };
  }

  return { message: "Something went wrong. Please try again.", retryable: true };
}

/**
 * Wraps a tool handler with try/catch error handling.
 * Unexpected errors become a structured error response instead of reaching
 * the MCP framework as an opaque failure.
 */
export function safeHandler<T>(
  toolName: string,
  handler: (params: T) => Promise<ToolResult>
): (params: T) => Promise<ToolResult> {
  return async (params: T) => {
    try {
      return await handler(params);
    } catch (err) {
      console.error(`[${toolName}] Unhandled error:`, err instanceof Error ? err.stack : err);
      const { message, retryable } = classifyError(err);
      return toolResponse({ error: message, retryable }, true);
    }
  };
}

/** "path: message" lines for a failed zod parse. */
export function issueList(issues: { path: (string | number)[]; message: string }[]): string[] {
  return issues.map((i) => `${i.path.join(".")}: ${i.message}`);
}
