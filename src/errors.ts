import { ZodError } from "zod";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "SESSION_NOT_FOUND"
  | "ENGINE_LIFECYCLE_ERROR"
  | "ENGINE_NOT_STARTED"
  | "CONTEXT_NOT_FOUND"
  | "INTERNAL_ERROR";

/**
 * Base class for errors that cross the API boundary with a known status code.
 * Engine operation failures (bad selector, slow page) are not modelled here:
 * the dispatcher reports those as `{ success: false }` data.
 */
export class ServiceError extends Error {
  public readonly status: number;
  public readonly code: ErrorCode;

  public constructor(message: string, status: number, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ServiceError";
    this.status = status;
    this.code = code;
  }
}

/** Missing or invalid input; the request never reaches the engine. */
export class ValidationError extends ServiceError {
  public constructor(message: string, code: ErrorCode = "VALIDATION_ERROR") {
    super(message, 400, code);
    this.name = "ValidationError";
  }
}

export class SessionNotFoundError extends ValidationError {
  public readonly sessionId: string;

  public constructor(sessionId: string) {
    super(`Invalid session ID: ${sessionId}`, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

/** Launch or shutdown of the engine failed. */
export class EngineLifecycleError extends ServiceError {
  public constructor(message: string, options?: { cause?: unknown; code?: ErrorCode }) {
    super(message, 500, options?.code ?? "ENGINE_LIFECYCLE_ERROR", { cause: options?.cause });
    this.name = "EngineLifecycleError";
  }
}

export class EngineNotStartedError extends EngineLifecycleError {
  public constructor() {
    super("Browser not started", { code: "ENGINE_NOT_STARTED" });
    this.name = "EngineNotStartedError";
  }
}

export class ContextNotFoundError extends EngineLifecycleError {
  public constructor(contextId: string) {
    super(`Context ${contextId} does not exist`, { code: "CONTEXT_NOT_FOUND" });
    this.name = "ContextNotFoundError";
  }
}

export const isServiceError = (error: unknown): error is ServiceError => error instanceof ServiceError;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface ErrorResponse {
  status: number;
  body: { success: false; error: string; code: ErrorCode };
}

/**
 * Map any thrown value to the JSON error envelope and HTTP status the API returns.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    if (!issue) {
      return { status: 400, body: { success: false, error: "Invalid request body", code: "VALIDATION_ERROR" } };
    }
    const path = issue.path.join(".");
    // Custom messages already name their field ("url is required").
    const error = path && !issue.message.startsWith(path) ? `${path}: ${issue.message}` : issue.message;
    return { status: 400, body: { success: false, error, code: "VALIDATION_ERROR" } };
  }

  if (isServiceError(err)) {
    return { status: err.status, body: { success: false, error: err.message, code: err.code } };
  }

  return { status: 500, body: { success: false, error: errorMessage(err), code: "INTERNAL_ERROR" } };
}
