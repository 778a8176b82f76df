import type { PipelineStage, TerminalStatus } from "../types/index.js";

export interface PipelineErrorOptions {
  status: TerminalStatus;
  stage: PipelineStage;
  cause?: unknown;
}

/**
 * Base class of every failure that ends a task. `status` is the terminal
 * status the finalizer reports; `stage` is where it was raised.
 */
export class PipelineError extends Error {
  public readonly status: TerminalStatus;

  public readonly stage: PipelineStage;

  constructor(message: string, options: PipelineErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "PipelineError";
    this.status = options.status;
    this.stage = options.stage;
  }
}

export class IdentityLoadError extends PipelineError {
  constructor(callerId: string, cause?: unknown) {
    super(`Caller identity ${callerId} could not be loaded`, {
      status: "error_internal",
      stage: "context",
      cause,
    });
    this.name = "IdentityLoadError";
  }
}

export class ResolverUnavailableError extends PipelineError {
  constructor(attempts: number, cause?: unknown) {
    super(`Entity resolver model unavailable after ${attempts} attempts`, {
      status: "error_internal",
      stage: "resolver",
      cause,
    });
    this.name = "ResolverUnavailableError";
  }
}

export class SchemaViolationError extends PipelineError {
  public readonly issues: string[];

  constructor(stage: PipelineStage, issues: string[], attempts: number) {
    super(
      `Model response violated the schema ${attempts} times: ${issues
        .slice(0, 3)
        .join("; ")}`,
      { status: "error_internal", stage }
    );
    this.name = "SchemaViolationError";
    this.issues = issues;
  }
}

export class ModelTransportError extends PipelineError {
  constructor(stage: PipelineStage, message: string) {
    super(`Model transport failed: ${message}`, {
      status: "server_error",
      stage,
    });
    this.name = "ModelTransportError";
  }
}

export class RateLimitExhaustedError extends PipelineError {
  constructor(stage: PipelineStage, attempts: number) {
    super(`Model rate limit still hit after ${attempts} attempts`, {
      status: "rate_limit_exhausted",
      stage,
    });
    this.name = "RateLimitExhaustedError";
  }
}

export class DeadlineExceededError extends PipelineError {
  constructor(stage: PipelineStage, budgetMs: number) {
    super(`Task deadline of ${budgetMs}ms exceeded during ${stage}`, {
      status: "timeout",
      stage,
    });
    this.name = "DeadlineExceededError";
  }
}

export class BackendError extends PipelineError {
  constructor(stage: PipelineStage, message: string, cause?: unknown) {
    super(message, { status: "server_error", stage, cause });
    this.name = "BackendError";
  }
}

export class StepLimitExceededError extends PipelineError {
  constructor(maxSteps: number) {
    super(`Step limit of ${maxSteps} reached without completion`, {
      status: "max_steps_exceeded",
      stage: "executor",
    });
    this.name = "StepLimitExceededError";
  }
}

export class RepeatedToolFailureError extends PipelineError {
  constructor(tool: string, kind: string, count: number) {
    super(`Tool ${tool} failed with ${kind} ${count} times in a row`, {
      status: "error_internal",
      stage: "executor",
    });
    this.name = "RepeatedToolFailureError";
  }
}

export function toPipelineError(
  error: unknown,
  stage: PipelineStage
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError(message, {
    status: "error_internal",
    stage,
    cause: error,
  });
}

export function classifyFailure(error: unknown): TerminalStatus {
  return error instanceof PipelineError ? error.status : "error_internal";
}
