// =============================================================================
// BASE ERRORS
// =============================================================================

export class OrchestratorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "OrchestratorError";
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class TaskError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

// =============================================================================
// PIPELINE ERRORS
// =============================================================================

export class UnknownTaskError extends OrchestratorError {
  constructor(public readonly taskId: string) {
    super(`Unknown task id: ${taskId}`);
    this.name = "UnknownTaskError";
  }
}

export class PrerequisiteError extends OrchestratorError {
  constructor(message: string) {
    super(message);
    this.name = "PrerequisiteError";
  }
}

export class TaskExecutionError extends TaskError {
  constructor(
    public readonly taskId: string,
    cause: unknown,
  ) {
    super(`Task ${taskId} failed: ${cause instanceof Error ? cause.message : String(cause)}`, cause);
    this.name = "TaskExecutionError";
  }
}

export class PipelineBuildError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PipelineBuildError";
  }
}

export class RoutingParseError extends OrchestratorError {
  constructor(
    message: string,
    public readonly rawOutput: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RoutingParseError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  task: "TASK_ERROR",
  pipeline: "PIPELINE_ERROR",
  session: "SESSION_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
