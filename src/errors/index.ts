/**
 * Error taxonomy
 */

export class BorgmateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BorgmateError";
  }
}

/**
 * Bad caller input. Never retried.
 */
export class ValidationError extends BorgmateError {
  readonly field: string;
  readonly value: unknown;

  constructor(message: string, field: string, value?: unknown) {
    super(message);
    this.name = "ValidationError";
    this.field = field;
    this.value = value;
  }
}

export class ConfigurationError extends BorgmateError {
  readonly configKey: string | null;

  constructor(message: string, configKey: string | null = null) {
    super(message);
    this.name = "ConfigurationError";
    this.configKey = configKey;
  }
}

export type ExitClassification = "success" | "warning" | "fatal";

/** How a failed engine invocation ended */
export type EngineFailureKind = "exit" | "spawn" | "timeout" | "aborted";

export interface EngineErrorDetails {
  classification: Exclude<ExitClassification, "success">;
  kind: EngineFailureKind;
  subcommand: string;
  exitCode: number | null;
  command: string[];
  stdout: string;
  stderr: string;
  cause?: unknown;
}

export class EngineError extends BorgmateError {
  readonly classification: Exclude<ExitClassification, "success">;
  readonly kind: EngineFailureKind;
  readonly subcommand: string;
  readonly exitCode: number | null;
  readonly command: string[];
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, details: EngineErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "EngineError";
    this.classification = details.classification;
    this.kind = details.kind;
    this.subcommand = details.subcommand;
    this.exitCode = details.exitCode;
    this.command = details.command;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }

  get isFatal(): boolean {
    return this.classification === "fatal";
  }
}

export type StorageErrorReason = "conflict" | "not_found" | "backend";

export class StorageError extends BorgmateError {
  readonly reason: StorageErrorReason;
  readonly operation: string;

  constructor(
    message: string,
    reason: StorageErrorReason,
    operation: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "StorageError";
    this.reason = reason;
    this.operation = operation;
  }
}

export class RepositoryNotFoundError extends StorageError {
  readonly lookup: string;

  constructor(lookup: string, operation: string) {
    super(`Repository not found: ${lookup}`, "not_found", operation);
    this.name = "RepositoryNotFoundError";
    this.lookup = lookup;
  }
}

/**
 * A workflow step failed fatally. Carries the step name and any
 * diagnostics captured from the engine.
 */
export class WorkflowError extends BorgmateError {
  readonly workflow: string;
  readonly step: string;
  readonly stdout: string;
  readonly stderr: string;

  constructor(workflow: string, step: string, cause: unknown) {
    super(`${workflow} failed at step "${step}": ${errorMessage(cause)}`, { cause });
    this.name = "WorkflowError";
    this.workflow = workflow;
    this.step = step;
    this.stdout = cause instanceof EngineError ? cause.stdout : "";
    this.stderr = cause instanceof EngineError ? cause.stderr : "";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
