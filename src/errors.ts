export class ConfigurationError extends Error {
  readonly key?: string;

  constructor(message: string, options: { key?: string } = {}) {
    super(message);
    this.name = "ConfigurationError";
    this.key = options.key;
  }
}

/**
 * Raised at a cancellation checkpoint. Unwinds to the run's top level, where it
 * becomes a `run_canceled` event and terminal status `canceled`.
 */
export class CancellationSignal extends Error {
  readonly reason: string;

  constructor(reason = "cancel_requested") {
    super(`Canceled: ${reason}`);
    this.name = "CancellationSignal";
    this.reason = reason;
  }
}

export class PlanningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanningError";
  }
}

export class SubtaskParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubtaskParseError";
  }
}

export class JsonExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JsonExtractionError";
  }
}

export class DependencyUnavailableError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(missing.length > 0 ? `${message} Missing: ${missing.join(", ")}` : message);
    this.name = "DependencyUnavailableError";
    this.missing = missing;
  }
}

export class StoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreError";
  }
}

export class NotFoundError extends StoreError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class IdempotencyConflictError extends Error {
  constructor(message = "Idempotency-Key was already used with a different request body.") {
    super(message);
    this.name = "IdempotencyConflictError";
  }
}

export class MemoryStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MemoryStoreError";
  }
}

export class LearnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LearnError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorTrace(error: unknown): string {
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`;
  return String(error);
}
