export type EngineErrorKind = "DataUnavailable" | "GateComputation" | "Timeout" | "MiningFailure" | "InvalidTransition" | "NotFound";

export class EngineError extends Error {
  constructor(
    readonly kind: EngineErrorKind,
    message: string
  ) {
    super(message);
    this.name = `${kind}Error`;
  }
}

export class DataUnavailableError extends EngineError {
  constructor(message: string) {
    super("DataUnavailable", message);
  }
}

export class GateComputationError extends EngineError {
  constructor(message: string) {
    super("GateComputation", message);
  }
}

export class TimeoutError extends EngineError {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super("Timeout", `${label} timed out after ${timeoutMs}ms`);
  }
}

export class MiningFailureError extends EngineError {
  constructor(message: string) {
    super("MiningFailure", message);
  }
}

export class InvalidTransitionError extends EngineError {
  constructor(message: string) {
    super("InvalidTransition", message);
  }
}

export class RecordNotFoundError extends EngineError {
  constructor(
    readonly table: string,
    readonly id: string
  ) {
    super("NotFound", `${table} record ${id} not found`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
