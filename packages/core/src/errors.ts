import type { StatusDimension, UnitStatus } from "./tracking/stateMachine";

export type OficiosErrorCode =
  | "CONFIG_VALIDATION"
  | "COUNT_MISMATCH"
  | "STALE_STATUS"
  | "DUPLICATE_BATCH"
  | "EXTERNAL_SERVICE"
  | "STORAGE"
  | "NOT_FOUND"
  | "INVALID_TRANSITION";

export abstract class OficiosError extends Error {
  abstract readonly code: OficiosErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigValidationError extends OficiosError {
  readonly code = "CONFIG_VALIDATION";

  constructor(readonly problems: string[]) {
    super(`Invalid batch header: ${problems.join("; ")}`);
  }
}

export class CountMismatchError extends OficiosError {
  readonly code = "COUNT_MISMATCH";

  constructor(
    readonly declaredCount: number,
    readonly actualCount: number,
  ) {
    super(
      actualCount === 0
        ? "Batch artifact produced zero units"
        : `Declared ${declaredCount} units but split produced ${actualCount}`,
    );
  }
}

export class StaleStatusError extends OficiosError {
  readonly code = "STALE_STATUS";

  constructor(
    readonly unitId: string,
    readonly dimension: StatusDimension,
    readonly expected: UnitStatus,
    readonly actual: UnitStatus | null,
  ) {
    super(
      `Stale ${dimension} status for ${unitId}: expected ${expected}, found ${actual ?? "nothing"}`,
    );
  }
}

export class DuplicateBatchError extends OficiosError {
  readonly code = "DUPLICATE_BATCH";

  constructor(readonly batchId: string) {
    super(`Batch ${batchId} already exists`);
  }
}

export class ExternalServiceError extends OficiosError {
  readonly code = "EXTERNAL_SERVICE";

  constructor(
    readonly service: "recognition" | "crm",
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(`${service}: ${message}`, options);
  }

  get retryable(): boolean {
    return this.status === null || this.status === 429 || this.status >= 500;
  }
}

export class StorageError extends OficiosError {
  readonly code = "STORAGE";

  constructor(
    readonly key: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Storage failure for ${key}: ${message}`, options);
  }
}

export class NotFoundError extends OficiosError {
  readonly code = "NOT_FOUND";

  constructor(
    readonly entity: "batch" | "unit",
    readonly id: string,
  ) {
    super(`${entity} ${id} not found`);
  }
}

export class InvalidTransitionError extends OficiosError {
  readonly code = "INVALID_TRANSITION";

  constructor(
    readonly from: UnitStatus,
    readonly to: UnitStatus,
  ) {
    super(`Transition ${from} -> ${to} is not allowed`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
