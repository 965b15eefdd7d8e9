import { InvalidTransitionError } from "../errors";

export const UNIT_STATUSES = ["pending", "processing", "completed", "error"] as const;
export type UnitStatus = (typeof UNIT_STATUSES)[number];

export const STATUS_DIMENSIONS = ["ingestion", "extraction", "integration"] as const;
export type StatusDimension = (typeof STATUS_DIMENSIONS)[number];

/**
 * Forward transitions available to the stage workers. Leaving `error` is not a
 * transition: it goes through the explicit re-arm operation of the store.
 */
export const STATUS_TRANSITIONS = {
  pending: ["processing"],
  processing: ["completed", "error"],
  completed: [],
  error: [],
} as const satisfies { readonly [From in UnitStatus]: readonly UnitStatus[] };

export type NextStatus<From extends UnitStatus> = (typeof STATUS_TRANSITIONS)[From][number];

export type DimensionStatuses = Record<StatusDimension, UnitStatus>;

export function canTransition(from: UnitStatus, to: UnitStatus): boolean {
  const allowed: readonly UnitStatus[] = STATUS_TRANSITIONS[from];
  return allowed.includes(to);
}

export function assertTransition(from: UnitStatus, to: UnitStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

const KNOWN_STATUSES: readonly string[] = UNIT_STATUSES;

export function isUnitStatus(value: unknown): value is UnitStatus {
  return typeof value === "string" && KNOWN_STATUSES.includes(value);
}

export function statusField(dimension: StatusDimension): `${StatusDimension}_status` {
  return `${dimension}_status`;
}

export function initialStatuses(): DimensionStatuses {
  return {
    ingestion: "pending",
    extraction: "pending",
    integration: "pending",
  };
}
