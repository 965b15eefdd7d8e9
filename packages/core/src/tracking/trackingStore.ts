import type { BatchRecord, UnitPointerPatch, UnitRecord } from "../types";
import { buildUnitId } from "../utils/ids";
import {
  STATUS_DIMENSIONS,
  statusField,
  type NextStatus,
  type StatusDimension,
  type UnitStatus,
} from "./stateMachine";

export interface BatchView {
  batch: BatchRecord;
  units: UnitRecord[];
}

export interface ClaimResult {
  unit: UnitRecord;
  /** True when the same delivery already held the claim (stalled job redelivered). */
  reclaimed: boolean;
}

export type RearmRefusal = "not_in_error" | "attempts_exhausted" | "foreign_token";

export type RearmResult =
  | { rearmed: true; unit: UnitRecord }
  | { rearmed: false; reason: RearmRefusal; unit: UnitRecord };

export interface RearmOptions {
  maxAttempts: number;
  /** When set, only the delivery that left the dimension in error may re-arm it. */
  token?: string;
}

export interface ReapedDimension {
  batch_id: string;
  unit_id: string;
  dimension: StatusDimension;
}

export type StatusCounts = Record<UnitStatus, number>;
export type DimensionStatusCounts = Record<StatusDimension, StatusCounts>;

export const LEASE_EXPIRED_MESSAGE = "processing lease expired";

export interface TrackingStore {
  /** Persists the batch and all of its units, or nothing. */
  createBatch(batch: BatchRecord, units: UnitRecord[]): Promise<void>;
  advanceUnitStatus<From extends UnitStatus>(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    from: From,
    to: NextStatus<From>,
    patch?: UnitPointerPatch,
  ): Promise<UnitRecord>;
  claimUnit(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    token: string,
  ): Promise<ClaimResult>;
  /** Returns false when nothing was recorded (unknown unit or completed dimension). */
  recordError(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    message: string,
  ): Promise<boolean>;
  rearmUnit(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    options: RearmOptions,
  ): Promise<RearmResult>;
  reapStaleProcessing(olderThan: Date): Promise<ReapedDimension[]>;
  getBatchView(batchId: string): Promise<BatchView | null>;
  getUnit(unitId: string): Promise<UnitRecord | null>;
  countByStatus(): Promise<DimensionStatusCounts>;
}

export function getDimensionStatus(unit: UnitRecord, dimension: StatusDimension): UnitStatus {
  return unit[statusField(dimension)];
}

export function withDimensionStatus(
  unit: UnitRecord,
  dimension: StatusDimension,
  status: UnitStatus,
): UnitRecord {
  switch (dimension) {
    case "ingestion":
      return { ...unit, ingestion_status: status };
    case "extraction":
      return { ...unit, extraction_status: status };
    case "integration":
      return { ...unit, integration_status: status };
  }
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, processing: 0, completed: 0, error: 0 };
}

export function emptyDimensionCounts(): DimensionStatusCounts {
  return {
    ingestion: emptyStatusCounts(),
    extraction: emptyStatusCounts(),
    integration: emptyStatusCounts(),
  };
}

export function countUnitStatuses(units: readonly UnitRecord[]): DimensionStatusCounts {
  const counts = emptyDimensionCounts();
  for (const unit of units) {
    for (const dimension of STATUS_DIMENSIONS) {
      counts[dimension][getDimensionStatus(unit, dimension)] += 1;
    }
  }
  return counts;
}

/** Structural checks run before any write of a new batch. */
export function assertAdmissible(batch: BatchRecord, units: readonly UnitRecord[]): void {
  if (units.length === 0) {
    throw new Error(`Batch ${batch.batch_id} has no units`);
  }
  if (batch.actual_count !== units.length) {
    throw new Error(
      `Batch ${batch.batch_id} declares actual_count ${batch.actual_count} for ${units.length} units`,
    );
  }

  units.forEach((unit, index) => {
    const sequence = index + 1;
    if (
      unit.batch_id !== batch.batch_id ||
      unit.sequence !== sequence ||
      unit.unit_id !== buildUnitId(batch.batch_id, sequence)
    ) {
      throw new Error(`Unit ${unit.unit_id} does not belong at position ${sequence} of ${batch.batch_id}`);
    }

    for (const dimension of STATUS_DIMENSIONS) {
      if (getDimensionStatus(unit, dimension) !== "pending") {
        throw new Error(`Unit ${unit.unit_id} must start pending in ${dimension}`);
      }
    }
  });
}
