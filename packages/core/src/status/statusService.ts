import { NotFoundError } from "../errors";
import type { BatchChannel, BatchMetadata, UnitRecord } from "../types";
import { STATUS_DIMENSIONS, type StatusDimension } from "../tracking/stateMachine";
import {
  countUnitStatuses,
  getDimensionStatus,
  type DimensionStatusCounts,
  type TrackingStore,
} from "../tracking/trackingStore";

export type BatchStatus = "completed" | "error" | "processing";
export type UnitRollup = "completed" | "error" | "pending";

export interface UnitErrorSummary {
  unit_id: string;
  sequence: number;
  dimension: StatusDimension;
  message: string | null;
}

export interface BatchStatusView {
  batch_id: string;
  status: BatchStatus;
  declared_count: number;
  actual_count: number;
  channel: BatchChannel;
  metadata: BatchMetadata;
  warnings: string[];
  created_at: Date;
  units: Record<UnitRollup, number>;
  dimensions: DimensionStatusCounts;
  completion_rate: number;
  errors: UnitErrorSummary[];
}

export function rollupUnit(unit: UnitRecord): UnitRollup {
  if (unit.integration_status === "completed") {
    return "completed";
  }
  if (STATUS_DIMENSIONS.some((dimension) => getDimensionStatus(unit, dimension) === "error")) {
    return "error";
  }
  return "pending";
}

export function summarizeUnitError(unit: UnitRecord): UnitErrorSummary | null {
  const failed = STATUS_DIMENSIONS.find((dimension) => getDimensionStatus(unit, dimension) === "error");
  if (!failed) {
    return null;
  }
  return {
    unit_id: unit.unit_id,
    sequence: unit.sequence,
    dimension: unit.error_dimension ?? failed,
    message: unit.error_message,
  };
}

export function deriveBatchStatus(units: readonly UnitRecord[]): BatchStatus {
  const rollups = units.map(rollupUnit);
  if (rollups.length > 0 && rollups.every((rollup) => rollup === "completed")) {
    return "completed";
  }
  if (rollups.includes("error")) {
    return "error";
  }
  return "processing";
}

/** Read-only projection over the tracking store. */
export class StatusQueryService {
  constructor(private readonly store: TrackingStore) {}

  async getBatchStatus(batchId: string): Promise<BatchStatusView> {
    const view = await this.store.getBatchView(batchId);
    if (!view) {
      throw new NotFoundError("batch", batchId);
    }

    const { batch, units } = view;
    const rollups: Record<UnitRollup, number> = { completed: 0, error: 0, pending: 0 };
    const errors: UnitErrorSummary[] = [];
    for (const unit of units) {
      const rollup = rollupUnit(unit);
      rollups[rollup] += 1;
      const summary = rollup === "error" ? summarizeUnitError(unit) : null;
      if (summary) {
        errors.push(summary);
      }
    }
    errors.sort((left, right) => left.sequence - right.sequence);

    return {
      batch_id: batch.batch_id,
      status: deriveBatchStatus(units),
      declared_count: batch.declared_count,
      actual_count: batch.actual_count,
      channel: batch.channel,
      metadata: batch.metadata,
      warnings: batch.warnings,
      created_at: batch.created_at,
      units: rollups,
      dimensions: countUnitStatuses(units),
      completion_rate:
        units.length === 0 ? 0 : Number((rollups.completed / units.length).toFixed(4)),
      errors,
    };
  }

  async getUnitStatus(unitId: string): Promise<UnitRecord> {
    const unit = await this.store.getUnit(unitId);
    if (!unit) {
      throw new NotFoundError("unit", unitId);
    }
    return unit;
  }
}
