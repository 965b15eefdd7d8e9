import { DuplicateBatchError, NotFoundError, StaleStatusError } from "../errors";
import type { BatchRecord, UnitPointerPatch, UnitRecord } from "../types";
import {
  STATUS_DIMENSIONS,
  assertTransition,
  type NextStatus,
  type StatusDimension,
  type UnitStatus,
} from "./stateMachine";
import {
  LEASE_EXPIRED_MESSAGE,
  assertAdmissible,
  countUnitStatuses,
  getDimensionStatus,
  withDimensionStatus,
  type BatchView,
  type ClaimResult,
  type DimensionStatusCounts,
  type ReapedDimension,
  type RearmOptions,
  type RearmResult,
  type TrackingStore,
} from "./trackingStore";

/**
 * Process-local tracking store with the same contract as the MongoDB one.
 * Records are cloned on the way in and out so callers never share state with it.
 */
export class InMemoryTrackingStore implements TrackingStore {
  private readonly batches = new Map<string, BatchRecord>();
  private readonly units = new Map<string, UnitRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createBatch(batch: BatchRecord, units: UnitRecord[]): Promise<void> {
    assertAdmissible(batch, units);
    if (this.batches.has(batch.batch_id)) {
      throw new DuplicateBatchError(batch.batch_id);
    }
    if (units.some((unit) => this.units.has(unit.unit_id))) {
      throw new DuplicateBatchError(batch.batch_id);
    }

    this.batches.set(batch.batch_id, structuredClone(batch));
    for (const unit of units) {
      this.units.set(unit.unit_id, structuredClone(unit));
    }
  }

  async advanceUnitStatus<From extends UnitStatus>(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    from: From,
    to: NextStatus<From>,
    patch: UnitPointerPatch = {},
  ): Promise<UnitRecord> {
    assertTransition(from, to);
    const unit = this.requireUnit(batchId, unitId);
    this.assertIntegrationAllowed(unit, dimension);

    const current = getDimensionStatus(unit, dimension);
    if (current !== from) {
      throw new StaleStatusError(unitId, dimension, from, current);
    }

    const now = this.now();
    const recovered = to === "completed" && unit.error_dimension === dimension;
    const next: UnitRecord = {
      ...withDimensionStatus(unit, dimension, to),
      ...patch,
      error_message: recovered ? null : unit.error_message,
      error_dimension: recovered ? null : unit.error_dimension,
      updated_at: now,
      completed_at: dimension === "integration" && to === "completed" ? now : unit.completed_at,
    };
    this.units.set(unitId, next);
    return structuredClone(next);
  }

  async claimUnit(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    token: string,
  ): Promise<ClaimResult> {
    const unit = this.requireUnit(batchId, unitId);
    this.assertIntegrationAllowed(unit, dimension);

    const current = getDimensionStatus(unit, dimension);
    const reclaimed = current === "processing" && unit.claims[dimension] === token;
    if (current !== "pending" && !reclaimed) {
      throw new StaleStatusError(unitId, dimension, "pending", current);
    }

    const claims = { ...unit.claims };
    claims[dimension] = token;
    const next: UnitRecord = {
      ...withDimensionStatus(unit, dimension, "processing"),
      claims,
      updated_at: this.now(),
    };
    this.units.set(unitId, next);
    return { unit: structuredClone(next), reclaimed };
  }

  async recordError(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    message: string,
  ): Promise<boolean> {
    const unit = this.units.get(unitId);
    if (!unit || unit.batch_id !== batchId || getDimensionStatus(unit, dimension) === "completed") {
      return false;
    }

    this.units.set(unitId, {
      ...withDimensionStatus(unit, dimension, "error"),
      error_message: message,
      error_dimension: dimension,
      updated_at: this.now(),
    });
    return true;
  }

  async rearmUnit(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    options: RearmOptions,
  ): Promise<RearmResult> {
    const unit = this.requireUnit(batchId, unitId);

    if (getDimensionStatus(unit, dimension) !== "error") {
      return { rearmed: false, reason: "not_in_error", unit: structuredClone(unit) };
    }
    if (options.token !== undefined && unit.claims[dimension] !== options.token) {
      return { rearmed: false, reason: "foreign_token", unit: structuredClone(unit) };
    }
    if (unit.retries[dimension] + 1 >= options.maxAttempts) {
      return { rearmed: false, reason: "attempts_exhausted", unit: structuredClone(unit) };
    }

    const retries = { ...unit.retries };
    retries[dimension] += 1;
    const claims = { ...unit.claims };
    claims[dimension] = null;

    const next: UnitRecord = {
      ...withDimensionStatus(unit, dimension, "pending"),
      retries,
      claims,
      updated_at: this.now(),
    };
    this.units.set(unitId, next);
    return { rearmed: true, unit: structuredClone(next) };
  }

  async reapStaleProcessing(olderThan: Date): Promise<ReapedDimension[]> {
    const reaped: ReapedDimension[] = [];

    for (const unit of this.units.values()) {
      if (unit.updated_at.getTime() >= olderThan.getTime()) {
        continue;
      }

      for (const dimension of STATUS_DIMENSIONS) {
        if (getDimensionStatus(unit, dimension) !== "processing") {
          continue;
        }
        await this.recordError(unit.batch_id, unit.unit_id, dimension, LEASE_EXPIRED_MESSAGE);
        reaped.push({ batch_id: unit.batch_id, unit_id: unit.unit_id, dimension });
      }
    }

    return reaped;
  }

  async getBatchView(batchId: string): Promise<BatchView | null> {
    const batch = this.batches.get(batchId);
    if (!batch) {
      return null;
    }

    const units = [...this.units.values()]
      .filter((unit) => unit.batch_id === batchId)
      .sort((a, b) => a.sequence - b.sequence);

    return structuredClone({ batch, units });
  }

  async getUnit(unitId: string): Promise<UnitRecord | null> {
    const unit = this.units.get(unitId);
    return unit ? structuredClone(unit) : null;
  }

  async countByStatus(): Promise<DimensionStatusCounts> {
    return countUnitStatuses([...this.units.values()]);
  }

  private requireUnit(batchId: string, unitId: string): UnitRecord {
    const unit = this.units.get(unitId);
    if (!unit || unit.batch_id !== batchId) {
      throw new NotFoundError("unit", unitId);
    }
    return unit;
  }

  private assertIntegrationAllowed(unit: UnitRecord, dimension: StatusDimension): void {
    if (dimension === "integration" && unit.extraction_status !== "completed") {
      throw new StaleStatusError(unit.unit_id, "extraction", "completed", unit.extraction_status);
    }
  }
}
