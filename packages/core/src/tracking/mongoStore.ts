import { MongoServerError, type Collection, type Filter, type MongoClient, type WithId } from "mongodb";
import { DuplicateBatchError, NotFoundError, StaleStatusError } from "../errors";
import type { BatchRecord, UnitPointerPatch, UnitRecord } from "../types";
import {
  STATUS_DIMENSIONS,
  assertTransition,
  statusField,
  type NextStatus,
  type StatusDimension,
  type UnitStatus,
  isUnitStatus,
} from "./stateMachine";
import {
  LEASE_EXPIRED_MESSAGE,
  assertAdmissible,
  emptyDimensionCounts,
  getDimensionStatus,
  type BatchView,
  type ClaimResult,
  type DimensionStatusCounts,
  type ReapedDimension,
  type RearmOptions,
  type RearmResult,
  type TrackingStore,
} from "./trackingStore";

export interface BatchDoc extends BatchRecord {
  _id: string;
}

export interface UnitDoc extends UnitRecord {
  _id: string;
}

function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === 11000;
}

function toBatchRecord(doc: WithId<BatchDoc>): BatchRecord {
  const { _id, ...batch } = doc;
  return batch;
}

function toUnitRecord(doc: WithId<UnitDoc>): UnitRecord {
  const { _id, ...unit } = doc;
  return unit;
}

/**
 * Tracking store over the `batches` and `units` collections. Every unit mutation is a
 * single-document conditional update; only batch admission uses a transaction, which
 * needs a replica set (a single-node one is enough).
 */
export class MongoTrackingStore implements TrackingStore {
  constructor(
    private readonly client: MongoClient,
    private readonly batches: Collection<BatchDoc>,
    private readonly units: Collection<UnitDoc>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async createBatch(batch: BatchRecord, units: UnitRecord[]): Promise<void> {
    assertAdmissible(batch, units);

    const session = this.client.startSession();
    try {
      await session.withTransaction(async () => {
        await this.batches.insertOne({ _id: batch.batch_id, ...batch }, { session });
        await this.units.insertMany(
          units.map((unit) => ({ _id: unit.unit_id, ...unit })),
          { session, ordered: true },
        );
      });
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new DuplicateBatchError(batch.batch_id);
      }
      throw error;
    } finally {
      await session.endSession();
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

    const now = this.now();
    const filter: Filter<UnitDoc> = {
      _id: unitId,
      batch_id: batchId,
      [statusField(dimension)]: from,
      ...this.integrationGuard(dimension),
    };
    const setPayload: Record<string, unknown> = {
      ...patch,
      [statusField(dimension)]: to,
      updated_at: now,
    };
    if (dimension === "integration" && to === "completed") {
      setPayload.completed_at = now;
    }

    const updated = await this.units.findOneAndUpdate(
      filter,
      { $set: setPayload },
      { returnDocument: "after" },
    );
    if (!updated) {
      throw await this.explainRejection(batchId, unitId, dimension, from);
    }
    if (to !== "completed" || updated.error_dimension !== dimension) {
      return toUnitRecord(updated);
    }

    // The dimension that failed last has now recovered.
    const cleared = await this.units.findOneAndUpdate(
      { _id: unitId, error_dimension: dimension },
      { $set: { error_message: null, error_dimension: null } },
      { returnDocument: "after" },
    );
    return toUnitRecord(cleared ?? updated);
  }

  async claimUnit(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    token: string,
  ): Promise<ClaimResult> {
    const field = statusField(dimension);
    const filter: Filter<UnitDoc> = {
      _id: unitId,
      batch_id: batchId,
      $or: [{ [field]: "pending" }, { [field]: "processing", [`claims.${dimension}`]: token }],
      ...this.integrationGuard(dimension),
    };

    const before = await this.units.findOneAndUpdate(
      filter,
      {
        $set: {
          [field]: "processing",
          [`claims.${dimension}`]: token,
          updated_at: this.now(),
        },
      },
      { returnDocument: "before" },
    );
    if (!before) {
      throw await this.explainRejection(batchId, unitId, dimension, "pending");
    }

    const unit = await this.getUnit(unitId);
    if (!unit) {
      throw new NotFoundError("unit", unitId);
    }

    return {
      unit,
      reclaimed: getDimensionStatus(toUnitRecord(before), dimension) === "processing",
    };
  }

  async recordError(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    message: string,
  ): Promise<boolean> {
    const field = statusField(dimension);
    const result = await this.units.updateOne(
      { _id: unitId, batch_id: batchId, [field]: { $ne: "completed" } },
      {
        $set: {
          [field]: "error",
          error_message: message,
          error_dimension: dimension,
          updated_at: this.now(),
        },
      },
    );

    return result.matchedCount > 0;
  }

  async rearmUnit(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    options: RearmOptions,
  ): Promise<RearmResult> {
    const field = statusField(dimension);
    const filter: Filter<UnitDoc> = {
      _id: unitId,
      batch_id: batchId,
      [field]: "error",
      [`retries.${dimension}`]: { $lt: options.maxAttempts - 1 },
    };
    if (options.token !== undefined) {
      filter[`claims.${dimension}`] = options.token;
    }

    const updated = await this.units.findOneAndUpdate(
      filter,
      {
        $set: {
          [field]: "pending",
          [`claims.${dimension}`]: null,
          updated_at: this.now(),
        },
        $inc: { [`retries.${dimension}`]: 1 },
      },
      { returnDocument: "after" },
    );
    if (updated) {
      return { rearmed: true, unit: toUnitRecord(updated) };
    }

    const current = await this.getUnit(unitId);
    if (!current || current.batch_id !== batchId) {
      throw new NotFoundError("unit", unitId);
    }
    if (getDimensionStatus(current, dimension) !== "error") {
      return { rearmed: false, reason: "not_in_error", unit: current };
    }
    if (options.token !== undefined && current.claims[dimension] !== options.token) {
      return { rearmed: false, reason: "foreign_token", unit: current };
    }
    return { rearmed: false, reason: "attempts_exhausted", unit: current };
  }

  async reapStaleProcessing(olderThan: Date): Promise<ReapedDimension[]> {
    const stale = await this.units
      .find({
        updated_at: { $lt: olderThan },
        $or: STATUS_DIMENSIONS.map((dimension) => ({ [statusField(dimension)]: "processing" })),
      })
      .toArray();

    const reaped: ReapedDimension[] = [];
    for (const doc of stale) {
      for (const dimension of STATUS_DIMENSIONS) {
        if (getDimensionStatus(doc, dimension) !== "processing") {
          continue;
        }

        const field = statusField(dimension);
        const result = await this.units.updateOne(
          { _id: doc._id, [field]: "processing", [`claims.${dimension}`]: doc.claims[dimension] },
          {
            $set: {
              [field]: "error",
              error_message: LEASE_EXPIRED_MESSAGE,
              error_dimension: dimension,
              updated_at: this.now(),
            },
          },
        );
        if (result.modifiedCount > 0) {
          reaped.push({ batch_id: doc.batch_id, unit_id: doc.unit_id, dimension });
        }
      }
    }

    return reaped;
  }

  async getBatchView(batchId: string): Promise<BatchView | null> {
    const batch = await this.batches.findOne({ _id: batchId });
    if (!batch) {
      return null;
    }

    const units = await this.units.find({ batch_id: batchId }).sort({ sequence: 1 }).toArray();
    return {
      batch: toBatchRecord(batch),
      units: units.map(toUnitRecord),
    };
  }

  async getUnit(unitId: string): Promise<UnitRecord | null> {
    const doc = await this.units.findOne({ _id: unitId });
    return doc ? toUnitRecord(doc) : null;
  }

  async countByStatus(): Promise<DimensionStatusCounts> {
    const counts = emptyDimensionCounts();

    await Promise.all(
      STATUS_DIMENSIONS.map(async (dimension) => {
        const rows = await this.units
          .aggregate<{ _id: unknown; count: number }>([
            { $group: { _id: `$${statusField(dimension)}`, count: { $sum: 1 } } },
          ])
          .toArray();

        for (const row of rows) {
          if (isUnitStatus(row._id)) {
            counts[dimension][row._id] = row.count;
          }
        }
      }),
    );

    return counts;
  }

  private integrationGuard(dimension: StatusDimension): Filter<UnitDoc> {
    return dimension === "integration" ? { extraction_status: "completed" } : {};
  }

  private async explainRejection(
    batchId: string,
    unitId: string,
    dimension: StatusDimension,
    expected: UnitStatus,
  ): Promise<Error> {
    const current = await this.getUnit(unitId);
    if (!current || current.batch_id !== batchId) {
      return new NotFoundError("unit", unitId);
    }
    if (dimension === "integration" && current.extraction_status !== "completed") {
      return new StaleStatusError(unitId, "extraction", "completed", current.extraction_status);
    }
    return new StaleStatusError(unitId, dimension, expected, getDimensionStatus(current, dimension));
  }
}
