import { describe, expect, it } from "vitest";
import { NotFoundError } from "../../src/errors";
import { StatusQueryService, deriveBatchStatus, rollupUnit } from "../../src/status/statusService";
import { InMemoryTrackingStore } from "../../src/tracking/memoryStore";
import type { UnitRecord } from "../../src/types";
import { T0, buildBatchFixture } from "../helpers";

const BATCH = "batch_20240502_100000_bbbb0002";

async function completeUnit(store: InMemoryTrackingStore, unitId: string): Promise<void> {
  await store.claimUnit(BATCH, unitId, "ingestion", "job");
  await store.advanceUnitStatus(BATCH, unitId, "ingestion", "processing", "completed");
  await store.claimUnit(BATCH, unitId, "extraction", "job");
  await store.advanceUnitStatus(BATCH, unitId, "extraction", "processing", "completed");
  await store.claimUnit(BATCH, unitId, "integration", "job");
  await store.advanceUnitStatus(BATCH, unitId, "integration", "processing", "completed");
}

describe("StatusQueryService", () => {
  it("reports a batch with one failed unit as error", async () => {
    const store = new InMemoryTrackingStore(() => T0);
    const { batch, units } = buildBatchFixture(BATCH, 5);
    await store.createBatch(batch, units);

    for (const sequence of [1, 2, 3, 4]) {
      await completeUnit(store, `${BATCH}_unit_${sequence}`);
    }
    await store.claimUnit(BATCH, `${BATCH}_unit_5`, "extraction", "job");
    await store.recordError(BATCH, `${BATCH}_unit_5`, "extraction", "recognition: 500");

    const view = await new StatusQueryService(store).getBatchStatus(BATCH);

    expect(view.status).toBe("error");
    expect(view.units).toEqual({ completed: 4, error: 1, pending: 0 });
    expect(view.dimensions.extraction).toEqual({ pending: 0, processing: 0, completed: 4, error: 1 });
    expect(view.completion_rate).toBe(0.8);
    expect(view.declared_count).toBe(5);
    expect(view.metadata.empresa).toBe("Acme");
    expect(view.errors).toEqual([
      { unit_id: `${BATCH}_unit_5`, sequence: 5, dimension: "extraction", message: "recognition: 500" },
    ]);
  });

  it("lists failed units in sequence order and leaves recovered ones out", async () => {
    const store = new InMemoryTrackingStore(() => T0);
    const { batch, units } = buildBatchFixture(BATCH, 3);
    await store.createBatch(batch, units);
    const service = new StatusQueryService(store);

    await store.claimUnit(BATCH, `${BATCH}_unit_3`, "ingestion", "job");
    await store.recordError(BATCH, `${BATCH}_unit_3`, "ingestion", "Storage failure");
    await store.claimUnit(BATCH, `${BATCH}_unit_1`, "extraction", "job");
    await store.recordError(BATCH, `${BATCH}_unit_1`, "extraction", "recognition: 429");

    expect((await service.getBatchStatus(BATCH)).errors).toEqual([
      { unit_id: `${BATCH}_unit_1`, sequence: 1, dimension: "extraction", message: "recognition: 429" },
      { unit_id: `${BATCH}_unit_3`, sequence: 3, dimension: "ingestion", message: "Storage failure" },
    ]);

    await completeUnit(store, `${BATCH}_unit_2`);
    expect((await service.getBatchStatus(BATCH)).errors.map((error) => error.sequence)).toEqual([1, 3]);
  });

  it("reports processing while units are still pending and completed when all integrate", async () => {
    const store = new InMemoryTrackingStore(() => T0);
    const { batch, units } = buildBatchFixture(BATCH, 2);
    await store.createBatch(batch, units);
    const service = new StatusQueryService(store);

    await completeUnit(store, `${BATCH}_unit_1`);
    const partial = await service.getBatchStatus(BATCH);
    expect(partial.status).toBe("processing");
    expect(partial.units).toEqual({ completed: 1, error: 0, pending: 1 });
    expect(partial.completion_rate).toBe(0.5);

    await completeUnit(store, `${BATCH}_unit_2`);
    const done = await service.getBatchStatus(BATCH);
    expect(done.status).toBe("completed");
    expect(done.completion_rate).toBe(1);
  });

  it("returns the unit view and raises NotFoundError for unknown ids", async () => {
    const store = new InMemoryTrackingStore(() => T0);
    const { batch, units } = buildBatchFixture(BATCH, 1);
    await store.createBatch(batch, units);
    const service = new StatusQueryService(store);

    const unit = await service.getUnitStatus(`${BATCH}_unit_1`);
    expect(unit.sequence).toBe(1);

    await expect(service.getBatchStatus("batch_missing")).rejects.toThrow("batch batch_missing not found");
    await expect(service.getUnitStatus("unit_missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("roll-up rules", () => {
  const [base] = buildBatchFixture(BATCH, 1).units;

  function unitWith(patch: Partial<UnitRecord>): UnitRecord {
    if (!base) {
      throw new Error("fixture missing");
    }
    return { ...base, ...patch };
  }

  it("rolls a unit up from its three dimensions", () => {
    expect(rollupUnit(unitWith({}))).toBe("pending");
    expect(rollupUnit(unitWith({ ingestion_status: "error" }))).toBe("error");
    expect(
      rollupUnit(
        unitWith({
          ingestion_status: "completed",
          extraction_status: "completed",
          integration_status: "completed",
        }),
      ),
    ).toBe("completed");
  });

  it("derives the batch status", () => {
    const done = unitWith({ integration_status: "completed" });
    const failed = unitWith({ integration_status: "error" });
    const waiting = unitWith({ extraction_status: "processing" });

    expect(deriveBatchStatus([done, done])).toBe("completed");
    expect(deriveBatchStatus([done, failed, waiting])).toBe("error");
    expect(deriveBatchStatus([done, waiting])).toBe("processing");
    expect(deriveBatchStatus([])).toBe("processing");
  });
});
