import { beforeEach, describe, expect, it } from "vitest";
import { DuplicateBatchError, NotFoundError, StaleStatusError } from "../../src/errors";
import { InMemoryTrackingStore } from "../../src/tracking/memoryStore";
import { LEASE_EXPIRED_MESSAGE } from "../../src/tracking/trackingStore";
import { T0, buildBatchFixture } from "../helpers";

const BATCH = "batch_20240502_100000_aaaa0001";
const U1 = `${BATCH}_unit_1`;
const U2 = `${BATCH}_unit_2`;

async function captureAsync(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  throw new Error("expected a rejection");
}

describe("InMemoryTrackingStore", () => {
  let current: Date;
  let store: InMemoryTrackingStore;

  beforeEach(async () => {
    current = T0;
    store = new InMemoryTrackingStore(() => current);
    const { batch, units } = buildBatchFixture(BATCH, 3);
    await store.createBatch(batch, units);
  });

  describe("createBatch", () => {
    it("persists the batch and its units in sequence order", async () => {
      const view = await store.getBatchView(BATCH);

      expect(view?.batch.actual_count).toBe(3);
      expect(view?.units.map((unit) => unit.unit_id)).toEqual([U1, U2, `${BATCH}_unit_3`]);
      expect(view?.units.every((unit) => unit.extraction_status === "pending")).toBe(true);
    });

    it("writes nothing when one unit is malformed", async () => {
      const { batch, units } = buildBatchFixture("batch_b", 2);
      const broken = units.map((unit) => (unit.sequence === 2 ? { ...unit, sequence: 5 } : unit));

      await expect(store.createBatch(batch, broken)).rejects.toThrow(
        "Unit batch_b_unit_2 does not belong at position 2 of batch_b",
      );
      expect(await store.getBatchView("batch_b")).toBeNull();
      expect(await store.getUnit("batch_b_unit_1")).toBeNull();
    });

    it("rejects units that do not start pending", async () => {
      const { batch, units } = buildBatchFixture("batch_c", 1);
      const started = units.map((unit) => ({ ...unit, extraction_status: "completed" as const }));

      await expect(store.createBatch(batch, started)).rejects.toThrow(
        "Unit batch_c_unit_1 must start pending in extraction",
      );
      expect(await store.getBatchView("batch_c")).toBeNull();
    });

    it("rejects a duplicate batch id and keeps the original", async () => {
      await store.claimUnit(BATCH, U1, "extraction", "job-1");
      const { batch, units } = buildBatchFixture(BATCH, 3);

      await expect(store.createBatch(batch, units)).rejects.toBeInstanceOf(DuplicateBatchError);
      expect((await store.getUnit(U1))?.extraction_status).toBe("processing");
    });
  });

  describe("claim and advance", () => {
    it("claims a pending dimension under a token and lets the same token reclaim", async () => {
      const first = await store.claimUnit(BATCH, U1, "extraction", "job-1");
      const again = await store.claimUnit(BATCH, U1, "extraction", "job-1");

      expect(first.reclaimed).toBe(false);
      expect(first.unit.extraction_status).toBe("processing");
      expect(first.unit.claims.extraction).toBe("job-1");
      expect(again.reclaimed).toBe(true);
    });

    it("refuses a second delivery with a different token", async () => {
      await store.claimUnit(BATCH, U1, "extraction", "job-1");

      const error = await captureAsync(() => store.claimUnit(BATCH, U1, "extraction", "job-2"));
      expect(error).toBeInstanceOf(StaleStatusError);
      if (error instanceof StaleStatusError) {
        expect(error.expected).toBe("pending");
        expect(error.actual).toBe("processing");
      }
    });

    it("applies the pointer patch with the transition and rejects stale callers", async () => {
      await store.claimUnit(BATCH, U1, "extraction", "job-1");
      current = new Date(T0.getTime() + 5000);

      const done = await store.advanceUnitStatus(BATCH, U1, "extraction", "processing", "completed", {
        extraction_record_key: "batches/x/records/u1/job-1_0.json",
      });

      expect(done.extraction_status).toBe("completed");
      expect(done.extraction_record_key).toBe("batches/x/records/u1/job-1_0.json");
      expect(done.updated_at).toEqual(current);
      expect(done.completed_at).toBeNull();

      const error = await captureAsync(() =>
        store.advanceUnitStatus(BATCH, U1, "extraction", "processing", "completed"),
      );
      expect(error).toBeInstanceOf(StaleStatusError);
      if (error instanceof StaleStatusError) {
        expect(error.actual).toBe("completed");
      }
    });

    it("does not let integration move before extraction completes", async () => {
      const error = await captureAsync(() => store.claimUnit(BATCH, U2, "integration", "job-9"));

      expect(error).toBeInstanceOf(StaleStatusError);
      if (error instanceof StaleStatusError) {
        expect(error.dimension).toBe("extraction");
        expect(error.expected).toBe("completed");
        expect(error.actual).toBe("pending");
      }
      expect((await store.getUnit(U2))?.integration_status).toBe("pending");
    });

    it("stamps completed_at when integration completes", async () => {
      await store.claimUnit(BATCH, U1, "extraction", "job-1");
      await store.advanceUnitStatus(BATCH, U1, "extraction", "processing", "completed");
      await store.claimUnit(BATCH, U1, "integration", "job-2");
      current = new Date("2024-05-02T11:00:00.000Z");

      const done = await store.advanceUnitStatus(BATCH, U1, "integration", "processing", "completed", {
        crm_case_id: "case-1",
      });

      expect(done.crm_case_id).toBe("case-1");
      expect(done.completed_at).toEqual(new Date("2024-05-02T11:00:00.000Z"));
    });

    it("reports unknown units as not found", async () => {
      await expect(
        store.advanceUnitStatus(BATCH, "missing", "extraction", "pending", "processing"),
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.getUnit("missing")).toBeNull();
      expect(await store.getBatchView("missing")).toBeNull();
    });
  });

  describe("recordError", () => {
    it("marks the dimension in error with a message", async () => {
      await store.claimUnit(BATCH, U1, "extraction", "job-1");

      expect(await store.recordError(BATCH, U1, "extraction", "recognition: timeout")).toBe(true);

      const unit = await store.getUnit(U1);
      expect(unit?.extraction_status).toBe("error");
      expect(unit?.error_message).toBe("recognition: timeout");
      expect(unit?.error_dimension).toBe("extraction");
    });

    it("never overwrites a completed dimension", async () => {
      await store.claimUnit(BATCH, U1, "extraction", "job-1");
      await store.advanceUnitStatus(BATCH, U1, "extraction", "processing", "completed");

      expect(await store.recordError(BATCH, U1, "extraction", "late failure")).toBe(false);
      expect((await store.getUnit(U1))?.extraction_status).toBe("completed");
      expect(await store.recordError(BATCH, "missing", "extraction", "x")).toBe(false);
    });
  });

  describe("rearmUnit", () => {
    async function failOnce(token: string): Promise<void> {
      await store.claimUnit(BATCH, U1, "extraction", token);
      await store.recordError(BATCH, U1, "extraction", "boom");
    }

    it("only re-arms units in error", async () => {
      const result = await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3 });
      expect(result).toMatchObject({ rearmed: false, reason: "not_in_error" });
    });

    it("lets only the failing delivery re-arm when a token is given", async () => {
      await failOnce("job-1");

      const foreign = await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3, token: "job-2" });
      expect(foreign).toMatchObject({ rearmed: false, reason: "foreign_token" });

      const own = await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3, token: "job-1" });
      expect(own.rearmed).toBe(true);
      expect(own.unit.extraction_status).toBe("pending");
      expect(own.unit.retries.extraction).toBe(1);
      expect(own.unit.claims.extraction).toBeNull();
      expect(own.unit.error_message).toBe("boom");
      expect(own.unit.error_dimension).toBe("extraction");
    });

    it("keeps the last error until the retried dimension completes", async () => {
      await failOnce("job-1");
      await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3 });

      await store.claimUnit(BATCH, U1, "extraction", "job-2");
      const claimed = await store.getUnit(U1);
      expect(claimed?.error_message).toBe("boom");

      const completed = await store.advanceUnitStatus(BATCH, U1, "extraction", "processing", "completed");
      expect(completed.error_message).toBeNull();
      expect(completed.error_dimension).toBeNull();
    });

    it("keeps an error that belongs to another dimension", async () => {
      await store.claimUnit(BATCH, U1, "ingestion", "job-1");
      await store.recordError(BATCH, U1, "ingestion", "Storage failure");
      await failOnce("job-1");
      await store.rearmUnit(BATCH, U1, "ingestion", { maxAttempts: 3 });
      await store.claimUnit(BATCH, U1, "ingestion", "job-2");

      const completed = await store.advanceUnitStatus(BATCH, U1, "ingestion", "processing", "completed");
      expect(completed.error_message).toBe("boom");
      expect(completed.error_dimension).toBe("extraction");
    });

    it("stops at the attempts ceiling", async () => {
      await failOnce("job-1");
      expect((await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3 })).rearmed).toBe(true);
      await failOnce("job-1");
      expect((await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3 })).rearmed).toBe(true);
      await failOnce("job-1");

      const refused = await store.rearmUnit(BATCH, U1, "extraction", { maxAttempts: 3 });
      expect(refused).toMatchObject({ rearmed: false, reason: "attempts_exhausted" });
      expect(refused.unit.extraction_status).toBe("error");
      expect(refused.unit.retries.extraction).toBe(2);
    });
  });

  it("reaps units stuck in processing past the lease", async () => {
    await store.claimUnit(BATCH, U1, "extraction", "job-1");
    current = new Date(T0.getTime() + 60 * 60_000);
    await store.claimUnit(BATCH, U2, "extraction", "job-2");

    const reaped = await store.reapStaleProcessing(new Date(T0.getTime() + 30 * 60_000));

    expect(reaped).toEqual([{ batch_id: BATCH, unit_id: U1, dimension: "extraction" }]);
    expect((await store.getUnit(U1))?.error_message).toBe(LEASE_EXPIRED_MESSAGE);
    expect((await store.getUnit(U1))?.updated_at).toEqual(current);
    expect((await store.getUnit(U2))?.extraction_status).toBe("processing");
  });

  it("counts units per dimension and status", async () => {
    await store.claimUnit(BATCH, U1, "extraction", "job-1");

    expect(await store.countByStatus()).toEqual({
      ingestion: { pending: 3, processing: 0, completed: 0, error: 0 },
      extraction: { pending: 2, processing: 1, completed: 0, error: 0 },
      integration: { pending: 3, processing: 0, completed: 0, error: 0 },
    });
  });
});
