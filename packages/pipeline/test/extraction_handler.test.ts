import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { ExternalServiceError, NotFoundError } from "@oficios/core/errors";
import { normalizeExtraction } from "@oficios/core/extraction/normalize";
import type { RecognitionClient } from "@oficios/core/extraction/recognitionClient";
import { createSilentLogger } from "@oficios/core/logger";
import { getJson } from "@oficios/core/storage/objectStore";
import { routeToDeadLetter } from "../src/deadLetter";
import { JOB_NAMES, QUEUE_NAMES } from "../src/queues";
import { handleExtractionJob, type ExtractionDeps } from "../src/workers/extractionHandler";
import { BATCH_ID, T0, admitTwoUnitBatch, createHarness, type Harness } from "./helpers";

const U1 = `${BATCH_ID}_unit_1`;
const TOKEN = `extraction__${U1}`;
const RECORD_KEY = `batches/${BATCH_ID}/records/${U1}/${TOKEN}_0.json`;
const JOB_DATA = { batch_id: BATCH_ID, unit_id: U1, artifact_key: `batches/${BATCH_ID}/units/${U1}.pdf` };

describe("handleExtractionJob", () => {
  let harness: Harness;
  let recognize: Mock<RecognitionClient["recognize"]>;
  let deps: ExtractionDeps;

  beforeEach(async () => {
    harness = createHarness();
    await admitTwoUnitBatch(harness);
    recognize = vi.fn<RecognitionClient["recognize"]>(async (text) =>
      normalizeExtraction({ numero_oficio: "OF-1", texto_completo: text }),
    );
    deps = {
      store: harness.store,
      objects: harness.objects,
      codec: harness.codec,
      recognition: { recognize },
      queues: harness.queues,
      logger: createSilentLogger(),
      maxAttempts: 3,
      now: () => T0,
    };
  });

  it("extracts the unit, stores the record and hands it to integration", async () => {
    const outcome = await handleExtractionJob(deps, JOB_DATA, TOKEN);

    expect(outcome).toEqual({
      status: "completed",
      unit_id: U1,
      details: { extraction_record_key: RECORD_KEY, integration_enqueued: true },
    });
    expect(recognize).toHaveBeenCalledWith("cantidad_oficios: 2\nempresa: Acme\nOficio 1 dirigido al banco", {
      unitId: U1,
    });

    const unit = await harness.store.getUnit(U1);
    expect(unit?.ingestion_status).toBe("completed");
    expect(unit?.extraction_status).toBe("completed");
    expect(unit?.integration_status).toBe("pending");
    expect(unit?.extraction_record_key).toBe(RECORD_KEY);

    const stored = await getJson(harness.objects, RECORD_KEY, (value) => value);
    expect(stored).toMatchObject({
      batch_id: BATCH_ID,
      unit_id: U1,
      produced_at: "2024-05-02T10:00:00.000Z",
      record: { numero_oficio: "OF-1" },
    });

    expect(harness.queues.integration.jobs).toEqual([
      {
        jobId: `integration__${U1}`,
        data: { batch_id: BATCH_ID, unit_id: U1, extraction_record_key: RECORD_KEY },
      },
    ]);
  });

  it("acknowledges a duplicate delivery without repeating the work", async () => {
    await handleExtractionJob(deps, JOB_DATA, TOKEN);
    const before = await harness.store.getUnit(U1);

    const outcome = await handleExtractionJob(deps, JOB_DATA, TOKEN);

    expect(outcome).toEqual({
      status: "skipped",
      unit_id: U1,
      reason: "already_completed",
      details: { integration_enqueued: false },
    });
    expect(recognize).toHaveBeenCalledTimes(1);
    expect(await harness.store.getUnit(U1)).toEqual(before);
    expect(harness.queues.integration.jobs).toHaveLength(1);
  });

  it("leaves a unit claimed by another delivery alone", async () => {
    await harness.store.claimUnit(BATCH_ID, U1, "extraction", "other-delivery");

    const outcome = await handleExtractionJob(deps, JOB_DATA, TOKEN);

    expect(outcome).toEqual({ status: "skipped", unit_id: U1, reason: "stale" });
    expect(recognize).not.toHaveBeenCalled();
  });

  it("re-arms on redelivery and dead-letters after the last attempt", async () => {
    recognize.mockRejectedValue(new ExternalServiceError("recognition", "HTTP 503", 503));

    for (let attempt = 1; attempt <= 3; attempt += 1) {
      await expect(handleExtractionJob(deps, JOB_DATA, TOKEN)).rejects.toThrow("recognition: HTTP 503");
    }

    const failed = await harness.store.getUnit(U1);
    expect(failed?.extraction_status).toBe("error");
    expect(failed?.retries.extraction).toBe(2);
    expect(failed?.error_message).toBe("recognition: HTTP 503");
    expect(failed?.error_dimension).toBe("extraction");
    expect(recognize).toHaveBeenCalledTimes(3);

    const deadLettered = await routeToDeadLetter(
      { deadLetter: harness.queues.deadLetter, logger: createSilentLogger(), now: () => T0 },
      QUEUE_NAMES.extraction,
      { id: TOKEN, name: JOB_NAMES.extractUnit, data: JOB_DATA, attemptsMade: 3, opts: { attempts: 3 } },
      new Error("recognition: HTTP 503"),
    );

    expect(deadLettered).toBe(true);
    expect(harness.queues.deadLetter.jobs).toEqual([
      {
        jobId: `dead__q-extraction__${TOKEN}`,
        data: {
          source_queue: "q-extraction",
          job_id: TOKEN,
          job_name: "extract_unit",
          batch_id: BATCH_ID,
          unit_id: U1,
          attempts_made: 3,
          failed_reason: "recognition: HTTP 503",
          failed_at: "2024-05-02T10:00:00.000Z",
          payload: JOB_DATA,
        },
      },
    ]);
    expect(harness.queues.integration.jobs).toEqual([]);

    const late = await handleExtractionJob(deps, JOB_DATA, TOKEN);
    expect(late).toEqual({
      status: "skipped",
      unit_id: U1,
      reason: "attempts_exhausted",
      details: { dimension: "extraction" },
    });
  });

  it("refuses to store a record that does not match the stored-record schema", async () => {
    const base = normalizeExtraction({ numero_oficio: "OF-1" });
    recognize.mockResolvedValue({
      ...base,
      personas: [{ nombres: "Ana", apellidos: "López", identificacion: "", monto: 0, expediente: "", secuencia: 1.5 }],
    });

    await expect(handleExtractionJob(deps, JOB_DATA, TOKEN)).rejects.toThrow();

    const unit = await harness.store.getUnit(U1);
    expect(unit?.extraction_status).toBe("error");
    expect(unit?.error_dimension).toBe("extraction");
    expect(unit?.extraction_record_key).toBeNull();
    expect(await harness.objects.exists(RECORD_KEY)).toBe(false);
    expect(harness.queues.integration.jobs).toEqual([]);
  });

  it("records an ingestion error when the unit artifact is missing", async () => {
    await harness.objects.delete(JOB_DATA.artifact_key);

    await expect(handleExtractionJob(deps, JOB_DATA, TOKEN)).rejects.toThrow(
      `Storage failure for ${JOB_DATA.artifact_key}: object does not exist`,
    );

    const unit = await harness.store.getUnit(U1);
    expect(unit?.ingestion_status).toBe("error");
    expect(unit?.extraction_status).toBe("error");
    expect(recognize).not.toHaveBeenCalled();
  });

  it("rejects jobs for units it does not know", async () => {
    await expect(
      handleExtractionJob(deps, { ...JOB_DATA, unit_id: `${BATCH_ID}_unit_9` }, TOKEN),
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      handleExtractionJob(deps, { ...JOB_DATA, batch_id: "batch_other" }, TOKEN),
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
