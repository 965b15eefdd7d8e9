import { NotFoundError, StaleStatusError, errorMessage } from "@oficios/core/errors";
import type { RecognitionClient } from "@oficios/core/extraction/recognitionClient";
import { parseStoredExtractionRecord } from "@oficios/core/extraction/recordSchema";
import type { DocumentCodec } from "@oficios/core/pdf/pdfCodec";
import { extractionRecordKey } from "@oficios/core/storage/keys";
import { putJson, type ObjectStore } from "@oficios/core/storage/objectStore";
import type { StoredExtractionRecord, UnitRecord } from "@oficios/core/types";
import { integrationJobId, type ExtractionJobData, type StageQueues } from "../queues";
import { rearmForRedelivery, skipped, type StageContext, type StageOutcome } from "./stageSupport";

export interface ExtractionDeps extends StageContext {
  objects: ObjectStore;
  codec: Pick<DocumentCodec, "readText">;
  recognition: RecognitionClient;
  queues: Pick<StageQueues, "integration">;
  now?: () => Date;
}

/** Hands a completed unit to integration; the deterministic job id makes repeats no-ops. */
export async function enqueueIntegrationIfPending(
  deps: Pick<ExtractionDeps, "queues" | "logger">,
  unit: UnitRecord,
): Promise<boolean> {
  if (unit.integration_status !== "pending" || !unit.extraction_record_key) {
    return false;
  }

  const result = await deps.queues.integration.enqueue(
    {
      batch_id: unit.batch_id,
      unit_id: unit.unit_id,
      extraction_record_key: unit.extraction_record_key,
    },
    integrationJobId(unit.unit_id, unit.retries.integration),
  );

  deps.logger.debug(
    { batch_id: unit.batch_id, unit_id: unit.unit_id, enqueued: result.enqueued, reason: result.reason },
    "Integration enqueue",
  );
  return result.enqueued;
}

// Ingestion is tracked around the read of the unit artifact.
async function readUnitArtifact(deps: ExtractionDeps, unit: UnitRecord, token: string): Promise<Uint8Array> {
  if (unit.ingestion_status === "completed") {
    return deps.objects.get(unit.artifact_key);
  }

  await deps.store.claimUnit(unit.batch_id, unit.unit_id, "ingestion", token);
  try {
    const content = await deps.objects.get(unit.artifact_key);
    await deps.store.advanceUnitStatus(unit.batch_id, unit.unit_id, "ingestion", "processing", "completed");
    return content;
  } catch (error) {
    if (!(error instanceof StaleStatusError)) {
      await deps.store.recordError(unit.batch_id, unit.unit_id, "ingestion", errorMessage(error));
    }
    throw error;
  }
}

export async function handleExtractionJob(
  deps: ExtractionDeps,
  data: ExtractionJobData,
  token: string,
): Promise<StageOutcome> {
  const now = deps.now ?? (() => new Date());
  const unit = await deps.store.getUnit(data.unit_id);
  if (!unit || unit.batch_id !== data.batch_id) {
    throw new NotFoundError("unit", data.unit_id);
  }

  if (unit.extraction_status === "completed") {
    const integrationEnqueued = await enqueueIntegrationIfPending(deps, unit);
    return skipped(unit.unit_id, "already_completed", { integration_enqueued: integrationEnqueued });
  }

  for (const dimension of ["ingestion", "extraction"] as const) {
    const refusal = await rearmForRedelivery(deps, unit, dimension, token);
    if (refusal) {
      return skipped(unit.unit_id, refusal, { dimension });
    }
  }

  let claimed: UnitRecord;
  try {
    claimed = (await deps.store.claimUnit(unit.batch_id, unit.unit_id, "extraction", token)).unit;
  } catch (error) {
    if (error instanceof StaleStatusError) {
      deps.logger.info(
        { batch_id: unit.batch_id, unit_id: unit.unit_id, actual: error.actual },
        "Extraction claim lost; acknowledging",
      );
      return skipped(unit.unit_id, "stale");
    }
    throw error;
  }

  let completed: UnitRecord;
  try {
    const artifact = await readUnitArtifact(deps, claimed, token);
    const text = await deps.codec.readText(artifact);
    const record = await deps.recognition.recognize(text, { unitId: claimed.unit_id });

    const recordKey = extractionRecordKey(
      claimed.batch_id,
      claimed.unit_id,
      `${token}_${claimed.retries.extraction}`,
    );
    const stored: StoredExtractionRecord = parseStoredExtractionRecord({
      batch_id: claimed.batch_id,
      unit_id: claimed.unit_id,
      produced_at: now().toISOString(),
      record,
    });
    await putJson(deps.objects, recordKey, stored);

    completed = await deps.store.advanceUnitStatus(
      claimed.batch_id,
      claimed.unit_id,
      "extraction",
      "processing",
      "completed",
      { extraction_record_key: recordKey },
    );
  } catch (error) {
    if (error instanceof StaleStatusError) {
      deps.logger.info(
        { batch_id: claimed.batch_id, unit_id: claimed.unit_id, dimension: error.dimension },
        "Extraction superseded; acknowledging",
      );
      return skipped(claimed.unit_id, "stale");
    }

    await deps.store.recordError(claimed.batch_id, claimed.unit_id, "extraction", errorMessage(error));
    throw error;
  }

  const integrationEnqueued = await enqueueIntegrationIfPending(deps, completed);
  return {
    status: "completed",
    unit_id: completed.unit_id,
    details: {
      extraction_record_key: completed.extraction_record_key,
      integration_enqueued: integrationEnqueued,
    },
  };
}
