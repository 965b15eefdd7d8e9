import path from "node:path";
import pLimit from "p-limit";
import type { Logger } from "pino";
import { CountMismatchError, errorMessage } from "@oficios/core/errors";
import { parseBatchHeader, type BatchHeader } from "@oficios/core/header/parseHeader";
import type { DocumentCodec } from "@oficios/core/pdf/pdfCodec";
import { splitPages, type SplitResult } from "@oficios/core/splitter/splitPages";
import type { ObjectStore } from "@oficios/core/storage/objectStore";
import { sourceArtifactKey, unitArtifactKey } from "@oficios/core/storage/keys";
import type { TrackingStore } from "@oficios/core/tracking/trackingStore";
import { initialStatuses } from "@oficios/core/tracking/stateMachine";
import {
  emptyClaims,
  zeroCounters,
  type BatchChannel,
  type BatchRecord,
  type UnitRecord,
} from "@oficios/core/types";
import { buildBatchId, buildUnitId } from "@oficios/core/utils/ids";
import { extractionJobId, type StageQueues } from "../queues";

export interface AdmissionDeps {
  store: TrackingStore;
  objects: ObjectStore;
  codec: DocumentCodec;
  queues: Pick<StageQueues, "extraction">;
  logger: Logger;
  pagesPerUnit: number;
  writeConcurrency?: number;
  now?: () => Date;
  newBatchId?: (now: Date) => string;
}

export interface AdmissionInput {
  /** Where the artifact came from (mailbox message, upload path). */
  location: string;
  content: Uint8Array;
  channel: BatchChannel;
  namingHint?: string;
}

export interface BatchPlan {
  header: BatchHeader;
  split: SplitResult;
  pageCount: number;
}

export interface AdmissionResult {
  batch_id: string;
  declared_count: number;
  actual_count: number;
  mode: SplitResult["mode"];
  unit_ids: string[];
  warnings: string[];
  enqueued: number;
}

/** Parses the header and splits the artifact; throws before anything is written. */
export async function planBatch(
  codec: DocumentCodec,
  input: AdmissionInput,
  pagesPerUnit: number,
): Promise<BatchPlan> {
  const pageTexts = await codec.readPageTexts(input.content);
  const header = parseBatchHeader(pageTexts[0] ?? "", {
    namingHint: input.namingHint ?? path.basename(input.location),
  });
  const split = splitPages(pageTexts, { pagesPerUnit });

  if (split.units.length === 0 || split.units.length !== header.declaredCount) {
    throw new CountMismatchError(header.declaredCount, split.units.length);
  }

  return { header, split, pageCount: pageTexts.length };
}

function pageRange(pages: readonly number[]): [number, number] {
  const first = pages[0] ?? 0;
  const last = pages[pages.length - 1] ?? first;
  return [first, last];
}

export function buildBatchRecords(args: {
  batchId: string;
  plan: BatchPlan;
  input: AdmissionInput;
  createdAt: Date;
}): { batch: BatchRecord; units: UnitRecord[] } {
  const { batchId, plan, input, createdAt } = args;

  const batch: BatchRecord = {
    batch_id: batchId,
    declared_count: plan.header.declaredCount,
    actual_count: plan.split.units.length,
    channel: input.channel,
    source_location: input.location,
    metadata: plan.header.metadata,
    warnings: plan.header.warnings,
    created_at: createdAt,
  };

  const units = plan.split.units.map((splitUnit): UnitRecord => {
    const unitId = buildUnitId(batchId, splitUnit.sequence);
    const statuses = initialStatuses();
    return {
      batch_id: batchId,
      unit_id: unitId,
      sequence: splitUnit.sequence,
      page_range: pageRange(splitUnit.pages),
      ingestion_status: statuses.ingestion,
      extraction_status: statuses.extraction,
      integration_status: statuses.integration,
      artifact_key: unitArtifactKey(batchId, unitId),
      extraction_record_key: null,
      crm_case_id: null,
      error_message: null,
      error_dimension: null,
      claims: emptyClaims(),
      retries: zeroCounters(),
      created_at: createdAt,
      updated_at: createdAt,
      completed_at: null,
    };
  });

  return { batch, units };
}

async function removeArtifacts(deps: AdmissionDeps, keys: readonly string[]): Promise<void> {
  const results = await Promise.allSettled(keys.map((key) => deps.objects.delete(key)));
  results.forEach((result, index) => {
    if (result.status === "rejected") {
      deps.logger.warn(
        { key: keys[index], err: errorMessage(result.reason) },
        "Could not remove artifact of rejected batch",
      );
    }
  });
}

/**
 * Admits one batch artifact: validate, split, persist artifacts and tracking
 * records, then hand every unit to the extraction queue.
 */
export async function admitBatch(deps: AdmissionDeps, input: AdmissionInput): Promise<AdmissionResult> {
  const now = deps.now ?? (() => new Date());
  const plan = await planBatch(deps.codec, input, deps.pagesPerUnit);

  const createdAt = now();
  const batchId = (deps.newBatchId ?? buildBatchId)(createdAt);
  const { batch, units } = buildBatchRecords({ batchId, plan, input, createdAt });

  const written: string[] = [];
  try {
    const sourceKey = sourceArtifactKey(batchId, path.basename(input.location) || "source.pdf");
    await deps.objects.put(sourceKey, input.content);
    written.push(sourceKey);

    const limiter = pLimit(deps.writeConcurrency ?? 4);
    await Promise.all(
      plan.split.units.map((splitUnit, index) =>
        limiter(async () => {
          const unit = units[index];
          if (!unit) {
            throw new Error(`Missing unit record for sequence ${splitUnit.sequence}`);
          }
          const content = await deps.codec.extractPages(input.content, splitUnit.pages);
          await deps.objects.put(unit.artifact_key, content);
          written.push(unit.artifact_key);
        }),
      ),
    );

    await deps.store.createBatch(batch, units);
  } catch (error) {
    deps.logger.error({ batch_id: batchId, err: errorMessage(error) }, "Batch admission failed");
    await removeArtifacts(deps, written);
    throw error;
  }

  let enqueued = 0;
  for (const unit of units) {
    const result = await deps.queues.extraction.enqueue(
      { batch_id: batchId, unit_id: unit.unit_id, artifact_key: unit.artifact_key },
      extractionJobId(unit.unit_id),
    );
    if (result.enqueued) {
      enqueued += 1;
    }
  }

  deps.logger.info(
    {
      batch_id: batchId,
      declared_count: batch.declared_count,
      actual_count: batch.actual_count,
      mode: plan.split.mode,
      warnings: batch.warnings,
      enqueued,
    },
    "Batch admitted",
  );

  return {
    batch_id: batchId,
    declared_count: batch.declared_count,
    actual_count: batch.actual_count,
    mode: plan.split.mode,
    unit_ids: units.map((unit) => unit.unit_id),
    warnings: batch.warnings,
    enqueued,
  };
}
