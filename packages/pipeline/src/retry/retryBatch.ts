import type { Logger } from "pino";
import { NotFoundError } from "@oficios/core/errors";
import type { TrackingStore } from "@oficios/core/tracking/trackingStore";
import type { UnitRecord } from "@oficios/core/types";
import { extractionJobId, integrationJobId, type StageQueues } from "../queues";

export type RetryDimension = "extraction" | "integration";

export interface RetryDeps {
  store: TrackingStore;
  queues: Pick<StageQueues, "extraction" | "integration">;
  logger: Logger;
  maxAttempts: number;
}

export interface RetryInput {
  batchId: string;
  dimension: RetryDimension;
  unitId?: string;
}

export interface RetryReport {
  batch_id: string;
  dimension: RetryDimension;
  rearmed: string[];
  requeued: string[];
  exhausted: string[];
  untouched: string[];
}

async function rearm(
  deps: RetryDeps,
  unit: UnitRecord,
  dimension: "ingestion" | RetryDimension,
): Promise<{ unit: UnitRecord; exhausted: boolean }> {
  const result = await deps.store.rearmUnit(unit.batch_id, unit.unit_id, dimension, {
    maxAttempts: deps.maxAttempts,
  });
  return { unit: result.unit, exhausted: !result.rearmed && result.reason === "attempts_exhausted" };
}

async function retryExtraction(deps: RetryDeps, unit: UnitRecord, report: RetryReport): Promise<void> {
  let current = unit;

  if (current.ingestion_status === "error") {
    const ingestion = await rearm(deps, current, "ingestion");
    if (ingestion.exhausted) {
      report.exhausted.push(current.unit_id);
      return;
    }
    current = ingestion.unit;
  }

  if (current.extraction_status === "error") {
    const extraction = await rearm(deps, current, "extraction");
    if (extraction.exhausted) {
      report.exhausted.push(current.unit_id);
      return;
    }
    current = extraction.unit;
    report.rearmed.push(current.unit_id);
  }

  if (current.extraction_status !== "pending") {
    report.untouched.push(current.unit_id);
    return;
  }

  const result = await deps.queues.extraction.enqueue(
    { batch_id: current.batch_id, unit_id: current.unit_id, artifact_key: current.artifact_key },
    extractionJobId(current.unit_id, current.retries.extraction),
  );
  if (result.enqueued) {
    report.requeued.push(current.unit_id);
  }
}

async function retryIntegration(deps: RetryDeps, unit: UnitRecord, report: RetryReport): Promise<void> {
  let current = unit;

  if (current.extraction_status !== "completed" || !current.extraction_record_key) {
    report.untouched.push(current.unit_id);
    return;
  }

  if (current.integration_status === "error") {
    const integration = await rearm(deps, current, "integration");
    if (integration.exhausted) {
      report.exhausted.push(current.unit_id);
      return;
    }
    current = integration.unit;
    report.rearmed.push(current.unit_id);
  }

  if (current.integration_status !== "pending") {
    report.untouched.push(current.unit_id);
    return;
  }

  const result = await deps.queues.integration.enqueue(
    {
      batch_id: current.batch_id,
      unit_id: current.unit_id,
      extraction_record_key: current.extraction_record_key,
    },
    integrationJobId(current.unit_id, current.retries.integration),
  );
  if (result.enqueued) {
    report.requeued.push(current.unit_id);
  }
}

/**
 * Operator retry: re-arms `error` units (within the attempts ceiling) and
 * re-enqueues every unit of the dimension that is back to `pending`.
 */
export async function retryBatch(deps: RetryDeps, input: RetryInput): Promise<RetryReport> {
  const view = await deps.store.getBatchView(input.batchId);
  if (!view) {
    throw new NotFoundError("batch", input.batchId);
  }

  const units = input.unitId
    ? view.units.filter((unit) => unit.unit_id === input.unitId)
    : view.units;
  if (input.unitId && units.length === 0) {
    throw new NotFoundError("unit", input.unitId);
  }

  const report: RetryReport = {
    batch_id: input.batchId,
    dimension: input.dimension,
    rearmed: [],
    requeued: [],
    exhausted: [],
    untouched: [],
  };

  for (const unit of units) {
    if (input.dimension === "extraction") {
      await retryExtraction(deps, unit, report);
    } else {
      await retryIntegration(deps, unit, report);
    }
  }

  deps.logger.info(
    {
      batch_id: input.batchId,
      dimension: input.dimension,
      rearmed: report.rearmed.length,
      requeued: report.requeued.length,
      exhausted: report.exhausted.length,
    },
    "Retry finished",
  );

  return report;
}
