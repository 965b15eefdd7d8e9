import { UnrecoverableError } from "bullmq";
import type { Logger } from "pino";
import {
  ConfigValidationError,
  ExternalServiceError,
  InvalidTransitionError,
  NotFoundError,
  errorMessage,
} from "@oficios/core/errors";
import {
  safeJobIdPart,
  type DeadLetterJobData,
  type ExtractionJobData,
  type IntegrationJobData,
  type StageQueue,
  type StageQueueName,
} from "./queues";

export interface FailedStageJob {
  id?: string;
  name: string;
  data: ExtractionJobData | IntegrationJobData | undefined;
  attemptsMade: number;
  opts: { attempts?: number };
}

const UNRECOVERABLE_ERROR_NAME = "UnrecoverableError";

/** Errors that no retry can fix skip the remaining queue attempts. */
export function toQueueError(error: unknown): Error {
  const permanent =
    error instanceof NotFoundError ||
    error instanceof InvalidTransitionError ||
    error instanceof ConfigValidationError ||
    (error instanceof ExternalServiceError && !error.retryable);

  if (permanent) {
    return new UnrecoverableError(error.message);
  }

  return error instanceof Error ? error : new Error(errorMessage(error));
}

export function isFinalFailure(job: FailedStageJob, error: Error): boolean {
  if (error.name === UNRECOVERABLE_ERROR_NAME) {
    return true;
  }
  return job.attemptsMade >= (job.opts.attempts ?? 1);
}

export function deadLetterJobId(sourceQueue: StageQueueName, jobId: string | undefined): string {
  return `dead__${safeJobIdPart(sourceQueue)}__${safeJobIdPart(jobId ?? "unknown")}`;
}

/**
 * Copies a job that exhausted its attempts into the dead-letter queue.
 * Returns false when the job still has attempts left.
 */
export async function routeToDeadLetter(
  deps: { deadLetter: StageQueue<DeadLetterJobData>; logger: Logger; now?: () => Date },
  sourceQueue: StageQueueName,
  job: FailedStageJob,
  error: Error,
): Promise<boolean> {
  if (!isFinalFailure(job, error)) {
    return false;
  }

  const now = deps.now ?? (() => new Date());
  const entry: DeadLetterJobData = {
    source_queue: sourceQueue,
    job_id: job.id ?? null,
    job_name: job.name,
    batch_id: job.data?.batch_id ?? null,
    unit_id: job.data?.unit_id ?? null,
    attempts_made: job.attemptsMade,
    failed_reason: error.message,
    failed_at: now().toISOString(),
    payload: job.data ?? null,
  };

  const result = await deps.deadLetter.enqueue(entry, deadLetterJobId(sourceQueue, job.id));
  deps.logger.error(
    {
      queue: sourceQueue,
      jobId: job.id,
      batch_id: entry.batch_id,
      unit_id: entry.unit_id,
      attempts_made: entry.attempts_made,
      enqueued: result.enqueued,
      err: entry.failed_reason,
    },
    "Job dead-lettered",
  );
  return true;
}
