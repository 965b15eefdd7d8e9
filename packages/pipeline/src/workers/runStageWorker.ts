import { Worker, type Job } from "bullmq";
import type IORedis from "ioredis";
import type { Logger } from "pino";
import { errorMessage } from "@oficios/core/errors";
import { routeToDeadLetter, toQueueError } from "../deadLetter";
import {
  parsePositiveInt,
  type ExtractionJobData,
  type IntegrationJobData,
  type StageQueue,
  type DeadLetterJobData,
  type StageQueueName,
} from "../queues";
import type { StageOutcome } from "./stageSupport";

export interface StageWorkerOptions<Data extends ExtractionJobData | IntegrationJobData> {
  queueName: StageQueueName;
  /** Env prefix for concurrency and rate limits, e.g. EXTRACTION. */
  envPrefix: string;
  defaultConcurrency: number;
  connection: IORedis;
  logger: Logger;
  deadLetter: StageQueue<DeadLetterJobData>;
  handle: (data: Data, token: string) => Promise<StageOutcome>;
}

/** BullMQ worker around a stage handler; the job id is the claim token. */
export function startStageWorker<Data extends ExtractionJobData | IntegrationJobData>(
  options: StageWorkerOptions<Data>,
): Worker<Data, StageOutcome> {
  const { queueName, logger } = options;
  const concurrency = parsePositiveInt(
    process.env[`PIPELINE_CONCURRENCY_${options.envPrefix}`],
    options.defaultConcurrency,
  );
  const rateLimitMax = parsePositiveInt(process.env[`PIPELINE_${options.envPrefix}_RATE_LIMIT_MAX`], 0);
  const rateLimitDuration = parsePositiveInt(
    process.env[`PIPELINE_${options.envPrefix}_RATE_LIMIT_DURATION_MS`],
    1000,
  );

  const worker = new Worker<Data, StageOutcome>(
    queueName,
    async (job: Job<Data, StageOutcome>) => {
      if (!job.id) {
        throw new Error(`${job.name} job has no id`);
      }
      if (!job.data?.unit_id || !job.data.batch_id) {
        throw toQueueError(new Error(`${job.name} job missing batch_id/unit_id`));
      }

      try {
        return await options.handle(job.data, job.id);
      } catch (error) {
        throw toQueueError(error);
      }
    },
    {
      connection: options.connection,
      concurrency,
      limiter: rateLimitMax > 0 ? { max: rateLimitMax, duration: rateLimitDuration } : undefined,
    },
  );

  worker.on("completed", (job, outcome) => {
    logger.info(
      {
        queue: queueName,
        jobId: job.id,
        name: job.name,
        batch_id: job.data?.batch_id,
        unit_id: job.data?.unit_id,
        status: outcome.status,
        reason: outcome.status === "skipped" ? outcome.reason : undefined,
      },
      "stage job completed",
    );
  });

  worker.on("failed", (job, error) => {
    logger.error(
      {
        queue: queueName,
        jobId: job?.id,
        name: job?.name,
        batch_id: job?.data?.batch_id,
        unit_id: job?.data?.unit_id,
        attemptsMade: job?.attemptsMade,
        err: error.message,
      },
      "stage job failed",
    );

    if (!job) {
      return;
    }

    routeToDeadLetter({ deadLetter: options.deadLetter, logger }, queueName, job, error).catch(
      (routeError: unknown) => {
        logger.error(
          { queue: queueName, jobId: job.id, err: errorMessage(routeError) },
          "Dead-letter routing failed",
        );
      },
    );
  });

  worker.on("error", (error) => {
    logger.error({ queue: queueName, err: error.message }, "worker error");
  });

  logger.info(
    { queue: queueName, concurrency, rateLimitMax, rateLimitDuration },
    "stage worker started",
  );

  return worker;
}
