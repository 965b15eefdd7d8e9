import { Queue, type JobsOptions } from "bullmq";
import IORedis from "ioredis";

export const QUEUE_NAMES = {
  extraction: "q-extraction",
  integration: "q-integration",
  deadLetter: "q-dead-letter",
} as const;

export type StageQueueName = (typeof QUEUE_NAMES)["extraction" | "integration"];

export const JOB_NAMES = {
  extractUnit: "extract_unit",
  integrateUnit: "integrate_unit",
  deadLetter: "dead_letter",
} as const;

export interface ExtractionJobData {
  batch_id: string;
  unit_id: string;
  artifact_key: string;
}

export interface IntegrationJobData {
  batch_id: string;
  unit_id: string;
  extraction_record_key: string;
}

export interface DeadLetterJobData {
  source_queue: StageQueueName;
  job_id: string | null;
  job_name: string;
  batch_id: string | null;
  unit_id: string | null;
  attempts_made: number;
  failed_reason: string;
  failed_at: string;
  payload: ExtractionJobData | IntegrationJobData | null;
}

export interface EnqueueResult {
  enqueued: boolean;
  reason?: "duplicate";
}

/** Producer side of one queue; job ids are deterministic so a re-send is a no-op. */
export interface StageQueue<Data> {
  enqueue(data: Data, jobId: string): Promise<EnqueueResult>;
}

export interface StageQueues {
  extraction: StageQueue<ExtractionJobData>;
  integration: StageQueue<IntegrationJobData>;
  deadLetter: StageQueue<DeadLetterJobData>;
}

export interface PipelineQueues {
  extraction: Queue;
  integration: Queue;
  deadLetter: Queue;
}

export interface StageJobSettings {
  maxAttempts: number;
  backoffMs: number;
}

export function stageJobOptions(settings: StageJobSettings): JobsOptions {
  return {
    attempts: settings.maxAttempts,
    backoff: {
      type: "exponential",
      delay: settings.backoffMs,
    },
    removeOnComplete: 1000,
    removeOnFail: false,
  };
}

export const DEAD_LETTER_JOB_OPTIONS: JobsOptions = {
  attempts: 1,
  removeOnComplete: false,
  removeOnFail: false,
};

export function safeJobIdPart(value: string): string {
  return value.replace(/[:\s/\\]+/g, "_");
}

export function extractionJobId(unitId: string, retries = 0): string {
  const base = `extraction__${safeJobIdPart(unitId)}`;
  return retries > 0 ? `${base}__r${retries}` : base;
}

export function integrationJobId(unitId: string, retries = 0): string {
  const base = `integration__${safeJobIdPart(unitId)}`;
  return retries > 0 ? `${base}__r${retries}` : base;
}

export function isDuplicateJobError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return /\bjob\b.*\balready exists\b/i.test(error.message);
}

export class BullStageQueue<Data> implements StageQueue<Data> {
  constructor(
    private readonly queue: Queue,
    private readonly jobName: string,
  ) {}

  async enqueue(data: Data, jobId: string): Promise<EnqueueResult> {
    // Queue.add returns the existing job for a known id instead of failing.
    const existing = await this.queue.getJob(jobId);
    if (existing) {
      return { enqueued: false, reason: "duplicate" };
    }

    try {
      await this.queue.add(this.jobName, data, { jobId });
      return { enqueued: true };
    } catch (error) {
      if (isDuplicateJobError(error)) {
        return { enqueued: false, reason: "duplicate" };
      }

      throw error;
    }
  }
}

function parseRedisDb(raw: string | undefined): number {
  if (!raw) {
    return 0;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid REDIS_DB value: ${raw}`);
  }

  return parsed;
}

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export function createRedisConnection(): IORedis {
  const redisUrl = process.env.REDIS_URL;

  if (redisUrl && redisUrl.trim().length > 0) {
    return new IORedis(redisUrl, {
      maxRetriesPerRequest: null,
      enableReadyCheck: true,
    });
  }

  return new IORedis({
    host: process.env.REDIS_HOST ?? "127.0.0.1",
    port: parsePositiveInt(process.env.REDIS_PORT, 6379),
    password: process.env.REDIS_PASSWORD?.trim() || undefined,
    db: parseRedisDb(process.env.REDIS_DB),
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}

export function createPipelineQueues(connection: IORedis, settings: StageJobSettings): PipelineQueues {
  const defaultJobOptions = stageJobOptions(settings);

  return {
    extraction: new Queue(QUEUE_NAMES.extraction, { connection, defaultJobOptions }),
    integration: new Queue(QUEUE_NAMES.integration, { connection, defaultJobOptions }),
    deadLetter: new Queue(QUEUE_NAMES.deadLetter, {
      connection,
      defaultJobOptions: DEAD_LETTER_JOB_OPTIONS,
    }),
  };
}

export function toStageQueues(queues: PipelineQueues): StageQueues {
  return {
    extraction: new BullStageQueue<ExtractionJobData>(queues.extraction, JOB_NAMES.extractUnit),
    integration: new BullStageQueue<IntegrationJobData>(queues.integration, JOB_NAMES.integrateUnit),
    deadLetter: new BullStageQueue<DeadLetterJobData>(queues.deadLetter, JOB_NAMES.deadLetter),
  };
}

export function stageJobSettingsFromEnv(maxAttempts: number): StageJobSettings {
  return {
    maxAttempts,
    backoffMs: parsePositiveInt(process.env.PIPELINE_BACKOFF_MS, 5000),
  };
}

export async function closePipelineQueues(queues: PipelineQueues): Promise<void> {
  await Promise.all([
    queues.extraction.close(),
    queues.integration.close(),
    queues.deadLetter.close(),
  ]);
}
