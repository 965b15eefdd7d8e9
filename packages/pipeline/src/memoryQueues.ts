import type {
  DeadLetterJobData,
  EnqueueResult,
  ExtractionJobData,
  IntegrationJobData,
  StageQueue,
  StageQueues,
} from "./queues";

export interface QueuedJob<Data> {
  jobId: string;
  data: Data;
}

/** Keeps enqueued jobs in memory; used by dry runs and tests. */
export class InMemoryStageQueue<Data> implements StageQueue<Data> {
  readonly jobs: QueuedJob<Data>[] = [];

  async enqueue(data: Data, jobId: string): Promise<EnqueueResult> {
    if (this.jobs.some((job) => job.jobId === jobId)) {
      return { enqueued: false, reason: "duplicate" };
    }

    this.jobs.push({ jobId, data });
    return { enqueued: true };
  }
}

export interface InMemoryStageQueues extends StageQueues {
  extraction: InMemoryStageQueue<ExtractionJobData>;
  integration: InMemoryStageQueue<IntegrationJobData>;
  deadLetter: InMemoryStageQueue<DeadLetterJobData>;
}

export function createInMemoryStageQueues(): InMemoryStageQueues {
  return {
    extraction: new InMemoryStageQueue<ExtractionJobData>(),
    integration: new InMemoryStageQueue<IntegrationJobData>(),
    deadLetter: new InMemoryStageQueue<DeadLetterJobData>(),
  };
}
