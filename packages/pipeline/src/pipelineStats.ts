import type { Queue } from "bullmq";
import type { DimensionStatusCounts, TrackingStore } from "@oficios/core/tracking/trackingStore";

export interface QueueSnapshot {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
  prioritized: number;
}

export interface PipelineStatsSnapshot {
  generated_at: string;
  units: DimensionStatusCounts;
  queues: {
    extraction: QueueSnapshot;
    integration: QueueSnapshot;
    dead_letter: QueueSnapshot;
  };
}

async function readQueueSnapshot(queue: Queue): Promise<QueueSnapshot> {
  const counts = await queue.getJobCounts(
    "waiting",
    "active",
    "completed",
    "failed",
    "delayed",
    "paused",
    "prioritized",
  );

  return {
    waiting: counts.waiting ?? 0,
    active: counts.active ?? 0,
    completed: counts.completed ?? 0,
    failed: counts.failed ?? 0,
    delayed: counts.delayed ?? 0,
    paused: counts.paused ?? 0,
    prioritized: counts.prioritized ?? 0,
  };
}

export async function collectPipelineStats(args: {
  store: TrackingStore;
  queues: {
    extraction: Queue;
    integration: Queue;
    deadLetter: Queue;
  };
  now?: () => Date;
}): Promise<PipelineStatsSnapshot> {
  const [units, extraction, integration, deadLetter] = await Promise.all([
    args.store.countByStatus(),
    readQueueSnapshot(args.queues.extraction),
    readQueueSnapshot(args.queues.integration),
    readQueueSnapshot(args.queues.deadLetter),
  ]);

  return {
    generated_at: (args.now ?? (() => new Date()))().toISOString(),
    units,
    queues: {
      extraction,
      integration,
      dead_letter: deadLetter,
    },
  };
}
