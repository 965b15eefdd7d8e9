import type { Logger } from "pino";
import type { ReapedDimension, TrackingStore } from "@oficios/core/tracking/trackingStore";

export interface ReapReport {
  older_than: string;
  reaped: ReapedDimension[];
}

/** Units left in `processing` past the lease become `error`, and thus retryable. */
export async function reapStaleUnits(
  deps: { store: TrackingStore; logger: Logger; now?: () => Date },
  olderThanMinutes: number,
): Promise<ReapReport> {
  const now = deps.now ?? (() => new Date());
  const olderThan = new Date(now().getTime() - olderThanMinutes * 60_000);
  const reaped = await deps.store.reapStaleProcessing(olderThan);

  for (const entry of reaped) {
    deps.logger.warn(entry, "Processing lease expired");
  }

  return { older_than: olderThan.toISOString(), reaped };
}
