import type { Logger } from "pino";
import type { StatusDimension } from "@oficios/core/tracking/stateMachine";
import type { RearmRefusal, TrackingStore } from "@oficios/core/tracking/trackingStore";
import type { UnitRecord } from "@oficios/core/types";

export type SkipReason = "already_completed" | "stale" | Exclude<RearmRefusal, "not_in_error">;

export type StageOutcome =
  | {
      status: "completed";
      unit_id: string;
      details: Record<string, string | number | boolean | null>;
    }
  | {
      status: "skipped";
      unit_id: string;
      reason: SkipReason;
      details?: Record<string, string | number | boolean | null>;
    };

export interface StageContext {
  store: TrackingStore;
  logger: Logger;
  maxAttempts: number;
}

/**
 * A redelivered job finds the dimension it left in `error` on its previous
 * attempt; only that same delivery may put it back to `pending`.
 */
export async function rearmForRedelivery(
  context: StageContext,
  unit: UnitRecord,
  dimension: StatusDimension,
  token: string,
): Promise<Exclude<RearmRefusal, "not_in_error"> | null> {
  const result = await context.store.rearmUnit(unit.batch_id, unit.unit_id, dimension, {
    maxAttempts: context.maxAttempts,
    token,
  });

  if (result.rearmed) {
    context.logger.info(
      {
        batch_id: unit.batch_id,
        unit_id: unit.unit_id,
        dimension,
        retries: result.unit.retries[dimension],
      },
      "Unit re-armed for redelivery",
    );
    return null;
  }

  if (result.reason === "not_in_error") {
    return null;
  }

  context.logger.warn(
    { batch_id: unit.batch_id, unit_id: unit.unit_id, dimension, reason: result.reason },
    "Unit not re-armed",
  );
  return result.reason;
}

export function skipped(
  unitId: string,
  reason: SkipReason,
  details?: Record<string, string | number | boolean | null>,
): StageOutcome {
  return details ? { status: "skipped", unit_id: unitId, reason, details } : { status: "skipped", unit_id: unitId, reason };
}
