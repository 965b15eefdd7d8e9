import type { CrmGateway } from "@oficios/core/crm/crmClient";
import { mapRecordToCase, type CrmCaseMapping } from "@oficios/core/crm/mapping";
import { NotFoundError, StaleStatusError, errorMessage } from "@oficios/core/errors";
import { parseStoredExtractionRecord } from "@oficios/core/extraction/recordSchema";
import { getJson, type ObjectStore } from "@oficios/core/storage/objectStore";
import type { UnitRecord } from "@oficios/core/types";
import type { IntegrationJobData } from "../queues";
import { rearmForRedelivery, skipped, type StageContext, type StageOutcome } from "./stageSupport";

export interface IntegrationDeps extends StageContext {
  objects: ObjectStore;
  crm: CrmGateway;
}

export interface CrmSyncResult {
  caseId: string;
  caseCreated: boolean;
  personsCreated: number;
}

/** Lookup-before-create for the case and each person, inside one CRM session. */
export async function syncCaseToCrm(crm: CrmGateway, mapping: CrmCaseMapping): Promise<CrmSyncResult> {
  return crm.withSession(async (session) => {
    const existingCaseId = await session.findCaseByExternalRef(mapping.case.ExternalRef);
    const caseId = existingCaseId ?? (await session.createCase(mapping.case));

    let personsCreated = 0;
    for (const person of mapping.persons) {
      const existingPersonId = await session.findPerson(caseId, person.Sequence);
      if (existingPersonId) {
        continue;
      }
      await session.createPerson(caseId, person);
      personsCreated += 1;
    }

    return { caseId, caseCreated: existingCaseId === null, personsCreated };
  });
}

export async function handleIntegrationJob(
  deps: IntegrationDeps,
  data: IntegrationJobData,
  token: string,
): Promise<StageOutcome> {
  const unit = await deps.store.getUnit(data.unit_id);
  if (!unit || unit.batch_id !== data.batch_id) {
    throw new NotFoundError("unit", data.unit_id);
  }

  if (unit.integration_status === "completed") {
    return skipped(unit.unit_id, "already_completed", { crm_case_id: unit.crm_case_id });
  }

  const refusal = await rearmForRedelivery(deps, unit, "integration", token);
  if (refusal) {
    return skipped(unit.unit_id, refusal, { dimension: "integration" });
  }

  let claimed: UnitRecord;
  try {
    claimed = (await deps.store.claimUnit(unit.batch_id, unit.unit_id, "integration", token)).unit;
  } catch (error) {
    if (error instanceof StaleStatusError) {
      deps.logger.info(
        { batch_id: unit.batch_id, unit_id: unit.unit_id, dimension: error.dimension, actual: error.actual },
        "Integration claim lost; acknowledging",
      );
      return skipped(unit.unit_id, "stale");
    }
    throw error;
  }

  try {
    const recordKey = claimed.extraction_record_key ?? data.extraction_record_key;
    const stored = await getJson(deps.objects, recordKey, parseStoredExtractionRecord);
    const mapping = mapRecordToCase(stored.record, {
      batchId: claimed.batch_id,
      unitId: claimed.unit_id,
    });

    const result = await syncCaseToCrm(deps.crm, mapping);
    await deps.store.advanceUnitStatus(
      claimed.batch_id,
      claimed.unit_id,
      "integration",
      "processing",
      "completed",
      { crm_case_id: result.caseId },
    );

    return {
      status: "completed",
      unit_id: claimed.unit_id,
      details: {
        crm_case_id: result.caseId,
        case_created: result.caseCreated,
        persons_created: result.personsCreated,
      },
    };
  } catch (error) {
    if (error instanceof StaleStatusError) {
      deps.logger.info(
        { batch_id: claimed.batch_id, unit_id: claimed.unit_id },
        "Integration superseded; acknowledging",
      );
      return skipped(claimed.unit_id, "stale");
    }

    await deps.store.recordError(claimed.batch_id, claimed.unit_id, "integration", errorMessage(error));
    throw error;
  }
}
