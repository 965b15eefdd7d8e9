import { sanitizePathSegment } from "../utils/path";

export function sourceArtifactKey(batchId: string, fileName: string): string {
  return `batches/${sanitizePathSegment(batchId)}/source/${sanitizePathSegment(fileName)}`;
}

export function unitArtifactKey(batchId: string, unitId: string): string {
  return `batches/${sanitizePathSegment(batchId)}/units/${sanitizePathSegment(unitId)}.pdf`;
}

/** Each extraction attempt gets its own object; the unit points at the authoritative one. */
export function extractionRecordKey(batchId: string, unitId: string, attemptToken: string): string {
  return [
    "batches",
    sanitizePathSegment(batchId),
    "records",
    sanitizePathSegment(unitId),
    `${sanitizePathSegment(attemptToken)}.json`,
  ].join("/");
}
