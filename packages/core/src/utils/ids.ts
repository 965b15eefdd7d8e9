import { randomBytes } from "node:crypto";

const UNIT_ID_PATTERN = /^(.+)_unit_(\d+)$/;

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

export function buildBatchId(now: Date, suffix = randomBytes(4).toString("hex")): string {
  const day = `${now.getUTCFullYear()}${pad2(now.getUTCMonth() + 1)}${pad2(now.getUTCDate())}`;
  const time = `${pad2(now.getUTCHours())}${pad2(now.getUTCMinutes())}${pad2(now.getUTCSeconds())}`;
  return `batch_${day}_${time}_${suffix}`;
}

export function buildUnitId(batchId: string, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new Error(`Unit sequence must be a positive integer. Received: ${sequence}`);
  }
  return `${batchId}_unit_${sequence}`;
}

export function parseUnitId(unitId: string): { batchId: string; sequence: number } | null {
  const match = UNIT_ID_PATTERN.exec(unitId);
  if (!match) {
    return null;
  }

  return {
    batchId: match[1],
    sequence: Number.parseInt(match[2], 10),
  };
}
