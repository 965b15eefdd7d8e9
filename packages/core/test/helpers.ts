import type { BatchRecord, ExtractionRecord, UnitRecord } from "../src/types";
import { emptyClaims, zeroCounters } from "../src/types";
import { buildUnitId } from "../src/utils/ids";

export const T0 = new Date("2024-05-02T10:00:00.000Z");

export function buildBatchFixture(
  batchId: string,
  unitCount: number,
  createdAt: Date = T0,
): { batch: BatchRecord; units: UnitRecord[] } {
  const batch: BatchRecord = {
    batch_id: batchId,
    declared_count: unitCount,
    actual_count: unitCount,
    channel: "email",
    source_location: `inbox/${batchId}.pdf`,
    metadata: { empresa: "Acme", origen: null, observaciones: null, operador: "tester" },
    warnings: [],
    created_at: createdAt,
  };

  const units = Array.from({ length: unitCount }, (_, index): UnitRecord => {
    const sequence = index + 1;
    const unitId = buildUnitId(batchId, sequence);
    return {
      batch_id: batchId,
      unit_id: unitId,
      sequence,
      page_range: [index, index],
      ingestion_status: "pending",
      extraction_status: "pending",
      integration_status: "pending",
      artifact_key: `batches/${batchId}/units/${unitId}.pdf`,
      extraction_record_key: null,
      crm_case_id: null,
      error_message: null,
      error_dimension: null,
      claims: emptyClaims(),
      retries: zeroCounters(),
      created_at: createdAt,
      updated_at: createdAt,
      completed_at: null,
    };
  });

  return { batch, units };
}

/** Clock that advances one second per call. */
export function steppingClock(start: Date = T0): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
}

export function emptyRecord(overrides: Partial<ExtractionRecord> = {}): ExtractionRecord {
  return {
    numero_oficio: "",
    autoridad: "",
    fecha_emision: "",
    fecha_recibido: "",
    oficiado_cliente: "",
    numero_identificacion: "",
    expediente: "",
    fecha_auto: "",
    numero_auto: "",
    monto: 0,
    sucursal_recibido: "",
    carpeta: "",
    vencimiento: "",
    numero_resolucion: "",
    fecha_resolucion: "",
    delito: "",
    sello_autoridad: "",
    tipo_producto: "",
    denunciante: "",
    dirigido_banco: false,
    documento_sensible: false,
    tipo_oficio: "",
    nivel_confianza: "",
    palabras_clave: [],
    texto_completo: "",
    observaciones: "",
    personas: [],
    ...overrides,
  };
}
