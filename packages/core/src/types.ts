import type { StatusDimension, UnitStatus } from "./tracking/stateMachine";

export const BATCH_CHANNELS = ["email", "direct"] as const;
export type BatchChannel = (typeof BATCH_CHANNELS)[number];

export interface BatchMetadata {
  empresa: string;
  origen: string | null;
  observaciones: string | null;
  operador: string | null;
}

export interface BatchRecord {
  batch_id: string;
  declared_count: number;
  actual_count: number;
  channel: BatchChannel;
  source_location: string;
  metadata: BatchMetadata;
  warnings: string[];
  created_at: Date;
}

export type DimensionCounters = Record<StatusDimension, number>;
export type DimensionClaims = Record<StatusDimension, string | null>;

export interface UnitRecord {
  batch_id: string;
  unit_id: string;
  sequence: number;
  page_range: [number, number];
  ingestion_status: UnitStatus;
  extraction_status: UnitStatus;
  integration_status: UnitStatus;
  artifact_key: string;
  extraction_record_key: string | null;
  crm_case_id: string | null;
  error_message: string | null;
  error_dimension: StatusDimension | null;
  claims: DimensionClaims;
  retries: DimensionCounters;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
}

/** Fields the stage workers may set together with a status transition. */
export interface UnitPointerPatch {
  extraction_record_key?: string;
  crm_case_id?: string;
}

export interface PersonRecord {
  nombres: string;
  apellidos: string;
  identificacion: string;
  monto: number;
  expediente: string;
  secuencia: number;
}

export interface ExtractionRecord {
  numero_oficio: string;
  autoridad: string;
  fecha_emision: string;
  fecha_recibido: string;
  oficiado_cliente: string;
  numero_identificacion: string;
  expediente: string;
  fecha_auto: string;
  numero_auto: string;
  monto: number;
  sucursal_recibido: string;
  carpeta: string;
  vencimiento: string;
  numero_resolucion: string;
  fecha_resolucion: string;
  delito: string;
  sello_autoridad: string;
  tipo_producto: string;
  denunciante: string;
  dirigido_banco: boolean;
  documento_sensible: boolean;
  tipo_oficio: string;
  nivel_confianza: string;
  palabras_clave: string[];
  texto_completo: string;
  observaciones: string;
  personas: PersonRecord[];
}

export interface StoredExtractionRecord {
  batch_id: string;
  unit_id: string;
  produced_at: string;
  record: ExtractionRecord;
}

export function zeroCounters(): DimensionCounters {
  return { ingestion: 0, extraction: 0, integration: 0 };
}

export function emptyClaims(): DimensionClaims {
  return { ingestion: null, extraction: null, integration: null };
}
