import { normalizeDocumentDate } from "../parsers/dates";
import type { ExtractionRecord, PersonRecord } from "../types";

export const URGENT_KEYWORDS = [
  "embargo",
  "secuestro",
  "allanamiento",
  "aprehensión",
  "citación",
  "urgente",
  "inmediato",
] as const;

export const HIGH_PRIORITY_AMOUNT = 50000;
export const FULL_TEXT_LIMIT = 4000;

export type CasePriority = "High" | "Medium";

export interface CrmCasePayload {
  ExternalRef: string;
  BatchId: string;
  Subject: string;
  OficioNumber: string;
  Authority: string;
  IssueDate: string | null;
  ReceivedDate: string | null;
  ResolutionDate: string | null;
  DueDate: string | null;
  AutoDate: string | null;
  AutoNumber: string;
  ResolutionNumber: string;
  ClientTarget: string;
  ClientIdentification: string;
  ExpedientNumber: string;
  Crime: string;
  ProductType: string;
  Complainant: string;
  BranchReceived: string;
  Folder: string;
  AuthorityStamp: string;
  Amount: number;
  Classification: string;
  ConfidenceLevel: string;
  IsSensitive: boolean;
  DirectedToBank: boolean;
  Keywords: string;
  FullText: string;
  Observations: string;
  Priority: CasePriority;
  RequiresUrgentAction: boolean;
  PersonsCount: number;
}

export interface CrmPersonPayload {
  Sequence: number;
  FirstName: string;
  LastName: string;
  FullName: string;
  Identification: string;
  Amount: number;
  ExpedientNumber: string;
}

export interface CrmCaseMapping {
  case: CrmCasePayload;
  persons: CrmPersonPayload[];
}

function normalizeKeyword(keyword: string): string {
  return keyword.trim().toLowerCase();
}

export function hasUrgentKeyword(keywords: readonly string[]): boolean {
  const present = new Set(keywords.map(normalizeKeyword));
  return URGENT_KEYWORDS.some((keyword) => present.has(keyword));
}

export function determinePriority(record: ExtractionRecord): CasePriority {
  if (normalizeDocumentDate(record.vencimiento)) {
    return "High";
  }
  if (hasUrgentKeyword(record.palabras_clave)) {
    return "High";
  }
  if (record.monto > HIGH_PRIORITY_AMOUNT) {
    return "High";
  }
  return "Medium";
}

export function fullName(person: Pick<PersonRecord, "nombres" | "apellidos">): string {
  return `${person.nombres} ${person.apellidos}`.replace(/\s+/g, " ").trim();
}

export function buildSubject(record: ExtractionRecord, unitId: string): string {
  const parts = [record.numero_oficio || unitId, record.autoridad].filter((part) => part.length > 0);
  return `Oficio ${parts.join(" - ")}`;
}

export function mapPerson(person: PersonRecord): CrmPersonPayload {
  return {
    Sequence: person.secuencia,
    FirstName: person.nombres,
    LastName: person.apellidos,
    FullName: fullName(person),
    Identification: person.identificacion,
    Amount: person.monto,
    ExpedientNumber: person.expediente,
  };
}

/** Field-by-field translation of a unit's record into CRM entities; no I/O, no clock. */
export function mapRecordToCase(
  record: ExtractionRecord,
  ids: { batchId: string; unitId: string },
): CrmCaseMapping {
  return {
    case: {
      ExternalRef: ids.unitId,
      BatchId: ids.batchId,
      Subject: buildSubject(record, ids.unitId),
      OficioNumber: record.numero_oficio,
      Authority: record.autoridad,
      IssueDate: normalizeDocumentDate(record.fecha_emision),
      ReceivedDate: normalizeDocumentDate(record.fecha_recibido),
      ResolutionDate: normalizeDocumentDate(record.fecha_resolucion),
      DueDate: normalizeDocumentDate(record.vencimiento),
      AutoDate: normalizeDocumentDate(record.fecha_auto),
      AutoNumber: record.numero_auto,
      ResolutionNumber: record.numero_resolucion,
      ClientTarget: record.oficiado_cliente,
      ClientIdentification: record.numero_identificacion,
      ExpedientNumber: record.expediente,
      Crime: record.delito,
      ProductType: record.tipo_producto,
      Complainant: record.denunciante,
      BranchReceived: record.sucursal_recibido,
      Folder: record.carpeta,
      AuthorityStamp: record.sello_autoridad,
      Amount: record.monto,
      Classification: record.tipo_oficio,
      ConfidenceLevel: record.nivel_confianza,
      IsSensitive: record.documento_sensible,
      DirectedToBank: record.dirigido_banco,
      Keywords: record.palabras_clave.join(", "),
      FullText: record.texto_completo.slice(0, FULL_TEXT_LIMIT),
      Observations: record.observaciones,
      Priority: determinePriority(record),
      RequiresUrgentAction: hasUrgentKeyword(record.palabras_clave),
      PersonsCount: record.personas.length,
    },
    persons: record.personas.map(mapPerson),
  };
}
