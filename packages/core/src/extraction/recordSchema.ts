import { z } from "zod";
import type { StoredExtractionRecord } from "../types";

const personSchema = z.object({
  nombres: z.string(),
  apellidos: z.string(),
  identificacion: z.string(),
  monto: z.number(),
  expediente: z.string(),
  secuencia: z.number().int().positive(),
});

const extractionRecordSchema = z.object({
  numero_oficio: z.string(),
  autoridad: z.string(),
  fecha_emision: z.string(),
  fecha_recibido: z.string(),
  oficiado_cliente: z.string(),
  numero_identificacion: z.string(),
  expediente: z.string(),
  fecha_auto: z.string(),
  numero_auto: z.string(),
  monto: z.number(),
  sucursal_recibido: z.string(),
  carpeta: z.string(),
  vencimiento: z.string(),
  numero_resolucion: z.string(),
  fecha_resolucion: z.string(),
  delito: z.string(),
  sello_autoridad: z.string(),
  tipo_producto: z.string(),
  denunciante: z.string(),
  dirigido_banco: z.boolean(),
  documento_sensible: z.boolean(),
  tipo_oficio: z.string(),
  nivel_confianza: z.string(),
  palabras_clave: z.array(z.string()),
  texto_completo: z.string(),
  observaciones: z.string(),
  personas: z.array(personSchema),
});

export const storedExtractionRecordSchema: z.ZodType<StoredExtractionRecord> = z.object({
  batch_id: z.string().min(1),
  unit_id: z.string().min(1),
  produced_at: z.string(),
  record: extractionRecordSchema,
});

export function parseStoredExtractionRecord(value: unknown): StoredExtractionRecord {
  return storedExtractionRecordSchema.parse(value);
}
