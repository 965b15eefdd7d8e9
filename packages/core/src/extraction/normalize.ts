import type { ExtractionRecord, PersonRecord } from "../types";

type Bag = Map<string, unknown>;

// The service has been seen answering with older field names.
const FIELD_ALIASES: Partial<Record<keyof ExtractionRecord, string[]>> = {
  tipo_oficio: ["tipo_oficio_detectado"],
  palabras_clave: ["palabras_clave_encontradas"],
  personas: ["lista_personas"],
  dirigido_banco: ["dirigido_global_bank"],
  denunciante: ["denuciante"],
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Case-insensitive view over an object's own keys. */
function toBag(value: unknown): Bag {
  const bag: Bag = new Map();
  if (!isPlainObject(value)) {
    return bag;
  }
  for (const [key, entry] of Object.entries(value)) {
    const normalized = key.trim().toLowerCase();
    if (!bag.has(normalized)) {
      bag.set(normalized, entry);
    }
  }
  return bag;
}

function lookup(bags: readonly Bag[], names: readonly string[]): unknown {
  for (const bag of bags) {
    for (const name of names) {
      const value = bag.get(name);
      if (value !== undefined && value !== null) {
        return value;
      }
    }
  }
  return undefined;
}

function namesFor(field: keyof ExtractionRecord): string[] {
  return [field, ...(FIELD_ALIASES[field] ?? [])];
}

export function coerceString(value: unknown): string {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.toLowerCase() === "null" ? "" : trimmed;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return "";
}

export function coerceNumber(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "string") {
    const cleaned = value.replace(/B\/\./gi, "").replace(/[$,\s]/g, "");
    if (cleaned.length === 0) {
      return 0;
    }
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function coerceBoolean(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    return normalized === "true" || normalized === "si" || normalized === "sí" || normalized === "yes" || normalized === "1";
  }
  return false;
}

function coerceStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(coerceString).filter((item) => item.length > 0);
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return [];
}

function splitFullName(fullName: string): { nombres: string; apellidos: string } {
  const parts = fullName.split(/\s+/).filter((part) => part.length > 0);
  if (parts.length <= 1) {
    return { nombres: parts[0] ?? "", apellidos: "" };
  }
  // Spanish names usually end in two surnames.
  const surnameCount = parts.length >= 3 ? 2 : 1;
  return {
    nombres: parts.slice(0, parts.length - surnameCount).join(" "),
    apellidos: parts.slice(parts.length - surnameCount).join(" "),
  };
}

function normalizePerson(value: unknown, index: number): PersonRecord {
  const bags = [toBag(value)];
  let nombres = coerceString(lookup(bags, ["nombres", "nombre"]));
  let apellidos = coerceString(lookup(bags, ["apellidos", "apellido"]));

  if (!apellidos) {
    const fullName = coerceString(lookup(bags, ["nombre_completo"])) || nombres;
    ({ nombres, apellidos } = splitFullName(fullName));
  }

  const secuencia = coerceNumber(lookup(bags, ["secuencia"]));

  return {
    nombres,
    apellidos,
    identificacion: coerceString(lookup(bags, ["identificacion", "cedula"])),
    monto: coerceNumber(lookup(bags, ["monto", "monto_numerico"])),
    expediente: coerceString(lookup(bags, ["expediente"])),
    secuencia: Number.isInteger(secuencia) && secuencia > 0 ? secuencia : index + 1,
  };
}

/** Keeps each person's sequence when it is free, otherwise moves it to the lowest unused one. */
function assignUniqueSequences(persons: PersonRecord[]): PersonRecord[] {
  const used = new Set<number>();
  return persons.map((person) => {
    let secuencia = person.secuencia;
    if (used.has(secuencia)) {
      secuencia = 1;
      while (used.has(secuencia)) {
        secuencia += 1;
      }
    }
    used.add(secuencia);
    return secuencia === person.secuencia ? person : { ...person, secuencia };
  });
}

function readPersons(value: unknown): PersonRecord[] {
  // `lista_personas` may come wrapped as { personas: [...], monto_total }.
  const list = Array.isArray(value) ? value : lookup([toBag(value)], ["personas", "lista"]);
  if (!Array.isArray(list)) {
    return [];
  }
  return assignUniqueSequences(list.filter(isPlainObject).map(normalizePerson));
}

/**
 * Maps a recognition payload onto the canonical record. Keys are matched without
 * regard to case, either at the top level or under `informacion_extraida`; missing
 * values default to "" / 0 / false / [].
 */
export function normalizeExtraction(payload: unknown): ExtractionRecord {
  const top = toBag(payload);
  const bags = [toBag(top.get("informacion_extraida")), top];

  const text = (field: keyof ExtractionRecord): string => coerceString(lookup(bags, namesFor(field)));

  return {
    numero_oficio: text("numero_oficio"),
    autoridad: text("autoridad"),
    fecha_emision: text("fecha_emision"),
    fecha_recibido: text("fecha_recibido"),
    oficiado_cliente: text("oficiado_cliente"),
    numero_identificacion: text("numero_identificacion"),
    expediente: text("expediente"),
    fecha_auto: text("fecha_auto"),
    numero_auto: text("numero_auto"),
    monto: coerceNumber(lookup(bags, namesFor("monto"))),
    sucursal_recibido: text("sucursal_recibido"),
    carpeta: text("carpeta"),
    vencimiento: text("vencimiento"),
    numero_resolucion: text("numero_resolucion"),
    fecha_resolucion: text("fecha_resolucion"),
    delito: text("delito"),
    sello_autoridad: text("sello_autoridad"),
    tipo_producto: text("tipo_producto"),
    denunciante: text("denunciante"),
    dirigido_banco: coerceBoolean(lookup(bags, namesFor("dirigido_banco"))),
    documento_sensible: coerceBoolean(lookup(bags, namesFor("documento_sensible"))),
    tipo_oficio: text("tipo_oficio"),
    nivel_confianza: text("nivel_confianza"),
    palabras_clave: coerceStringList(lookup(bags, namesFor("palabras_clave"))),
    texto_completo: text("texto_completo"),
    observaciones: text("observaciones"),
    personas: readPersons(lookup(bags, namesFor("personas"))),
  };
}

/** Pulls the JSON object out of a chat answer that may wrap it in prose or fences. */
export function extractJsonObject(content: string): unknown {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new Error("response does not contain a JSON object");
  }
  return JSON.parse(content.slice(start, end + 1));
}
