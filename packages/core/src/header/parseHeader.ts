import { ConfigValidationError } from "../errors";
import type { BatchMetadata } from "../types";

export type HeaderKey = "cantidad_oficios" | "empresa" | "origen" | "observaciones" | "operador";

const KEY_ALIASES = new Map<string, HeaderKey>([
  ["cantidad_oficios", "cantidad_oficios"],
  ["total_oficios", "cantidad_oficios"],
  ["cantidad", "cantidad_oficios"],
  ["empresa", "empresa"],
  ["cliente", "empresa"],
  ["organizacion", "empresa"],
  ["origen", "origen"],
  ["provincia", "origen"],
  ["ubicacion", "origen"],
  ["observaciones", "observaciones"],
  ["comentarios", "observaciones"],
  ["notas", "observaciones"],
  ["operador", "operador"],
  ["procesado_por", "operador"],
  ["usuario", "operador"],
]);

// Above this a batch is still admitted, but flagged.
export const LARGE_BATCH_WARNING_THRESHOLD = 1000;

// One or two words followed by ':' or '='. Several pairs may share a line.
const KEY_PATTERN = /([\p{L}_-]+(?:[ \t]+[\p{L}_-]+)?)[ \t]*[:=]/gu;
const NAMING_HINT_PATTERN = /^[a-zA-ZáéíóúÁÉÍÓÚñÑ]+/;

export interface BatchHeader {
  declaredCount: number;
  metadata: BatchMetadata;
  warnings: string[];
}

export interface ParseHeaderOptions {
  /** Usually the artifact's file name; its leading letters name the operator. */
  namingHint?: string;
}

export function normalizeHeaderKey(raw: string): string {
  return raw
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .toLowerCase()
    .replace(/[\s-]+/g, "_");
}

interface KeyMarker {
  key: HeaderKey;
  start: number;
  valueStart: number;
}

function resolveKey(candidate: string): { key: HeaderKey; offset: number } | null {
  const whole = KEY_ALIASES.get(normalizeHeaderKey(candidate));
  if (whole) {
    return { key: whole, offset: 0 };
  }
  // "Acme empresa:" only names the last word.
  const lastSpace = candidate.search(/[ \t]+[^ \t]+$/);
  if (lastSpace < 0) {
    return null;
  }
  const lastWord = candidate.slice(lastSpace).trimStart();
  const key = KEY_ALIASES.get(normalizeHeaderKey(lastWord));
  return key ? { key, offset: candidate.length - lastWord.length } : null;
}

function keyMarkers(line: string): KeyMarker[] {
  const markers: KeyMarker[] = [];
  for (const match of line.matchAll(KEY_PATTERN)) {
    const resolved = resolveKey(match[1]);
    if (resolved && match.index !== undefined) {
      markers.push({
        key: resolved.key,
        start: match.index + resolved.offset,
        valueStart: match.index + match[0].length,
      });
    }
  }
  return markers;
}

export function readHeaderFields(text: string): Map<HeaderKey, string> {
  const fields = new Map<HeaderKey, string>();

  for (const line of text.split(/\r?\n/)) {
    const markers = keyMarkers(line);
    markers.forEach((marker, index) => {
      if (fields.has(marker.key)) {
        return;
      }
      const valueEnd = markers[index + 1]?.start ?? line.length;
      const value = line
        .slice(marker.valueStart, valueEnd)
        .trim()
        .replace(/[,;]+$/, "")
        .trim();
      fields.set(marker.key, value);
    });
  }

  return fields;
}

export function operatorFromNamingHint(hint: string | undefined): string | null {
  if (!hint) {
    return null;
  }

  const match = NAMING_HINT_PATTERN.exec(hint.trim());
  return match ? match[0] : null;
}

function optionalValue(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function parseBatchHeader(text: string, options: ParseHeaderOptions = {}): BatchHeader {
  const fields = readHeaderFields(text);
  const problems: string[] = [];

  const rawCount = fields.get("cantidad_oficios");
  let declaredCount = 0;
  if (rawCount === undefined) {
    problems.push("cantidad_oficios is required");
  } else if (!/^\d+$/.test(rawCount.trim())) {
    problems.push(`cantidad_oficios must be a positive integer. Received: ${rawCount}`);
  } else {
    declaredCount = Number.parseInt(rawCount.trim(), 10);
    if (declaredCount <= 0) {
      problems.push(`cantidad_oficios must be greater than zero. Received: ${rawCount}`);
    }
  }

  const empresa = optionalValue(fields.get("empresa"));
  if (!empresa) {
    problems.push("empresa is required");
  }

  if (problems.length > 0 || !empresa) {
    throw new ConfigValidationError(problems);
  }

  const warnings: string[] = [];
  if (declaredCount > LARGE_BATCH_WARNING_THRESHOLD) {
    warnings.push(`cantidad_oficios ${declaredCount} exceeds ${LARGE_BATCH_WARNING_THRESHOLD}`);
  }

  return {
    declaredCount,
    metadata: {
      empresa,
      origen: optionalValue(fields.get("origen")),
      observaciones: optionalValue(fields.get("observaciones")),
      operador: optionalValue(fields.get("operador")) ?? operatorFromNamingHint(options.namingHint),
    },
    warnings,
  };
}
