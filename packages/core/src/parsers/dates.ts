const DAY_FIRST_REGEX = /^(\d{1,2})[/.-](\d{1,2})[/.-](\d{2}|\d{4})$/;
const ISO_DATE_REGEX = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

function toIsoDay(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${year.toString().padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

// Two-digit years: 69-99 -> 19xx, 00-68 -> 20xx.
function expandYear(raw: string): number {
  const year = Number.parseInt(raw, 10);
  if (raw.length === 4) {
    return year;
  }
  return year >= 69 ? 1900 + year : 2000 + year;
}

/**
 * Normalizes the date spellings found on oficios (dd/mm/yyyy, dd-mm-yyyy, dd.mm.yyyy,
 * yyyy-mm-dd and their two-digit-year variants) to `YYYY-MM-DD`. Returns null when
 * the value is empty or not a real calendar date.
 */
export function normalizeDocumentDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }

  const cleaned = value.replace(/[^\d/.-]/g, "");
  if (cleaned.length === 0) {
    return null;
  }

  const iso = ISO_DATE_REGEX.exec(cleaned);
  if (iso) {
    return toIsoDay(
      Number.parseInt(iso[1], 10),
      Number.parseInt(iso[2], 10),
      Number.parseInt(iso[3], 10),
    );
  }

  const dayFirst = DAY_FIRST_REGEX.exec(cleaned);
  if (dayFirst) {
    return toIsoDay(
      expandYear(dayFirst[3]),
      Number.parseInt(dayFirst[2], 10),
      Number.parseInt(dayFirst[1], 10),
    );
  }

  return null;
}

export function formatDateToIsoDay(value: Date): string {
  return value.toISOString().slice(0, 10);
}
