const SEPARATOR_MARKERS = ["separador de oficios", "separador", "divisor", "===", "---"];
const SEPARATOR_MAX_CHARS = 200;

export interface SplitUnit {
  sequence: number;
  /** 0-based page indexes in the source artifact, ascending and contiguous. */
  pages: number[];
}

export interface SplitResult {
  mode: "separators" | "pages";
  units: SplitUnit[];
  separatorPages: number[];
}

export interface SplitOptions {
  pagesPerUnit?: number;
}

export function isSeparatorPage(text: string): boolean {
  const normalized = text.trim().toLowerCase();
  if (normalized.length === 0 || normalized.length >= SEPARATOR_MAX_CHARS) {
    return false;
  }

  return SEPARATOR_MARKERS.some((marker) => normalized.includes(marker));
}

function toUnits(runs: number[][]): SplitUnit[] {
  return runs
    .filter((pages) => pages.length > 0)
    .map((pages, index) => ({ sequence: index + 1, pages }));
}

function splitAtSeparators(pageCount: number, separators: Set<number>): number[][] {
  const runs: number[][] = [];
  let current: number[] = [];

  for (let page = 0; page < pageCount; page += 1) {
    if (separators.has(page)) {
      runs.push(current);
      current = [];
      continue;
    }
    current.push(page);
  }
  runs.push(current);

  return runs;
}

function splitByPageCount(pageCount: number, pagesPerUnit: number): number[][] {
  const runs: number[][] = [];
  for (let start = 0; start < pageCount; start += pagesPerUnit) {
    const end = Math.min(start + pagesPerUnit, pageCount);
    runs.push(Array.from({ length: end - start }, (_, offset) => start + offset));
  }
  return runs;
}

/**
 * Decomposes a batch into units from the text of its pages. Count validation is
 * left to the caller; an empty result is possible.
 */
export function splitPages(pageTexts: readonly string[], options: SplitOptions = {}): SplitResult {
  const pagesPerUnit = options.pagesPerUnit ?? 1;
  if (!Number.isInteger(pagesPerUnit) || pagesPerUnit <= 0) {
    throw new Error(`pagesPerUnit must be a positive integer. Received: ${pagesPerUnit}`);
  }

  const separatorPages = pageTexts
    .map((text, index) => (isSeparatorPage(text) ? index : -1))
    .filter((index) => index >= 0);

  if (separatorPages.length > 0) {
    return {
      mode: "separators",
      units: toUnits(splitAtSeparators(pageTexts.length, new Set(separatorPages))),
      separatorPages,
    };
  }

  return {
    mode: "pages",
    units: toUnits(splitByPageCount(pageTexts.length, pagesPerUnit)),
    separatorPages,
  };
}
