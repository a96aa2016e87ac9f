import { ValidationError } from "./errors";

export interface PageRange {
  /** 1-based, inclusive */
  start: number;
  end: number;
}

const TOKEN = /^(\d+)(?:\s*-\s*(\d+))?$/;

/**
 * Parses `1-3,5,7-8` into ranges, checked against the page count.
 * Ranges keep their written order; overlaps are allowed.
 */
export function parseRanges(spec: string, pageCount: number): PageRange[] {
  const tokens = spec
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);

  if (tokens.length === 0) {
    throw new ValidationError("Page range is empty");
  }

  return tokens.map((token) => {
    const match = TOKEN.exec(token);
    if (!match) {
      throw new ValidationError(`Invalid page range: ${token}`);
    }
    const start = parseInt(match[1], 10);
    const end = match[2] === undefined ? start : parseInt(match[2], 10);

    if (start < 1 || end < start) {
      throw new ValidationError(`Invalid page range: ${token}`);
    }
    if (end > pageCount) {
      throw new ValidationError(
        `Page range ${token} exceeds page count (${pageCount})`,
      );
    }
    return { start, end };
  });
}

/**
 * Resolves a page selector (`all`, `odd`, `even` or a range list) to
 * sorted, de-duplicated zero-based page indices.
 */
export function selectPages(selector: string, pageCount: number): number[] {
  const normalized = selector.trim().toLowerCase();
  const all = Array.from({ length: pageCount }, (_, i) => i);

  switch (normalized) {
    case "":
    case "all":
      return all;
    case "odd":
      return all.filter((i) => (i + 1) % 2 === 1);
    case "even":
      return all.filter((i) => (i + 1) % 2 === 0);
    default: {
      const picked = new Set<number>();
      for (const range of parseRanges(normalized, pageCount)) {
        for (let page = range.start; page <= range.end; page++) {
          picked.add(page - 1);
        }
      }
      return [...picked].sort((a, b) => a - b);
    }
  }
}
