import JSZip from "jszip";
import mammoth from "mammoth";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import type { PageData } from "pdf-parse/lib/pdf-parse.js";
import { parse as parseCsvSync } from "csv-parse/sync";
import { stringify as stringifyCsvSync } from "csv-stringify/sync";
import { ValidationError } from "../utils/errors";

export interface PdfText {
  text: string;
  /** Text of each page, in order. */
  pages: string[];
}

/** Lines of one page, breaking wherever the baseline moves. */
async function renderPageText(page: PageData): Promise<string> {
  const content = await page.getTextContent({
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });

  let text = "";
  let lastY: number | undefined;
  for (const item of content.items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

/**
 * Text of each page, captured as pdf-parse renders it, so blank lines
 * inside a page never shift page boundaries.
 */
export async function extractPdfText(data: Uint8Array): Promise<PdfText> {
  const rendered = new Map<number, string>();
  const result = await pdfParse(Buffer.from(data), {
    pagerender: async (page) => {
      const text = await renderPageText(page);
      rendered.set(page.pageIndex, text);
      return text;
    },
  });

  const pages = Array.from({ length: result.numpages }, (_, index) =>
    (rendered.get(index) ?? "").replace(/\r\n/g, "\n").trim(),
  );
  return { text: pages.join("\n\n").trim(), pages };
}

/** Blank-line separated blocks, trimmed, empties dropped. */
export function toParagraphs(text: string): string[] {
  return text
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export async function extractDocxParagraphs(data: Uint8Array): Promise<string[]> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(data) });
  return toParagraphs(result.value);
}

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function decodeXml(text: string): string {
  return text
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(parseInt(code, 10)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_, code: string) => String.fromCodePoint(parseInt(code, 16)))
    .replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

/**
 * Text of each slide of a .pptx, in slide order. Runs within a paragraph
 * are joined; paragraphs become lines.
 */
export async function extractPptxSlides(data: Uint8Array): Promise<string[]> {
  const zip = await JSZip.loadAsync(data);
  const slides = Object.keys(zip.files)
    .map((name) => ({ name, match: /^ppt\/slides\/slide(\d+)\.xml$/.exec(name) }))
    .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
    .sort((a, b) => parseInt(a.match[1], 10) - parseInt(b.match[1], 10));

  if (slides.length === 0) {
    throw new ValidationError("Presentation contains no slides");
  }

  const texts: string[] = [];
  for (const { name } of slides) {
    const file = zip.file(name);
    const xml = file ? await file.async("string") : "";
    const paragraphs = xml
      .split(/<\/a:p>/)
      .map((chunk) =>
        [...chunk.matchAll(/<a:t(?:\s[^>]*)?>([\s\S]*?)<\/a:t>/g)].map((m) => decodeXml(m[1])).join(""),
      )
      .filter((line) => line.trim().length > 0);
    texts.push(paragraphs.join("\n"));
  }
  return texts;
}

/**
 * Rows of a table recovered from extracted text: cells are separated by
 * tabs or runs of two or more spaces, and only lines with at least two
 * cells count.
 */
export function rowsFromText(text: string): string[][] {
  return text
    .replace(/\r\n/g, "\n")
    .split("\n")
    .map((line) =>
      line
        .trim()
        .split(/\t+| {2,}/)
        .map((cell) => cell.trim())
        .filter((cell) => cell.length > 0),
    )
    .filter((cells) => cells.length >= 2);
}

export function parseCsv(data: Uint8Array): string[][] {
  const records: unknown = parseCsvSync(Buffer.from(data), {
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  });
  if (!Array.isArray(records)) {
    throw new ValidationError("CSV file could not be read");
  }
  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? "")) : [String(record)],
  );
}

export function toCsv(rows: string[][]): string {
  return stringifyCsvSync(rows);
}
