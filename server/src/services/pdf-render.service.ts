import { PDFDocument, StandardFonts, rgb } from "@cantoo/pdf-lib";
import type { PDFFont, PDFPage } from "@cantoo/pdf-lib";

const PAGE_WIDTH = 612;
const PAGE_HEIGHT = 792;
const MARGIN = 72;
const BODY_SIZE = 11;
const BODY_LEADING = 15;
const TITLE_SIZE = 16;
const PARAGRAPH_GAP = 8;

const TABLE_FONT_SIZE = 9;
const ROW_HEIGHT = 18;
const CELL_PADDING = 4;

const TYPOGRAPHIC: Record<string, string> = {
  "‘": "'",
  "’": "'",
  "“": '"',
  "”": '"',
  "–": "-",
  "—": "-",
  "…": "...",
  "•": "*",
  "\t": "    ",
};

/** Standard fonts only carry WinAnsi; anything else becomes `?`. */
export function toWinAnsi(text: string): string {
  let out = "";
  for (const ch of text.replace(/\r/g, "")) {
    const mapped = TYPOGRAPHIC[ch];
    if (mapped !== undefined) {
      out += mapped;
    } else if (ch === "\n" || /[\x20-\x7E\xA0-\xFF]/.test(ch)) {
      out += ch;
    } else {
      out += "?";
    }
  }
  return out;
}

export function wrapText(
  text: string,
  font: PDFFont,
  size: number,
  maxWidth: number,
): string[] {
  const lines: string[] = [];
  let current = "";

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const candidate = current ? `${current} ${word}` : word;
    if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);

    // a single word wider than the line is hard-broken
    let rest = word;
    while (font.widthOfTextAtSize(rest, size) > maxWidth && rest.length > 1) {
      let cut = rest.length - 1;
      while (cut > 1 && font.widthOfTextAtSize(rest.slice(0, cut), size) > maxWidth) {
        cut--;
      }
      lines.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current) lines.push(current);
  return lines;
}

function fitToWidth(text: string, font: PDFFont, size: number, width: number): string {
  if (font.widthOfTextAtSize(text, size) <= width) return text;
  let cut = text.length;
  while (cut > 0 && font.widthOfTextAtSize(`${text.slice(0, cut)}...`, size) > width) {
    cut--;
  }
  return cut === 0 ? "" : `${text.slice(0, cut)}...`;
}

export interface ParagraphDocument {
  title?: string;
  paragraphs: string[];
}

/** Lays out paragraphs on Letter pages, wrapping and paginating. */
export async function renderParagraphs(content: ParagraphDocument): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const body = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const maxWidth = PAGE_WIDTH - MARGIN * 2;

  let page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;

  const ensureRoom = (height: number) => {
    if (y - height < MARGIN) {
      page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
  };

  if (content.title) {
    for (const line of wrapText(toWinAnsi(content.title), bold, TITLE_SIZE, maxWidth)) {
      ensureRoom(TITLE_SIZE + 6);
      y -= TITLE_SIZE;
      page.drawText(line, { x: MARGIN, y, size: TITLE_SIZE, font: bold });
      y -= 6;
    }
    y -= PARAGRAPH_GAP;
  }

  for (const paragraph of content.paragraphs) {
    const sourceLines = toWinAnsi(paragraph).split("\n");
    for (const sourceLine of sourceLines) {
      for (const line of wrapText(sourceLine, body, BODY_SIZE, maxWidth)) {
        ensureRoom(BODY_LEADING);
        y -= BODY_LEADING;
        page.drawText(line, { x: MARGIN, y, size: BODY_SIZE, font: body });
      }
    }
    y -= PARAGRAPH_GAP;
  }

  return doc.save();
}

/** Width of the widest row, at least one. */
export function columnCount(rows: string[][]): number {
  return rows.reduce((widest, row) => Math.max(widest, row.length), 1);
}

/**
 * Renders rows as a grid. The first row is the header: shaded, bold and
 * repeated on every page.
 */
export async function renderTable(rows: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const body = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);

  if (rows.length === 0) {
    doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    return doc.save();
  }

  const columns = columnCount(rows);
  const landscape = columns > 6;
  const width = landscape ? PAGE_HEIGHT : PAGE_WIDTH;
  const height = landscape ? PAGE_WIDTH : PAGE_HEIGHT;
  const margin = MARGIN / 2;
  const columnWidth = (width - margin * 2) / columns;

  const [header, ...dataRows] = rows;

  const drawRow = (page: PDFPage, cells: string[], top: number, isHeader: boolean) => {
    for (let c = 0; c < columns; c++) {
      const x = margin + c * columnWidth;
      page.drawRectangle({
        x,
        y: top - ROW_HEIGHT,
        width: columnWidth,
        height: ROW_HEIGHT,
        color: isHeader ? rgb(0.5, 0.5, 0.5) : rgb(0.96, 0.96, 0.86),
        borderColor: rgb(0, 0, 0),
        borderWidth: 0.5,
      });
      const font = isHeader ? bold : body;
      const text = fitToWidth(
        toWinAnsi(cells[c] ?? "").replace(/\n/g, " "),
        font,
        TABLE_FONT_SIZE,
        columnWidth - CELL_PADDING * 2,
      );
      if (text) {
        page.drawText(text, {
          x: x + CELL_PADDING,
          y: top - ROW_HEIGHT + (ROW_HEIGHT - TABLE_FONT_SIZE) / 2 + 1,
          size: TABLE_FONT_SIZE,
          font,
          color: isHeader ? rgb(1, 1, 1) : rgb(0, 0, 0),
        });
      }
    }
  };

  const startPage = (): { page: PDFPage; top: number } => {
    const page = doc.addPage([width, height]);
    const top = height - margin;
    drawRow(page, header, top, true);
    return { page, top: top - ROW_HEIGHT };
  };

  let { page, top } = startPage();
  for (const row of dataRows) {
    if (top - ROW_HEIGHT < margin) {
      ({ page, top } = startPage());
    }
    drawRow(page, row, top, false);
    top -= ROW_HEIGHT;
  }

  return doc.save();
}
