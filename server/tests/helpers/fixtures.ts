/**
 * Document fixtures built in memory for the test suites.
 */

import { PDFDocument, StandardFonts } from "@cantoo/pdf-lib";
import { Document, Packer, Paragraph } from "docx";
import PptxGenJS from "pptxgenjs";

export interface PdfFixtureOptions {
  /** One entry per page; each line is drawn on its own baseline. */
  text?: string[][];
  /** Page widths, so page order can be checked after a transform. */
  widths?: number[];
}

export async function makePdf(pageCount: number, options: PdfFixtureOptions = {}): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);

  for (let i = 0; i < pageCount; i++) {
    const width = options.widths?.[i] ?? 612;
    const page = doc.addPage([width, 792]);
    const lines = options.text?.[i] ?? [];
    lines.forEach((line, n) => {
      page.drawText(line, { x: 50, y: 700 - n * 20, size: 12, font });
    });
  }
  return doc.save();
}

export async function pageWidths(data: Uint8Array): Promise<number[]> {
  const doc = await PDFDocument.load(data);
  return doc.getPages().map((page) => Math.round(page.getSize().width));
}

export async function pageCount(data: Uint8Array): Promise<number> {
  const doc = await PDFDocument.load(data);
  return doc.getPageCount();
}

export async function makeDocx(paragraphs: string[]): Promise<Buffer> {
  const doc = new Document({
    sections: [{ children: paragraphs.map((text) => new Paragraph({ text })) }],
  });
  return Packer.toBuffer(doc);
}

export async function makePptx(slides: string[][]): Promise<Uint8Array> {
  const pptx = new PptxGenJS();
  for (const lines of slides) {
    const slide = pptx.addSlide();
    lines.forEach((line, n) => {
      slide.addText(line, { x: 0.5, y: 0.5 + n * 1.2, w: 8, h: 1 });
    });
  }
  const out = await pptx.write({ outputType: "nodebuffer" });
  if (!(out instanceof Uint8Array)) {
    throw new Error("pptxgenjs did not return a buffer");
  }
  return out;
}
