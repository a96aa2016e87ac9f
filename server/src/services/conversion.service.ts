import { Document, HeadingLevel, Packer, Paragraph } from "docx";
import PptxGenJS from "pptxgenjs";
import logger from "../utils/logger";
import {
  AppError,
  ProcessingError,
  UnprocessableError,
  ValidationError,
} from "../utils/errors";
import { CONTENT_TYPES } from "../models/processing.model";
import type { InputDocument, ProcessingResult } from "../models/processing.model";
import {
  extractDocxParagraphs,
  extractPdfText,
  extractPptxSlides,
  parseCsv,
  rowsFromText,
  toCsv,
  toParagraphs,
} from "./document-text.service";
import { renderParagraphs, renderTable } from "./pdf-render.service";

export type ConversionType =
  | "pdf_to_docx"
  | "pdf_to_txt"
  | "pdf_to_csv"
  | "pdf_to_pptx"
  | "docx_to_pdf"
  | "txt_to_pdf"
  | "csv_to_pdf"
  | "pptx_to_pdf";

interface Conversion {
  source: readonly string[];
  filename: string;
  contentType: string;
  run(input: InputDocument): Promise<Uint8Array>;
}

const SLIDE_TEXT_LIMIT = 1000;

const ALIASES: Record<string, ConversionType> = {
  pdf_to_word: "pdf_to_docx",
  pdf_to_ppt: "pdf_to_pptx",
  word_to_pdf: "docx_to_pdf",
  ppt_to_pdf: "pptx_to_pdf",
};

function encodeText(text: string): Uint8Array {
  return Buffer.from(text, "utf-8");
}

async function pdfToDocx(input: InputDocument): Promise<Uint8Array> {
  const { pages } = await extractPdfText(input.data);
  const paragraphs = pages.flatMap(toParagraphs);

  const doc = new Document({
    sections: [
      {
        children: [
          new Paragraph({ text: "Converted from PDF", heading: HeadingLevel.TITLE }),
          ...paragraphs.map((text) => new Paragraph({ text })),
        ],
      },
    ],
  });
  return Packer.toBuffer(doc);
}

async function pdfToTxt(input: InputDocument): Promise<Uint8Array> {
  const { pages } = await extractPdfText(input.data);
  return encodeText(`${pages.join("\n\n")}\n`);
}

async function pdfToCsv(input: InputDocument): Promise<Uint8Array> {
  const { text } = await extractPdfText(input.data);
  const rows = rowsFromText(text);
  if (rows.length === 0) {
    throw new UnprocessableError("No tables found in PDF");
  }
  return encodeText(toCsv(rows));
}

async function pdfToPptx(input: InputDocument): Promise<Uint8Array> {
  const { pages } = await extractPdfText(input.data);
  const pptx = new PptxGenJS();

  pages.forEach((text, i) => {
    const slide = pptx.addSlide();
    slide.addText(`Page ${i + 1}`, {
      x: 0.5,
      y: 0.3,
      w: 9,
      h: 0.8,
      fontSize: 28,
      bold: true,
    });
    const body = text.slice(0, SLIDE_TEXT_LIMIT);
    if (body.trim()) {
      slide.addText(body, { x: 0.5, y: 1.2, w: 9, h: 4.2, fontSize: 14, valign: "top" });
    }
  });

  const out = await pptx.write({ outputType: "nodebuffer" });
  if (!(out instanceof Uint8Array)) {
    throw new Error("Unexpected presentation output");
  }
  return out;
}

async function docxToPdf(input: InputDocument): Promise<Uint8Array> {
  return renderParagraphs({ paragraphs: await extractDocxParagraphs(input.data) });
}

async function txtToPdf(input: InputDocument): Promise<Uint8Array> {
  const text = Buffer.from(input.data).toString("utf-8").replace(/^\uFEFF/, "");
  return renderParagraphs({ paragraphs: toParagraphs(text) });
}

async function csvToPdf(input: InputDocument): Promise<Uint8Array> {
  return renderTable(parseCsv(input.data));
}

async function pptxToPdf(input: InputDocument): Promise<Uint8Array> {
  const slides = await extractPptxSlides(input.data);
  const paragraphs = slides.flatMap((text, i) => [`Slide ${i + 1}`, text].filter(Boolean));
  return renderParagraphs({ paragraphs });
}

const CONVERSIONS: Record<ConversionType, Conversion> = {
  pdf_to_docx: {
    source: ["pdf"],
    filename: "converted.docx",
    contentType: CONTENT_TYPES.docx,
    run: pdfToDocx,
  },
  pdf_to_txt: {
    source: ["pdf"],
    filename: "converted.txt",
    contentType: CONTENT_TYPES.txt,
    run: pdfToTxt,
  },
  pdf_to_csv: {
    source: ["pdf"],
    filename: "converted.csv",
    contentType: CONTENT_TYPES.csv,
    run: pdfToCsv,
  },
  pdf_to_pptx: {
    source: ["pdf"],
    filename: "converted.pptx",
    contentType: CONTENT_TYPES.pptx,
    run: pdfToPptx,
  },
  docx_to_pdf: {
    source: ["docx"],
    filename: "converted.pdf",
    contentType: CONTENT_TYPES.pdf,
    run: docxToPdf,
  },
  txt_to_pdf: {
    source: ["txt"],
    filename: "converted.pdf",
    contentType: CONTENT_TYPES.pdf,
    run: txtToPdf,
  },
  csv_to_pdf: {
    source: ["csv"],
    filename: "converted.pdf",
    contentType: CONTENT_TYPES.pdf,
    run: csvToPdf,
  },
  pptx_to_pdf: {
    source: ["pptx"],
    filename: "converted.pdf",
    contentType: CONTENT_TYPES.pdf,
    run: pptxToPdf,
  },
};

function isConversionType(value: string): value is ConversionType {
  return Object.prototype.hasOwnProperty.call(CONVERSIONS, value);
}

/** Every extension some conversion accepts, for upload intake. */
export const CONVERSION_SOURCE_EXTENSIONS: readonly string[] = [
  ...new Set(Object.values(CONVERSIONS).flatMap((c) => c.source)),
];

export function resolveConversionType(raw: string): ConversionType | undefined {
  const key = raw.trim().toLowerCase();
  if (isConversionType(key)) return key;
  return ALIASES[key];
}

class ConversionService {
  async convert(type: ConversionType, input: InputDocument): Promise<ProcessingResult> {
    const conversion = CONVERSIONS[type];
    if (!conversion.source.some((ext) => input.name.toLowerCase().endsWith(`.${ext}`))) {
      throw new ValidationError(
        `Invalid file type: ${input.name}. Allowed: ${conversion.source.join(", ")}`,
      );
    }

    try {
      const data = await conversion.run(input);
      logger.info(`Successfully converted ${input.name} (${type})`, {
        bytes: data.byteLength,
      });
      return {
        filename: conversion.filename,
        contentType: conversion.contentType,
        data,
      };
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error(`Error converting file (${type}):`, error);
      throw new ProcessingError("Failed to convert file", error);
    }
  }
}

export default new ConversionService();
