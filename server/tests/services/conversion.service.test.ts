/**
 * Unit tests for the conversion dispatcher
 */

import { describe, it, expect } from "vitest";
import conversionService, {
  CONVERSION_SOURCE_EXTENSIONS,
  resolveConversionType,
} from "../../src/services/conversion.service";
import {
  extractDocxParagraphs,
  extractPdfText,
  extractPptxSlides,
} from "../../src/services/document-text.service";
import { UnprocessableError, ValidationError } from "../../src/utils/errors";
import { makeDocx, makePdf, makePptx, pageCount } from "../helpers/fixtures";

describe("resolveConversionType", () => {
  it("accepts canonical names and aliases", () => {
    expect(resolveConversionType("pdf_to_docx")).toBe("pdf_to_docx");
    expect(resolveConversionType("PDF_TO_WORD")).toBe("pdf_to_docx");
    expect(resolveConversionType("ppt_to_pdf")).toBe("pptx_to_pdf");
    expect(resolveConversionType(" word_to_pdf ")).toBe("docx_to_pdf");
  });

  it("returns undefined for unknown names", () => {
    expect(resolveConversionType("pdf_to_mp3")).toBeUndefined();
    expect(resolveConversionType("")).toBeUndefined();
  });

  it("lists every source extension once", () => {
    expect([...CONVERSION_SOURCE_EXTENSIONS].sort()).toEqual(["csv", "docx", "pdf", "pptx", "txt"]);
  });
});

describe("convert", () => {
  it("converts PDF to DOCX with a title and one paragraph per block", async () => {
    const data = await makePdf(2, { text: [["Alpha"], ["Beta"]] });

    const result = await conversionService.convert("pdf_to_docx", { name: "in.pdf", data });

    expect(result.filename).toBe("converted.docx");
    expect(result.contentType).toBe(
      "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    );
    expect(await extractDocxParagraphs(result.data)).toEqual(["Converted from PDF", "Alpha", "Beta"]);
  });

  it("converts PDF to text with pages separated by blank lines", async () => {
    const data = await makePdf(2, { text: [["Alpha"], ["Beta"]] });

    const result = await conversionService.convert("pdf_to_txt", { name: "in.pdf", data });

    expect(result.filename).toBe("converted.txt");
    expect(Buffer.from(result.data).toString("utf-8")).toBe("Alpha\n\nBeta\n");
  });

  it("refuses PDF to CSV when no table is present", async () => {
    const data = await makePdf(1, { text: [["Only prose here"]] });

    await expect(
      conversionService.convert("pdf_to_csv", { name: "in.pdf", data }),
    ).rejects.toBeInstanceOf(UnprocessableError);
  });

  it("converts PDF to a presentation with one slide per page", async () => {
    const data = await makePdf(2, { text: [["Alpha"], ["Beta"]] });

    const result = await conversionService.convert("pdf_to_pptx", { name: "in.pdf", data });

    expect(result.filename).toBe("converted.pptx");
    expect(await extractPptxSlides(result.data)).toEqual(["Page 1\nAlpha", "Page 2\nBeta"]);
  });

  it("keeps one slide per page when pages contain blank lines", async () => {
    const data = await makePdf(3, {
      text: [1, 2, 3].map((n) => [`Heading ${n}`, `Para two ${n}\n\nafter gap ${n}`]),
    });

    const result = await conversionService.convert("pdf_to_pptx", { name: "in.pdf", data });
    const slides = await extractPptxSlides(result.data);

    expect(slides).toHaveLength(3);
    slides.forEach((slide, i) => {
      expect(slide.startsWith(`Page ${i + 1}\nHeading ${i + 1}`)).toBe(true);
    });
  });

  it("lays out text as PDF", async () => {
    const data = Buffer.from("First block\n\nSecond block\n", "utf-8");

    const result = await conversionService.convert("txt_to_pdf", { name: "notes.txt", data });

    expect(result.filename).toBe("converted.pdf");
    expect((await extractPdfText(result.data)).text).toBe("First block\nSecond block");
  });

  it("lays out DOCX paragraphs as PDF", async () => {
    const data = await makeDocx(["Hello from Word"]);

    const result = await conversionService.convert("docx_to_pdf", { name: "doc.docx", data });

    expect((await extractPdfText(result.data)).text).toBe("Hello from Word");
  });

  it("renders CSV as a table across pages", async () => {
    const rows = ["id,name", ...Array.from({ length: 60 }, (_, i) => `${i + 1},item ${i + 1}`)];
    const data = Buffer.from(rows.join("\n"), "utf-8");

    const result = await conversionService.convert("csv_to_pdf", { name: "t.csv", data });

    expect(await pageCount(result.data)).toBe(2);
  });

  it("puts a heading before each slide's text", async () => {
    const data = await makePptx([["Intro"], ["Results"]]);

    const result = await conversionService.convert("pptx_to_pdf", { name: "deck.pptx", data });

    expect((await extractPdfText(result.data)).text).toBe("Slide 1\nIntro\nSlide 2\nResults");
  });

  it("rejects a source file of the wrong type", async () => {
    const data = Buffer.from("id,name\n1,a\n", "utf-8");

    const failure = conversionService.convert("pdf_to_txt", { name: "t.csv", data });
    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toThrow("Invalid file type: t.csv. Allowed: pdf");
  });
});
