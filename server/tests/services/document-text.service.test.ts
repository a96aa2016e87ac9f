/**
 * Unit tests for text extraction and table detection
 */

import JSZip from "jszip";
import { describe, it, expect } from "vitest";
import {
  extractDocxParagraphs,
  extractPdfText,
  extractPptxSlides,
  parseCsv,
  rowsFromText,
  toCsv,
  toParagraphs,
} from "../../src/services/document-text.service";
import { makeDocx, makePdf, makePptx } from "../helpers/fixtures";

describe("extractPdfText", () => {
  it("returns the text of each page", async () => {
    const data = await makePdf(2, { text: [["Alpha"], ["Beta", "Gamma"]] });

    const result = await extractPdfText(data);

    expect(result.pages).toEqual(["Alpha", "Beta\nGamma"]);
    expect(result.text).toBe("Alpha\n\nBeta\nGamma");
  });

  it("keeps page boundaries when pages contain blank lines", async () => {
    const data = await makePdf(3, {
      text: [1, 2, 3].map((n) => [`Heading ${n}`, `Para two ${n}\n\nafter gap ${n}`]),
    });

    const { pages } = await extractPdfText(data);

    expect(pages).toHaveLength(3);
    pages.forEach((page, i) => {
      const n = i + 1;
      expect(page.startsWith(`Heading ${n}\nPara two ${n}`)).toBe(true);
      expect(page.endsWith(`after gap ${n}`)).toBe(true);
    });
  });
});

describe("extractDocxParagraphs", () => {
  it("returns non-empty paragraphs in order", async () => {
    const data = await makeDocx(["First paragraph", "", "Second paragraph"]);
    expect(await extractDocxParagraphs(data)).toEqual(["First paragraph", "Second paragraph"]);
  });
});

describe("extractPptxSlides", () => {
  it("returns slide text in slide order", async () => {
    const data = await makePptx([["Intro", "Agenda"], ["Results"]]);
    expect(await extractPptxSlides(data)).toEqual(["Intro\nAgenda", "Results"]);
  });

  it("reads runs that carry attributes", async () => {
    const zip = new JSZip();
    zip.file(
      "ppt/slides/slide1.xml",
      '<p:sld><a:p><a:r><a:t xml:space="preserve">Keep  spacing</a:t></a:r>' +
        "<a:r><a:t> &amp; more</a:t></a:r></a:p><a:p><a:r><a:t>Next line</a:t></a:r></a:p></p:sld>",
    );
    const data = await zip.generateAsync({ type: "uint8array" });

    expect(await extractPptxSlides(data)).toEqual(["Keep  spacing & more\nNext line"]);
  });
});

describe("rowsFromText", () => {
  it("splits cells on tabs and runs of spaces", () => {
    const text = "Name  Qty  Price\nWidget\t4\t9.50\nA heading line\nGadget    10  1.25";
    expect(rowsFromText(text)).toEqual([
      ["Name", "Qty", "Price"],
      ["Widget", "4", "9.50"],
      ["Gadget", "10", "1.25"],
    ]);
  });

  it("finds nothing in plain prose", () => {
    expect(rowsFromText("Just one sentence.\nAnd another one.")).toEqual([]);
  });
});

describe("toParagraphs", () => {
  it("splits on blank lines and trims", () => {
    expect(toParagraphs("  one\nline two\n\n\n  three  \r\n\r\n")).toEqual(["one\nline two", "three"]);
  });
});

describe("CSV helpers", () => {
  it("parses ragged rows with a byte order mark", () => {
    const data = Buffer.from("\uFEFFname,qty\nwidget,4,extra\n\ngadget\n", "utf-8");
    expect(parseCsv(data)).toEqual([["name", "qty"], ["widget", "4", "extra"], ["gadget"]]);
  });

  it("quotes cells that need it", () => {
    expect(toCsv([["a,b", "c"], ['say "hi"', "d"]])).toBe('"a,b",c\n"say ""hi""",d\n');
  });
});
