import { PDFDocument, degrees } from "@cantoo/pdf-lib";
import logger from "../utils/logger";
import { AppError, ProcessingError, ValidationError } from "../utils/errors";
import { parseRanges, selectPages } from "../utils/page-selection";
import type {
  InputDocument,
  NamedOutput,
  PdfInfo,
  RotationAngle,
} from "../models/processing.model";

export interface CompressResult {
  data: Uint8Array;
  originalSize: number;
  outputSize: number;
}

function pad(n: number): string {
  return String(n).padStart(3, "0");
}

/**
 * PDF operations. Each one is a short open, transform, write pass over
 * pdf-lib; library failures come out as a ProcessingError.
 */
class PdfService {
  async merge(inputs: InputDocument[]): Promise<Uint8Array> {
    return this.run("merge", async () => {
      const merged = await PDFDocument.create();

      for (const input of inputs) {
        const source = await this.open(input);
        const pages = await merged.copyPages(source, source.getPageIndices());
        pages.forEach((page) => merged.addPage(page));
      }

      const data = await merged.save();
      logger.info(`Successfully merged ${inputs.length} PDFs`, {
        pages: merged.getPageCount(),
      });
      return data;
    });
  }

  /**
   * One output per page, or one per range when `ranges` is given
   * (e.g. `1-3,5`).
   */
  async split(input: InputDocument, ranges?: string): Promise<NamedOutput[]> {
    return this.run("split", async () => {
      const source = await this.open(input);
      const pageCount = source.getPageCount();

      const groups = ranges
        ? parseRanges(ranges, pageCount)
        : source.getPageIndices().map((i) => ({ start: i + 1, end: i + 1 }));

      const outputs: NamedOutput[] = [];
      for (const { start, end } of groups) {
        const part = await PDFDocument.create();
        const indices = Array.from(
          { length: end - start + 1 },
          (_, i) => start - 1 + i,
        );
        const pages = await part.copyPages(source, indices);
        pages.forEach((page) => part.addPage(page));

        const name =
          start === end ? `page_${pad(start)}.pdf` : `pages_${start}-${end}.pdf`;
        outputs.push({ name, data: await part.save() });
      }

      logger.info(`Successfully split PDF into ${outputs.length} files`);
      return outputs;
    });
  }

  /**
   * Re-serialises with object streams. The input is returned untouched
   * when that does not make it smaller.
   */
  async compress(input: InputDocument): Promise<CompressResult> {
    return this.run("compress", async () => {
      const doc = await this.open(input);
      const saved = await doc.save({ useObjectStreams: true });
      const originalSize = input.data.byteLength;
      const data = saved.byteLength < originalSize ? saved : input.data;

      const ratio = (1 - data.byteLength / originalSize) * 100;
      logger.info(`Successfully compressed PDF by ${ratio.toFixed(1)}%`);
      return { data, originalSize, outputSize: data.byteLength };
    });
  }

  async rotate(
    input: InputDocument,
    angle: RotationAngle,
    pages = "all",
  ): Promise<Uint8Array> {
    return this.run("rotate", async () => {
      const doc = await this.open(input);
      const all = doc.getPages();

      for (const index of selectPages(pages, all.length)) {
        const page = all[index];
        const next = (((page.getRotation().angle + angle) % 360) + 360) % 360;
        page.setRotation(degrees(next));
      }

      const data = await doc.save();
      logger.info(`Successfully rotated PDF pages by ${angle}°`, { pages });
      return data;
    });
  }

  async encrypt(
    input: InputDocument,
    password: string,
    ownerPassword?: string,
  ): Promise<Uint8Array> {
    return this.run("encrypt", async () => {
      const doc = await this.open(input);
      await doc.encrypt({
        userPassword: password,
        ownerPassword: ownerPassword || password,
        permissions: {
          printing: "highResolution",
          modifying: false,
          copying: false,
          annotating: false,
          fillingForms: true,
          contentAccessibility: true,
          documentAssembly: false,
        },
      });

      const data = await doc.save();
      logger.info("Successfully encrypted PDF with password");
      return data;
    });
  }

  /** Writes a copy without encryption. Unencrypted input is re-saved as is. */
  async decrypt(input: InputDocument, password: string): Promise<Uint8Array> {
    return this.run("decrypt", async () => {
      const probe = await this.load(input.data, { ignoreEncryption: true });
      if (!probe.isEncrypted) {
        logger.info(`${input.name} is not encrypted, returning a plain copy`);
        return probe.save();
      }

      const source = await this.load(input.data, { password }).catch((error: unknown) => {
        logger.warn(`Could not open ${input.name} with the given password`, { error });
        throw new ValidationError("Incorrect PDF password");
      });
      const plain = await PDFDocument.create();
      const pages = await plain.copyPages(source, source.getPageIndices());
      pages.forEach((page) => plain.addPage(page));

      const data = await plain.save();
      logger.info("Successfully decrypted PDF");
      return data;
    });
  }

  async info(input: InputDocument): Promise<PdfInfo> {
    return this.run("inspect", async () => {
      const doc = await this.load(input.data, { ignoreEncryption: true });
      const pages = doc.getPages().map((page, i) => {
        const { width, height } = page.getSize();
        return {
          number: i + 1,
          width: Math.round(width * 100) / 100,
          height: Math.round(height * 100) / 100,
          rotation: page.getRotation().angle,
        };
      });
      return { pageCount: pages.length, encrypted: doc.isEncrypted, pages };
    });
  }

  /** Loads a document that must not be password protected. */
  private async open(input: InputDocument): Promise<PDFDocument> {
    const doc = await this.load(input.data, { ignoreEncryption: true });
    if (doc.isEncrypted) {
      throw new ValidationError(`PDF is password protected: ${input.name}`);
    }
    return doc;
  }

  private load(
    data: Uint8Array,
    options: { ignoreEncryption?: boolean; password?: string },
  ): Promise<PDFDocument> {
    return PDFDocument.load(data, { updateMetadata: false, ...options });
  }

  private async run<T>(operation: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logger.error(`Error during PDF ${operation}:`, error);
      throw new ProcessingError(`Failed to ${operation} PDF`, error);
    }
  }
}

export default new PdfService();
