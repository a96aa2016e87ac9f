// The package entry runs a self-test when loaded without a parent module;
// the library file underneath is imported instead.
declare module "pdf-parse/lib/pdf-parse.js" {
  import PdfParse = require("pdf-parse");

  namespace parsePdf {
    interface TextItem {
      str: string;
      transform: number[];
    }

    /** The page proxy handed to `pagerender`. */
    interface PageData {
      pageIndex: number;
      getTextContent(options?: {
        normalizeWhitespace?: boolean;
        disableCombineTextItems?: boolean;
      }): Promise<{ items: TextItem[] }>;
    }

    interface Options {
      /** Called once per page, in page order; the result is awaited. */
      pagerender?: (pageData: PageData) => string | Promise<string>;
      max?: number;
    }
  }

  function parsePdf(dataBuffer: Buffer, options?: parsePdf.Options): Promise<PdfParse.Result>;
  export = parsePdf;
}
