// The package entry of pdf-parse runs a self-test when loaded without a parent
// module (as under ESM loaders); lib/pdf-parse.js is the same function without it.
// @types/pdf-parse only covers the entry and types the page renderer as synchronous,
// while the library awaits whatever the renderer returns.
declare module 'pdf-parse/lib/pdf-parse.js' {
  import PdfParse = require('pdf-parse');

  namespace pdfParse {
    interface TextItem {
      str: string;
      transform: number[];
    }

    interface PageData {
      /** Zero-based position of the page in the document. */
      pageIndex: number;
      getTextContent(options?: {
        normalizeWhitespace?: boolean;
        disableCombineTextItems?: boolean;
      }): Promise<{ items: TextItem[] }>;
    }

    interface Options {
      pagerender?(pageData: PageData): string | Promise<string>;
      max?: number;
      version?: PdfParse.Version;
    }

    type Result = PdfParse.Result;
  }

  function pdfParse(dataBuffer: Uint8Array, options?: pdfParse.Options): Promise<pdfParse.Result>;

  export = pdfParse;
}
