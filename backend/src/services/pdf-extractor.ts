import type { Logger } from '../../../lib/compliance-analyst';
import { ConsoleLogger, ExtractionError, describeError } from '../../../lib/compliance-analyst';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';

// Items on the same baseline are joined directly, a change of baseline starts a new line.
async function renderPage(page: pdfParse.PageData): Promise<string> {
  const content = await page.getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false });
  let lastY: number | undefined;
  let text = '';
  for (const item of content.items) {
    const y = item.transform[5];
    text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

export class PdfTextExtractor {
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger || new ConsoleLogger('pdf');
  }

  async extract(bytes: Buffer): Promise<string> {
    const pages = await this.extractPages(bytes);
    return pages.join('\n');
  }

  /** Text of each page, in document order. Pages without text come back as ''. */
  async extractPages(bytes: Buffer): Promise<string[]> {
    if (bytes.length === 0) {
      throw new ExtractionError('The uploaded file is empty.');
    }

    const rendered = new Map<number, string>();
    let pageCount: number;
    try {
      // pdf-parse renders pages one at a time and awaits each renderer call.
      // The bundled pdf.js reads a plain Uint8Array reliably, not a Buffer view.
      const result = await pdfParse(new Uint8Array(bytes), {
        pagerender: async page => {
          const text = await renderPage(page);
          rendered.set(page.pageIndex, text);
          return text;
        }
      });
      pageCount = result.numpages;
    } catch (error: unknown) {
      this.logger.warn(`PDF extraction failed: ${describeError(error)}`);
      throw new ExtractionError(`Could not read the uploaded file as a PDF: ${describeError(error)}`, { cause: error });
    }

    // pdf-parse replaces a page it fails to load or render with '' without calling back.
    const pages = Array.from({ length: pageCount }, (_, index) => {
      const text = rendered.get(index);
      if (text === undefined) {
        this.logger.warn(`Page ${index + 1} of ${pageCount} could not be rendered; using empty text`);
        return '';
      }
      return text;
    });

    this.logger.debug(`Extracted ${pages.length} pages`);
    return pages;
  }
}
