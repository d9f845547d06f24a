import type {
  ComplianceReport,
  ComplianceReportGenerator,
  DetailLevelEnum,
  Logger
} from '../../../lib/compliance-analyst';
import { ConsoleLogger } from '../../../lib/compliance-analyst';
import type { PdfTextExtractor } from './pdf-extractor';

export interface ExtractedDocument {
  text: string;
  pageCount: number;
}

export interface ComplianceCheck {
  text: string;
  report: ComplianceReport;
}

/** Upload → extract → analyze, one request at a time, nothing kept between calls. */
export class ComplianceService {
  private logger: Logger;

  constructor(
    private extractor: PdfTextExtractor,
    private generator: ComplianceReportGenerator,
    logger?: Logger
  ) {
    this.logger = logger || new ConsoleLogger('service');
  }

  async extractText(bytes: Buffer): Promise<ExtractedDocument> {
    this.logger.info(`Extracting text from ${bytes.length} byte upload`);
    const pages = await this.extractor.extractPages(bytes);
    const text = pages.join('\n');
    this.logger.info(`Extracted ${text.length} chars from ${pages.length} pages`);
    if (!text.trim()) {
      this.logger.warn('Document has no extractable text; it may be a scanned image');
    }
    return { text, pageCount: pages.length };
  }

  analyze(text: string, detailLevel?: DetailLevelEnum): Promise<ComplianceReport> {
    return this.generator.generate(text, { detailLevel });
  }

  async checkDocument(bytes: Buffer, detailLevel?: DetailLevelEnum): Promise<ComplianceCheck> {
    const { text } = await this.extractText(bytes);
    const report = await this.analyze(text, detailLevel);
    return { text, report };
  }
}
