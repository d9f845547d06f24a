import { OpenAI } from "openai";
import type {
  ComplianceReport,
  ComplianceReportGeneratorOptions,
  CompletionClient,
  GenerateOptions,
  Logger
} from "./types";
import { Prompts } from './prompts';
import { ConsoleLogger } from './logger';
import { COMPLIANCE_SCOPE } from './configuration/compliance-scope';
import {
  AI_MAX_COMPLETION_TOKENS,
  AI_MODEL,
  AI_MODEL_TEMP,
  AI_REQUEST_TIMEOUT_MS,
  DEFAULT_DETAIL_LEVEL,
  MAX_DOCUMENT_CHARS
} from './configuration/config';
import { DocumentTooLargeError, ServiceError, describeError } from './errors';

/**
 * Turns extracted document text into a compliance assessment with one
 * non-streaming completion request. The answer is returned exactly as the
 * model wrote it.
 */
export class ComplianceReportGenerator {
  private client: CompletionClient;
  private timeoutMs: number;
  private maxDocumentChars: number;
  private logger: Logger;

  constructor(options: ComplianceReportGeneratorOptions) {
    this.timeoutMs = options.timeoutMs ?? AI_REQUEST_TIMEOUT_MS;
    this.maxDocumentChars = options.maxDocumentChars ?? MAX_DOCUMENT_CHARS;
    this.logger = options.logger || new ConsoleLogger('analyst');
    this.client = options.client || new OpenAI({
      apiKey: options.openAIApiKey,
      maxRetries: 0,
      timeout: this.timeoutMs
    });
  }

  async generate(documentText: string, options: GenerateOptions = {}): Promise<ComplianceReport> {
    if (documentText.length > this.maxDocumentChars) {
      throw new DocumentTooLargeError(documentText.length, this.maxDocumentChars);
    }

    const scope = options.scope ?? COMPLIANCE_SCOPE;
    const detailLevel = options.detailLevel ?? DEFAULT_DETAIL_LEVEL;

    this.logger.info(`Requesting ${detailLevel} compliance analysis from ${AI_MODEL} (${documentText.length} chars, ${scope.length} frameworks)`);
    const startedAt = Date.now();

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: AI_MODEL,
          temperature: AI_MODEL_TEMP,
          max_tokens: AI_MAX_COMPLETION_TOKENS,
          messages: Prompts.complianceAnalysis(documentText, scope, detailLevel)
        },
        { timeout: this.timeoutMs }
      );
      content = response.choices[0]?.message?.content;
    } catch (error: unknown) {
      this.logger.error(`Model request failed after ${Date.now() - startedAt}ms: ${describeError(error)}`);
      throw new ServiceError(`Model service request failed: ${describeError(error)}`, { cause: error });
    }

    if (!content || !content.trim()) {
      this.logger.error('Model returned an empty response');
      throw new ServiceError('Model service returned an empty response');
    }

    this.logger.info(`Received compliance analysis in ${Date.now() - startedAt}ms (${content.length} chars)`);
    return content;
  }
}

export { Prompts } from './prompts';
export { ConsoleLogger, parseLogLevel } from './logger';
export { COMPLIANCE_SCOPE } from './configuration/compliance-scope';
export { DetailLevelEnum, parseDetailLevel } from './enums/detail-level.enum';
export * from './errors';
export * from './types';
