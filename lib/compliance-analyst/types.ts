import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat";
import type { DetailLevelEnum } from "./enums/detail-level.enum";

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/** Raw model output, shown to the user as-is. */
export type ComplianceReport = string;

/**
 * The slice of the OpenAI SDK the generator calls. The SDK client satisfies it;
 * tests pass an in-process fake.
 */
export interface CompletionClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number }
      ): Promise<CompletionResult>;
    };
  };
}

export interface CompletionResult {
  choices: Array<{
    message: {
      content: string | null;
    };
  }>;
}

export interface ComplianceReportGeneratorOptions {
  openAIApiKey: string;
  client?: CompletionClient;
  timeoutMs?: number;
  maxDocumentChars?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  scope?: readonly string[];
  detailLevel?: DetailLevelEnum;
}
