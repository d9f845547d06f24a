import { vi } from 'vitest';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat';
import type { CompletionClient, CompletionResult } from '..';

export interface FakeCompletionClient extends CompletionClient {
  requests: ChatCompletionCreateParamsNonStreaming[];
  requestOptions: Array<{ timeout?: number } | undefined>;
}

export function completionResult(content: string | null): CompletionResult {
  return { choices: [{ message: { content } }] };
}

/** Records every request and answers with `respond`. */
export function fakeCompletionClient(
  respond: (body: ChatCompletionCreateParamsNonStreaming) => Promise<CompletionResult>
): FakeCompletionClient {
  const requests: ChatCompletionCreateParamsNonStreaming[] = [];
  const requestOptions: Array<{ timeout?: number } | undefined> = [];
  const create = vi.fn((body: ChatCompletionCreateParamsNonStreaming, options?: { timeout?: number }) => {
    requests.push(body);
    requestOptions.push(options);
    return respond(body);
  });
  return { requests, requestOptions, chat: { completions: { create } } };
}

export function promptOf(body: ChatCompletionCreateParamsNonStreaming): string {
  return body.messages
    .map(message => (typeof message.content === 'string' ? message.content : ''))
    .join('\n');
}

export function silentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}
