import type { Server } from 'http';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { ComplianceReportGenerator } from '../../lib/compliance-analyst';
import type { CompletionResult } from '../../lib/compliance-analyst';
import type { FakeCompletionClient } from '../../lib/compliance-analyst/test-utils/fake-completion-client';
import {
  completionResult,
  fakeCompletionClient,
  promptOf,
  silentLogger
} from '../../lib/compliance-analyst/test-utils/fake-completion-client';
import { createApp } from './app';
import { ComplianceService } from './services/compliance-service';
import { PdfTextExtractor } from './services/pdf-extractor';
import { WIDGET_PAGES, createPdf } from './test-utils/pdf-fixtures';

const FRAMEWORK_NAMES = [
  '21 CFR Part 820',
  '21 CFR Part 11',
  'ISO 13485',
  'device classification rules',
  '510(k)/PMA submission requirements',
];

interface TestServer {
  baseUrl: string;
  client: FakeCompletionClient;
}

let server: Server | undefined;

async function startApp(
  respond: () => Promise<CompletionResult>,
  options: { maxUploadBytes?: number; maxDocumentChars?: number } = {}
): Promise<TestServer> {
  const logger = silentLogger();
  const client = fakeCompletionClient(respond);
  const generator = new ComplianceReportGenerator({
    openAIApiKey: 'test-secret',
    client,
    maxDocumentChars: options.maxDocumentChars,
    logger
  });
  const app = createApp({
    complianceService: new ComplianceService(new PdfTextExtractor(logger), generator, logger),
    maxUploadBytes: options.maxUploadBytes ?? 1024 * 1024,
    maxDocumentChars: options.maxDocumentChars ?? 400000,
    staticDir: path.resolve(__dirname, '../public'),
    logger
  });

  const listening = await new Promise<Server>(resolve => {
    const instance = app.listen(0, '127.0.0.1', () => resolve(instance));
  });
  server = listening;
  const address = listening.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  return { baseUrl: `http://127.0.0.1:${port}`, client };
}

function postPdf(url: string, pdf: Buffer): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/pdf' },
    body: new Blob([pdf])
  });
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

const answer = async () => completionResult('Overall: MAJOR gaps in design controls.');

afterEach(async () => {
  const running = server;
  server = undefined;
  if (running) {
    await new Promise<void>((resolve, reject) => running.close(error => (error ? reject(error) : resolve())));
  }
});

describe('compliance API', () => {
  it('answers the health check', async () => {
    const { baseUrl } = await startApp(answer);

    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('OK');
  });

  it('serves the upload page', async () => {
    const { baseUrl } = await startApp(answer);

    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=UTF-8');
  });

  describe('POST /api/extract', () => {
    it('returns the page-ordered text and page count', async () => {
      const { baseUrl, client } = await startApp(answer);

      const response = await postPdf(`${baseUrl}/api/extract`, await createPdf(WIDGET_PAGES));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        text: 'Device: Widget X, Class II\nQuality records retained per 21 CFR 820.180',
        pageCount: 2
      });
      expect(client.requests).toHaveLength(0);
    });

    it('rejects a request without a PDF body', async () => {
      const { baseUrl } = await startApp(answer);

      const response = await fetch(`${baseUrl}/api/extract`, { method: 'POST' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: { kind: 'BadRequest', message: 'A PDF file is required (Content-Type: application/pdf).' }
      });
    });

    it('reports bytes that are not a PDF as an ExtractionError', async () => {
      const { baseUrl } = await startApp(answer);

      const response = await postPdf(`${baseUrl}/api/extract`, Buffer.from('plain text, not a PDF'));

      expect(response.status).toBe(422);
      expect(await response.json()).toMatchObject({
        error: {
          kind: 'ExtractionError',
          message: expect.stringMatching(/^Could not read the uploaded file as a PDF: /)
        }
      });
    });

    it('rejects uploads over the size limit', async () => {
      const { baseUrl } = await startApp(answer, { maxUploadBytes: 100 });

      const response = await postPdf(`${baseUrl}/api/extract`, await createPdf(WIDGET_PAGES));

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({
        error: { kind: 'UploadTooLarge', message: 'The uploaded file is larger than the 100 byte limit.' }
      });
    });
  });

  describe('POST /api/analyze', () => {
    it('returns the model report for the given text', async () => {
      const { baseUrl, client } = await startApp(answer);

      const response = await postJson(`${baseUrl}/api/analyze`, { text: 'Device: Widget X', detailLevel: 'Comprehensive' });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ report: 'Overall: MAJOR gaps in design controls.' });
      expect(promptOf(client.requests[0])).toContain('ANALYSIS DEPTH (Comprehensive):');
    });

    it('requires a text field', async () => {
      const { baseUrl, client } = await startApp(answer);

      const response = await postJson(`${baseUrl}/api/analyze`, { document: 'Device: Widget X' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: { kind: 'BadRequest', message: 'Request body must be JSON with a "text" string.' }
      });
      expect(client.requests).toHaveLength(0);
    });

    it('rejects an unknown detail level', async () => {
      const { baseUrl } = await startApp(answer);

      const response = await postJson(`${baseUrl}/api/analyze`, { text: 'Device: Widget X', detailLevel: 'Extreme' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: { kind: 'BadRequest', message: 'detailLevel must be one of: Basic, Standard, Comprehensive' }
      });
    });

    it('accepts extracted text larger than the upload limit', async () => {
      const { baseUrl, client } = await startApp(answer, { maxUploadBytes: 100 });

      const response = await postJson(`${baseUrl}/api/analyze`, { text: 'Quality records retained. '.repeat(40) });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ report: 'Overall: MAJOR gaps in design controls.' });
      expect(client.requests).toHaveLength(1);
    });

    it('rejects a JSON body over its own limit with a body-specific message', async () => {
      const { baseUrl, client } = await startApp(answer, { maxDocumentChars: 5 });

      const response = await postJson(`${baseUrl}/api/analyze`, { text: 'x'.repeat(2000) });

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({
        error: { kind: 'BodyTooLarge', message: 'The request body is larger than the 1054 byte limit.' }
      });
      expect(client.requests).toHaveLength(0);
    });

    it('reports an oversized document without calling the model', async () => {
      const { baseUrl, client } = await startApp(answer, { maxDocumentChars: 5 });

      const response = await postJson(`${baseUrl}/api/analyze`, { text: 'Device: Widget X' });

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({
        error: {
          kind: 'DocumentTooLarge',
          message: 'Extracted document text is 16 characters; the analysis limit is 5. Split the document and upload the parts separately.'
        }
      });
      expect(client.requests).toHaveLength(0);
    });
  });

  describe('POST /api/compliance-report', () => {
    it('extracts, analyzes and returns both the text and the report', async () => {
      const { baseUrl } = await startApp(answer);

      const response = await postPdf(`${baseUrl}/api/compliance-report?detailLevel=Basic`, await createPdf(WIDGET_PAGES));

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        text: 'Device: Widget X, Class II\nQuality records retained per 21 CFR 820.180',
        report: 'Overall: MAJOR gaps in design controls.'
      });
    });

    it('shows a ServiceError and no report when the model service is unreachable', async () => {
      const { baseUrl, client } = await startApp(async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:443');
      });

      const response = await postPdf(`${baseUrl}/api/compliance-report`, await createPdf(WIDGET_PAGES));

      const prompt = promptOf(client.requests[0]);
      const first = prompt.indexOf('Device: Widget X, Class II');
      const second = prompt.indexOf('Quality records retained per 21 CFR 820.180');
      expect(first).toBeGreaterThan(-1);
      expect(second).toBeGreaterThan(first);
      for (const name of FRAMEWORK_NAMES) {
        expect(prompt).toContain(name);
      }

      expect(response.status).toBe(502);
      expect(await response.json()).toEqual({
        error: {
          kind: 'ServiceError',
          message: 'Model service request failed: connect ECONNREFUSED 127.0.0.1:443'
        }
      });
    });

    it('stops at extraction when the upload is not a PDF', async () => {
      const { baseUrl, client } = await startApp(answer);

      const response = await postPdf(`${baseUrl}/api/compliance-report`, Buffer.from('plain text, not a PDF'));

      expect(response.status).toBe(422);
      expect(client.requests).toHaveLength(0);
    });

    it('treats a repeated upload as an independent request with the same result', async () => {
      const { baseUrl, client } = await startApp(answer);
      const pdf = await createPdf(WIDGET_PAGES);

      const first = await (await postPdf(`${baseUrl}/api/compliance-report`, pdf)).json();
      const second = await (await postPdf(`${baseUrl}/api/compliance-report`, pdf)).json();

      expect(second).toEqual(first);
      expect(client.requests).toHaveLength(2);
      expect(promptOf(client.requests[1])).toBe(promptOf(client.requests[0]));
    });
  });
});
