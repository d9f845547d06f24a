import type { Server } from 'http';
import type { Logger } from '../../lib/compliance-analyst';
import { ComplianceReportGenerator, ConsoleLogger } from '../../lib/compliance-analyst';
import { createApp } from './app';
import { loadConfig, maskCredential } from './configuration/app-config';
import type { AppConfig } from './configuration/app-config';
import { ComplianceService } from './services/compliance-service';
import { PdfTextExtractor } from './services/pdf-extractor';

export interface ServerDependencies {
  createGenerator?: (config: AppConfig, logger: Logger) => ComplianceReportGenerator;
  logger?: ConsoleLogger;
  port?: number;
}

export interface RunningServer {
  server: Server;
  port: number;
  close(): Promise<void>;
}

function defaultGenerator(config: AppConfig, logger: Logger): ComplianceReportGenerator {
  return new ComplianceReportGenerator({
    openAIApiKey: config.openAIApiKey,
    timeoutMs: config.modelTimeoutMs,
    maxDocumentChars: config.maxDocumentChars,
    logger
  });
}

/**
 * Validates the environment and starts listening. Throws MissingCredentialError
 * before any client or listener exists when the model credential is absent.
 */
export async function startServer(env: NodeJS.ProcessEnv, deps: ServerDependencies = {}): Promise<RunningServer> {
  const config = loadConfig(env);
  const logger = deps.logger || new ConsoleLogger('server', config.logLevel);
  logger.info(`Model service credential loaded (${maskCredential(config.openAIApiKey)})`);

  const createGenerator = deps.createGenerator || defaultGenerator;
  const complianceService = new ComplianceService(
    new PdfTextExtractor(logger.child('pdf')),
    createGenerator(config, logger.child('analyst')),
    logger.child('service')
  );
  const app = createApp({
    complianceService,
    maxUploadBytes: config.maxUploadBytes,
    maxDocumentChars: config.maxDocumentChars,
    staticDir: config.staticDir,
    logger: logger.child('http')
  });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(deps.port ?? config.port, () => resolve(listening));
    listening.once('error', reject);
  });
  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.port;
  logger.info(`Server running on port ${port}`);

  return {
    server,
    port,
    close: () => new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    })
  };
}
