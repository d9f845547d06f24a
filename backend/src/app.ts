import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import type { Logger } from '../../lib/compliance-analyst';
import { ConsoleLogger, describeError } from '../../lib/compliance-analyst';
import { ComplianceController, errorBody } from './controllers/compliance-controller';
import { createComplianceRouter, jsonBodyLimit } from './routes/compliance-routes';
import type { ComplianceService } from './services/compliance-service';

export interface AppOptions {
  complianceService: ComplianceService;
  maxUploadBytes: number;
  maxDocumentChars: number;
  staticDir?: string;
  logger?: Logger;
}

function isBodyParserError(error: unknown): error is { type: string; status: number } {
  return typeof error === 'object' && error !== null
    && 'type' in error && typeof error.type === 'string'
    && 'status' in error && typeof error.status === 'number';
}

export function createApp(options: AppOptions): express.Express {
  const logger = options.logger || new ConsoleLogger('http');
  const complianceController = new ComplianceController(options.complianceService, logger);

  const jsonBytes = jsonBodyLimit(options.maxDocumentChars);

  const app = express();

  app.use(cors());

  app.use('/api', createComplianceRouter(complianceController, {
    uploadBytes: options.maxUploadBytes,
    jsonBytes
  }));

  if (options.staticDir) {
    app.use(express.static(options.staticDir));
  }

  // Errors raised by the body parsers before a controller runs.
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isBodyParserError(error) && error.type === 'entity.too.large') {
      if (req.is('application/json')) {
        logger.warn(`Rejected JSON body over ${jsonBytes} bytes`);
        res.status(413).json(errorBody('BodyTooLarge', `The request body is larger than the ${jsonBytes} byte limit.`));
        return;
      }
      logger.warn(`Rejected upload over ${options.maxUploadBytes} bytes`);
      res.status(413).json(errorBody('UploadTooLarge', `The uploaded file is larger than the ${options.maxUploadBytes} byte limit.`));
      return;
    }
    if (isBodyParserError(error) && error.status === 400) {
      res.status(400).json(errorBody('BadRequest', describeError(error)));
      return;
    }
    logger.error(`Unhandled request error: ${describeError(error)}`, error);
    res.status(500).json(errorBody('InternalError', 'Unexpected server error. Please try again.'));
  });

  return app;
}
