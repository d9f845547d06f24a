import type { Request, Response } from 'express';
import type { Logger } from '../../../lib/compliance-analyst';
import {
  ComplianceError,
  ConsoleLogger,
  DetailLevelEnum,
  describeError,
  parseDetailLevel
} from '../../../lib/compliance-analyst';
import type { ComplianceService } from '../services/compliance-service';

export interface ErrorBody {
  error: {
    kind: string;
    message: string;
  };
}

export function errorBody(kind: string, message: string): ErrorBody {
  return { error: { kind, message } };
}

function uploadedBytes(req: Request): Buffer | undefined {
  const body: unknown = req.body;
  return Buffer.isBuffer(body) && body.length > 0 ? body : undefined;
}

type DetailLevelResult = { ok: true; value: DetailLevelEnum | undefined } | { ok: false };

function readDetailLevel(value: unknown): DetailLevelResult {
  if (value === undefined || value === '') return { ok: true, value: undefined };
  const level = parseDetailLevel(value);
  return level ? { ok: true, value: level } : { ok: false };
}

const UNKNOWN_DETAIL_LEVEL = `detailLevel must be one of: ${Object.values(DetailLevelEnum).join(', ')}`;

export class ComplianceController {
  private logger: Logger;

  constructor(private complianceService: ComplianceService, logger?: Logger) {
    this.logger = logger || new ConsoleLogger('http');
  }

  async extract(req: Request, res: Response): Promise<Response> {
    const bytes = uploadedBytes(req);
    if (!bytes) {
      return res.status(400).json(errorBody('BadRequest', 'A PDF file is required (Content-Type: application/pdf).'));
    }

    try {
      const document = await this.complianceService.extractText(bytes);
      return res.status(200).json(document);
    } catch (error) {
      return this.sendError(res, error);
    }
  }

  async analyze(req: Request, res: Response): Promise<Response> {
    const body: unknown = req.body;
    if (typeof body !== 'object' || body === null || !('text' in body) || typeof body.text !== 'string') {
      return res.status(400).json(errorBody('BadRequest', 'Request body must be JSON with a "text" string.'));
    }
    const detailLevel = readDetailLevel('detailLevel' in body ? body.detailLevel : undefined);
    if (!detailLevel.ok) {
      return res.status(400).json(errorBody('BadRequest', UNKNOWN_DETAIL_LEVEL));
    }

    try {
      const report = await this.complianceService.analyze(body.text, detailLevel.value);
      return res.status(200).json({ report });
    } catch (error) {
      return this.sendError(res, error);
    }
  }

  async checkDocument(req: Request, res: Response): Promise<Response> {
    const bytes = uploadedBytes(req);
    if (!bytes) {
      return res.status(400).json(errorBody('BadRequest', 'A PDF file is required (Content-Type: application/pdf).'));
    }
    const detailLevel = readDetailLevel(req.query.detailLevel);
    if (!detailLevel.ok) {
      return res.status(400).json(errorBody('BadRequest', UNKNOWN_DETAIL_LEVEL));
    }

    try {
      const result = await this.complianceService.checkDocument(bytes, detailLevel.value);
      return res.status(200).json(result);
    } catch (error) {
      return this.sendError(res, error);
    }
  }

  healthCheck(req: Request, res: Response): Response {
    return res.status(200).send('OK');
  }

  private sendError(res: Response, error: unknown): Response {
    if (error instanceof ComplianceError) {
      this.logger.error(`${error.kind}: ${error.message}`);
      return res.status(error.status).json(errorBody(error.kind, error.message));
    }
    this.logger.error(`Unexpected error: ${describeError(error)}`, error);
    return res.status(500).json(errorBody('InternalError', 'Unexpected server error. Please try again.'));
  }
}
