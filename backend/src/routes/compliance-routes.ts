import express, { Router } from 'express';
import { ComplianceController } from '../controllers/compliance-controller';

export interface BodyLimits {
  uploadBytes: number;
  jsonBytes: number;
}

/**
 * JSON body size that fits a document of `maxDocumentChars` characters even
 * when every character is escaped as \uXXXX, plus room for the other fields.
 */
export function jsonBodyLimit(maxDocumentChars: number): number {
  return maxDocumentChars * 6 + 1024;
}

export function createComplianceRouter(complianceController: ComplianceController, limits: BodyLimits): Router {
  const complianceRouter = Router();
  const pdfBody = express.raw({ type: 'application/pdf', limit: limits.uploadBytes });

  complianceRouter.post('/extract', pdfBody, (req, res) => complianceController.extract(req, res));
  complianceRouter.post('/analyze', express.json({ limit: limits.jsonBytes }), (req, res) => complianceController.analyze(req, res));
  complianceRouter.post('/compliance-report', pdfBody, (req, res) => complianceController.checkDocument(req, res));
  complianceRouter.get('/health', (req, res) => complianceController.healthCheck(req, res));

  return complianceRouter;
}
