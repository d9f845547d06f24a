export type ComplianceErrorKind =
  | 'MissingCredential'
  | 'ConfigurationError'
  | 'ExtractionError'
  | 'ServiceError'
  | 'DocumentTooLarge';

export abstract class ComplianceError extends Error {
  abstract readonly kind: ComplianceErrorKind;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingCredentialError extends ComplianceError {
  readonly kind = 'MissingCredential';
  readonly status = 500;

  constructor(readonly variable: string) {
    super(`${variable} is not set. Add it to the environment or to a .env file and start the server again.`);
  }
}

export class ConfigurationError extends ComplianceError {
  readonly kind = 'ConfigurationError';
  readonly status = 500;
}

export class ExtractionError extends ComplianceError {
  readonly kind = 'ExtractionError';
  readonly status = 422;
}

export class ServiceError extends ComplianceError {
  readonly kind = 'ServiceError';
  readonly status = 502;
}

export class DocumentTooLargeError extends ComplianceError {
  readonly kind = 'DocumentTooLarge';
  readonly status = 413;

  constructor(readonly length: number, readonly limit: number) {
    super(`Extracted document text is ${length} characters; the analysis limit is ${limit}. Split the document and upload the parts separately.`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
