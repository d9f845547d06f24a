import path from 'path';
import {
  ConfigurationError,
  MissingCredentialError,
  parseLogLevel
} from '../../../lib/compliance-analyst';
import type { LogLevel } from '../../../lib/compliance-analyst/logger';
import {
  AI_REQUEST_TIMEOUT_MS,
  MAX_DOCUMENT_CHARS
} from '../../../lib/compliance-analyst/configuration/config';

export const CREDENTIAL_VARIABLE = 'OPENAI_API_KEY';
export const DEFAULT_PORT = 3000;
export const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

export interface AppConfig {
  openAIApiKey: string;
  port: number;
  maxUploadBytes: number;
  maxDocumentChars: number;
  modelTimeoutMs: number;
  logLevel: LogLevel;
  staticDir: string;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}".`);
  }
  return Number(raw);
}

/**
 * Reads the server configuration. The credential is checked first so that a
 * missing key stops startup before anything else is read or built.
 */
export function loadConfig(env: NodeJS.ProcessEnv, cwd: string = process.cwd()): AppConfig {
  const openAIApiKey = env[CREDENTIAL_VARIABLE]?.trim();
  if (!openAIApiKey) {
    throw new MissingCredentialError(CREDENTIAL_VARIABLE);
  }

  return {
    openAIApiKey,
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
    maxDocumentChars: readPositiveInt(env, 'MAX_DOCUMENT_CHARS', MAX_DOCUMENT_CHARS),
    modelTimeoutMs: readPositiveInt(env, 'MODEL_TIMEOUT_MS', AI_REQUEST_TIMEOUT_MS),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    staticDir: path.resolve(cwd, env.STATIC_DIR?.trim() || path.join('backend', 'public'))
  };
}

export function maskCredential(value: string): string {
  if (value.length <= 12) return '****';
  return `${value.slice(0, 7)}...${value.slice(-4)}`;
}
