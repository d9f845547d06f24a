import { AIModelEnum } from "../enums/ai-model.enum";
import { DetailLevelEnum } from "../enums/detail-level.enum";

export const AI_MODEL = AIModelEnum.GPT_4O;
export const AI_MODEL_TEMP = 0;
export const AI_MAX_COMPLETION_TOKENS = 8000;
export const AI_REQUEST_TIMEOUT_MS = 120_000;

// Roughly 100k tokens, leaving room for the instructions and the answer in a 128k context.
export const MAX_DOCUMENT_CHARS = 400_000;

export const DEFAULT_DETAIL_LEVEL = DetailLevelEnum.STANDARD;
