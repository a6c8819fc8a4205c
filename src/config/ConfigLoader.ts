import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { PageWiseConfig, PartialConfig } from './types.js';
import { ConfigValidationError } from '../domain/errors/DomainErrors.js';
import { parseLogLevel } from '../shared/Logger.js';

export type { PageWiseConfig, PartialConfig } from './types.js';

export const CONFIG_FILE_NAME = '.pagewise.json';

/** .pagewise.json 的結構；所有欄位皆可省略 */
const fileConfigSchema = z.object({
  version: z.number(),
  store: z.object({
    dbPath: z.string(),
    defaultCollection: z.string(),
  }),
  embedding: z.object({
    provider: z.literal('openai'),
    model: z.string(),
    dimension: z.number(),
    maxBatchSize: z.number(),
    apiKey: z.string(),
    baseUrl: z.string(),
  }),
  chunking: z.object({
    parentSize: z.number(),
    childSize: z.number(),
    childOverlap: z.number(),
  }),
  ingestion: z.object({
    ocrMinCharsPerPage: z.number(),
    languageMinConfidence: z.number(),
    renderScale: z.number(),
  }),
  ocr: z.object({
    provider: z.enum(['openai-vision', 'none']),
    model: z.string(),
    baseUrl: z.string(),
    apiKey: z.string(),
    timeoutMs: z.number(),
  }),
  retrieval: z.object({
    topK: z.number(),
    contextBudget: z.number(),
    minScore: z.number(),
    indexRetries: z.number(),
    retryBaseDelayMs: z.number(),
  }),
  answer: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string(),
    apiKey: z.string(),
    model: z.string(),
    temperature: z.number(),
    timeoutMs: z.number(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
}).deepPartial();

/** 逐區塊合併：partial 覆蓋 base */
function mergeConfig(base: PageWiseConfig, partial: PartialConfig): PageWiseConfig {
  return {
    version: partial.version ?? base.version,
    store: { ...base.store, ...partial.store },
    embedding: { ...base.embedding, ...partial.embedding },
    chunking: { ...base.chunking, ...partial.chunking },
    ingestion: { ...base.ingestion, ...partial.ingestion },
    ocr: { ...base.ocr, ...partial.ocr },
    retrieval: { ...base.retrieval, ...partial.retrieval },
    answer: { ...base.answer, ...partial.answer },
    logging: { ...base.logging, ...partial.logging },
  };
}

/** 環境變數覆蓋 config：OPENAI_BASE_URL / OPENAI_API_KEY / PAGEWISE_LOG_LEVEL */
function applyEnvOverrides(config: PageWiseConfig): void {
  const baseUrl = process.env.OPENAI_BASE_URL;
  if (baseUrl) {
    config.embedding.baseUrl = baseUrl;
    config.answer.baseUrl = baseUrl;
    config.ocr.baseUrl = baseUrl;
  }

  const apiKey = process.env.OPENAI_API_KEY;
  if (apiKey) {
    config.embedding.apiKey ??= apiKey;
    config.answer.apiKey ??= apiKey;
    config.ocr.apiKey ??= apiKey;
  }

  const level = parseLogLevel(process.env.PAGEWISE_LOG_LEVEL);
  if (level) config.logging.level = level;
}

function requirePositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`${name} must be a positive integer`);
  }
}

/** 驗證設定值的合法性 */
function validate(config: PageWiseConfig): void {
  requirePositiveInteger(config.embedding.dimension, 'dimension');
  requirePositiveInteger(config.embedding.maxBatchSize, 'maxBatchSize');

  const { parentSize, childSize, childOverlap } = config.chunking;
  requirePositiveInteger(parentSize, 'parentSize');
  requirePositiveInteger(childSize, 'childSize');
  if (!Number.isInteger(childOverlap) || childOverlap < 0) {
    throw new ConfigValidationError('childOverlap must be a non-negative integer');
  }
  if (childOverlap >= childSize) {
    throw new ConfigValidationError('childOverlap must be smaller than childSize');
  }
  if (childSize > parentSize) {
    throw new ConfigValidationError('childSize must not exceed parentSize');
  }

  requirePositiveInteger(config.retrieval.topK, 'topK');
  requirePositiveInteger(config.retrieval.contextBudget, 'contextBudget');
  if (config.retrieval.minScore < -1 || config.retrieval.minScore > 1) {
    throw new ConfigValidationError('minScore must be between -1 and 1');
  }

  const confidence = config.ingestion.languageMinConfidence;
  if (confidence < 0 || confidence > 1) {
    throw new ConfigValidationError('languageMinConfidence must be between 0 and 1');
  }
  if (config.ingestion.ocrMinCharsPerPage < 0) {
    throw new ConfigValidationError('ocrMinCharsPerPage must not be negative');
  }
  requirePositiveInteger(config.answer.timeoutMs, 'answer.timeoutMs');
}

/** 讀取並驗證設定檔；不存在時回傳空物件 */
function readFileConfig(rootDir: string): PartialConfig {
  const configPath = path.join(rootDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(`${CONFIG_FILE_NAME} is not valid JSON`, { cause: err });
  }

  const parsed = fileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigValidationError(
      `${CONFIG_FILE_NAME}: ${issue.path.join('.')} ${issue.message}`,
    );
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .pagewise.json（若存在）並合併到預設值上
 * @param rootDir - 工作根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  rootDir: string,
  overrides?: PartialConfig,
): PageWiseConfig {
  const fileConfig = readFileConfig(rootDir);

  // 合併順序：defaults < file config < overrides
  let merged = mergeConfig(structuredClone(DEFAULT_CONFIG), fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }

  // 環境變數優先於檔案設定
  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
