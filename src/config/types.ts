import type { LogLevel } from '../shared/Logger.js';

/** Embedding 提供者設定 */
export interface EmbeddingConfig {
  provider: 'openai';
  model: string;
  dimension: number;
  maxBatchSize: number;
  apiKey?: string;
  baseUrl?: string;
}

/** Hierarchical chunking 設定（單位：估算 token，1 token ≈ 4 chars） */
export interface ChunkingConfig {
  parentSize: number;
  childSize: number;
  childOverlap: number;
}

/** 文件抽取設定 */
export interface IngestionConfig {
  /** 原生文字層非空白字元數低於此值即視為影像頁，改走 OCR */
  ocrMinCharsPerPage: number;
  /** 語言偵測信心低於此值時標記為 unknown */
  languageMinConfidence: number;
  /** 送 OCR 前的頁面渲染倍率 */
  renderScale: number;
}

/** OCR 設定 */
export interface OcrConfig {
  /** 'openai-vision' 透過 chat completions 辨識頁面影像，'none' 停用 */
  provider: 'openai-vision' | 'none';
  model: string;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
}

/** 檢索與 parent 擴展設定 */
export interface RetrievalConfig {
  topK: number;
  /** context budget（估算 token） */
  contextBudget: number;
  /** cosine similarity 低於此值的命中視為不相關 */
  minScore: number;
  /** IndexUnavailable 時的重試次數 */
  indexRetries: number;
  retryBaseDelayMs: number;
}

/** 答案生成設定 */
export interface AnswerConfig {
  /** 'openai-compatible' 或 'none'（只回傳檢索結果） */
  provider: 'openai-compatible' | 'none';
  baseUrl: string;
  apiKey?: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

/** 儲存設定 */
export interface StoreConfig {
  dbPath: string;
  defaultCollection: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface PageWiseConfig {
  version: number;
  store: StoreConfig;
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  ingestion: IngestionConfig;
  ocr: OcrConfig;
  retrieval: RetrievalConfig;
  answer: AnswerConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof PageWiseConfig]?: PageWiseConfig[K] extends object ? Partial<PageWiseConfig[K]> : PageWiseConfig[K];
};
