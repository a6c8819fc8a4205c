import type { PageWiseConfig } from './types.js';

export const DEFAULT_CONFIG: PageWiseConfig = {
  version: 1,
  store: {
    dbPath: '.pagewise/index.db',
    defaultCollection: 'pdf_collection',
  },
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimension: 1536,
    maxBatchSize: 100,
  },
  chunking: {
    parentSize: 1000,
    childSize: 200,
    childOverlap: 50,
  },
  ingestion: {
    ocrMinCharsPerPage: 50,
    languageMinConfidence: 0.5,
    renderScale: 2,
  },
  ocr: {
    provider: 'openai-vision',
    model: 'gpt-4o-mini',
    timeoutMs: 60000,
  },
  retrieval: {
    topK: 8,
    contextBudget: 3000,
    minScore: 0.3,
    indexRetries: 2,
    retryBaseDelayMs: 200,
  },
  answer: {
    provider: 'openai-compatible',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    temperature: 0.2,
    timeoutMs: 30000, // 30 秒
  },
  logging: {
    level: 'info',
  },
};
