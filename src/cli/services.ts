import path from 'node:path';
import type { PageWiseConfig } from '../config/types.js';
import { loadConfig } from '../config/ConfigLoader.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteCollectionStore } from '../infrastructure/sqlite/SqliteCollectionStore.js';
import { OpenAIEmbeddingAdapter } from '../infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import { OpenAIVisionOcrAdapter } from '../infrastructure/ocr/OpenAIVisionOcrAdapter.js';
import { NullOcrAdapter } from '../infrastructure/ocr/NullOcrAdapter.js';
import { TinyLdLanguageDetector } from '../infrastructure/language/TinyLdLanguageDetector.js';
import { PdfDocumentSource } from '../infrastructure/document/PdfDocumentSource.js';
import { TextDocumentSource } from '../infrastructure/document/TextDocumentSource.js';
import { FileDocumentSource } from '../infrastructure/document/FileDocumentSource.js';
import { OpenAIAnswerGenerator } from '../infrastructure/llm/OpenAIAnswerGenerator.js';
import { NullAnswerGenerator } from '../infrastructure/llm/NullAnswerGenerator.js';
import { HierarchicalChunker } from '../infrastructure/chunking/HierarchicalChunker.js';
import { ExtractionPipeline } from '../application/ExtractionPipeline.js';
import { VectorIndex } from '../application/VectorIndex.js';
import { RetrievalExpander } from '../application/RetrievalExpander.js';
import { IngestUseCase } from '../application/IngestUseCase.js';
import { AskUseCase } from '../application/AskUseCase.js';
import { CollectionHealthUseCase } from '../application/CollectionHealthUseCase.js';
import type { OcrPort } from '../domain/ports/OcrPort.js';
import type { AnswerGeneratorPort } from '../domain/ports/AnswerGeneratorPort.js';
import type { PageWiseError } from '../domain/errors/DomainErrors.js';
import { CollectionLock } from '../shared/CollectionLock.js';
import { setDefaultLogLevel } from '../shared/Logger.js';

export interface Services {
  config: PageWiseConfig;
  index: VectorIndex;
  ingest: IngestUseCase;
  ask: AskUseCase;
  health: CollectionHealthUseCase;
  close(): void;
}

function createOcr(config: PageWiseConfig): OcrPort {
  if (config.ocr.provider === 'openai-vision') {
    return new OpenAIVisionOcrAdapter({
      apiKey: config.ocr.apiKey,
      baseUrl: config.ocr.baseUrl,
      model: config.ocr.model,
      timeoutMs: config.ocr.timeoutMs,
    });
  }
  return new NullOcrAdapter();
}

function createAnswerGenerator(config: PageWiseConfig): AnswerGeneratorPort {
  if (config.answer.provider === 'openai-compatible') {
    return new OpenAIAnswerGenerator({
      baseUrl: config.answer.baseUrl,
      apiKey: config.answer.apiKey,
      model: config.answer.model,
      temperature: config.answer.temperature,
    });
  }
  return new NullAnswerGenerator();
}

/**
 * 依設定組裝所有用例；CLI 指令與 MCP server 共用
 * 呼叫端負責在結束時呼叫 close() 釋放資料庫
 */
export function createServices(repoRoot: string, config: PageWiseConfig): Services {
  const dbMgr = new DatabaseManager(path.resolve(repoRoot, config.store.dbPath));
  const store = new SqliteCollectionStore(dbMgr.getDb());
  const lock = new CollectionLock();

  const embedding = new OpenAIEmbeddingAdapter({
    apiKey: config.embedding.apiKey ?? '',
    model: config.embedding.model,
    dimension: config.embedding.dimension,
    baseUrl: config.embedding.baseUrl,
  });
  const index = new VectorIndex(
    store,
    embedding,
    new EmbeddingBatcher(embedding, config.embedding.maxBatchSize),
    lock,
  );

  const pipeline = new ExtractionPipeline(
    new FileDocumentSource([
      new PdfDocumentSource(config.ingestion.renderScale),
      new TextDocumentSource(),
    ]),
    createOcr(config),
    new TinyLdLanguageDetector(),
    config.ingestion,
  );

  const retry = {
    maxRetries: config.retrieval.indexRetries,
    baseDelayMs: config.retrieval.retryBaseDelayMs,
  };

  return {
    config,
    index,
    ingest: new IngestUseCase(pipeline, new HierarchicalChunker(config.chunking), index, retry),
    ask: new AskUseCase(
      new RetrievalExpander(index, { minScore: config.retrieval.minScore }),
      index,
      createAnswerGenerator(config),
      { retrieval: config.retrieval, answerTimeoutMs: config.answer.timeoutMs },
    ),
    health: new CollectionHealthUseCase(store, lock),
    close: () => dbMgr.close(),
  };
}

/** 載入設定、組裝用例並在 fn 結束後關閉資料庫 */
export async function withServices<T>(
  repoRoot: string,
  fn: (services: Services) => Promise<T>,
): Promise<T> {
  const config = loadConfig(repoRoot);
  setDefaultLogLevel(config.logging.level);
  const services = createServices(repoRoot, config);
  try {
    return await fn(services);
  } finally {
    services.close();
  }
}

/** 以 `Error [CODE]: message` 回報失敗並設定 exit code 1 */
export function reportFailure(error: PageWiseError): void {
  process.stderr.write(`Error [${error.code}]: ${error.message}\n`);
  process.exitCode = 1;
}
