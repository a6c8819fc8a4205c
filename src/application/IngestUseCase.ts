import type { ExtractionPipeline } from './ExtractionPipeline.js';
import type { VectorIndex } from './VectorIndex.js';
import type { IngestStats } from './dto/IngestStats.js';
import type { HierarchicalChunker } from '../infrastructure/chunking/HierarchicalChunker.js';
import type { SessionContext } from '../domain/entities/SessionContext.js';
import { gapPageNumbers, ocrPageNumbers } from '../domain/entities/Document.js';
import type {
  EmptyDocumentError,
  IngestionFailedError,
} from '../domain/errors/DomainErrors.js';
import { IndexUnavailableError, OrphanChildError } from '../domain/errors/DomainErrors.js';
import type { Result } from '../shared/Result.js';
import { fail, ok } from '../shared/Result.js';
import { isRetryableError, withRetry } from '../shared/RetryPolicy.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface IndexRetryOptions {
  maxRetries: number;
  baseDelayMs: number;
}

export type IngestError =
  | IngestionFailedError
  | EmptyDocumentError
  | IndexUnavailableError
  | OrphanChildError;

/**
 * 匯入用例：抽取 → 兩層 chunking → 重建 collection
 *
 * 一份文件對應一個具名 collection；同名再次匯入會整批取代前一代。
 * 產出的 SessionContext 與 collection 一起保存，之後的查詢再讀回。
 */
export class IngestUseCase {
  private readonly logger = new Logger('IngestUseCase');

  constructor(
    private readonly pipeline: ExtractionPipeline,
    private readonly chunker: HierarchicalChunker,
    private readonly index: VectorIndex,
    private readonly retry: IndexRetryOptions,
  ) {}

  async execute(filePath: string, collectionName: string): Promise<Result<IngestStats, IngestError>> {
    const start = Date.now();

    const extracted = await this.pipeline.extract(filePath);
    if (!extracted.ok) return extracted;
    const doc = extracted.value;

    const { parents, children } = this.chunker.chunk(doc);

    const session: SessionContext = {
      collectionName,
      documentId: doc.documentId,
      sourceName: doc.sourceName,
      language: doc.language.code,
      languageConfidence: doc.language.confidence,
      parentCount: parents.length,
      childCount: children.length,
      ocrPages: ocrPageNumbers(doc),
      gapPages: gapPageNumbers(doc),
      embeddingModel: this.index.embeddingModel,
      ingestedAt: Date.now(),
    };

    try {
      const upserted = await withRetry(
        () => this.index.upsert(children, collectionName, { parents, session }),
        {
          maxRetries: this.retry.maxRetries,
          baseDelayMs: this.retry.baseDelayMs,
          isRetryable: isRetryableError,
          onRetry: (attempt, err) => this.logger.warn('Index rebuild retry', {
            attempt, collectionName, error: errorMessage(err),
          }),
        },
      );

      const warnings = doc.pages.flatMap((p) => (p.kind === 'gap' ? [p.error.message] : []));
      return ok({
        session,
        pageCount: doc.pages.length,
        parentsCreated: parents.length,
        childrenCreated: children.length,
        generation: upserted.generation,
        embeddingTokens: upserted.embeddingTokens,
        warnings,
        durationMs: Date.now() - start,
      });
    } catch (err) {
      if (err instanceof IndexUnavailableError || err instanceof OrphanChildError) {
        this.logger.error('Ingestion failed', { collectionName, code: err.code, error: err.message });
        return fail(err);
      }
      throw err;
    }
  }
}
