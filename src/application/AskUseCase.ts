import type { RetrievalExpander } from './RetrievalExpander.js';
import type { VectorIndex } from './VectorIndex.js';
import type { AskOutcome, AskRequest } from './dto/AskOutcome.js';
import type { RetrievalResult } from '../domain/entities/RetrievalResult.js';
import { UNKNOWN_LANGUAGE } from '../domain/entities/Document.js';
import type { AnswerContext, AnswerGeneratorPort } from '../domain/ports/AnswerGeneratorPort.js';
import {
  AnswerGenerationFailedError,
  AnswerGenerationTimeoutError,
  CollectionNotFoundError,
  IndexUnavailableError,
  OrphanChildError,
} from '../domain/errors/DomainErrors.js';
import type { RetrievalConfig } from '../config/types.js';
import type { Result } from '../shared/Result.js';
import { fail, ok } from '../shared/Result.js';
import { isRetryableError, withRetry } from '../shared/RetryPolicy.js';
import { DeadlineExceededError, withDeadline } from '../shared/Deadline.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export type AskError = IndexUnavailableError | CollectionNotFoundError | OrphanChildError;

export interface AskSettings {
  retrieval: Pick<RetrievalConfig, 'topK' | 'contextBudget' | 'indexRetries' | 'retryBaseDelayMs'>;
  answerTimeoutMs: number;
}

export const DEGRADED_ANSWER =
  'An answer could not be generated. The passages below were retrieved from the document and may contain it.';

/**
 * 問答用例：檢索擴展 → 答案生成
 *
 * 索引暫時不可用時以指數退避重試；答案生成有時限，逾時或失敗時
 * 降級為只回傳檢索到的 context 與引用，不中斷呼叫端。
 */
export class AskUseCase {
  private readonly logger = new Logger('AskUseCase');

  constructor(
    private readonly expander: RetrievalExpander,
    private readonly index: VectorIndex,
    private readonly generator: AnswerGeneratorPort,
    private readonly settings: AskSettings,
  ) {}

  async retrieve(request: AskRequest): Promise<Result<RetrievalResult, AskError>> {
    const { retrieval } = this.settings;
    const k = request.topK ?? retrieval.topK;
    const budget = request.contextBudget ?? retrieval.contextBudget;

    try {
      const result = await withRetry(
        () => this.expander.expand(request.question, k, budget, request.collectionName),
        {
          maxRetries: retrieval.indexRetries,
          baseDelayMs: retrieval.retryBaseDelayMs,
          isRetryable: isRetryableError,
          onRetry: (attempt, err) => this.logger.warn('Retrieval retry', {
            attempt, collectionName: request.collectionName, error: errorMessage(err),
          }),
        },
      );
      return ok(result);
    } catch (err) {
      if (
        err instanceof IndexUnavailableError
        || err instanceof CollectionNotFoundError
        || err instanceof OrphanChildError
      ) {
        return fail(err);
      }
      throw err;
    }
  }

  async ask(request: AskRequest): Promise<Result<AskOutcome, AskError>> {
    const retrieved = await this.retrieve(request);
    if (!retrieved.ok) return retrieved;
    const retrieval = retrieved.value;

    if (retrieval.status !== 'ok') {
      return ok({ status: retrieval.status, answer: null, citations: [], retrieval });
    }

    const contexts: AnswerContext[] = retrieval.contexts.map((c, i) => ({
      index: i + 1,
      text: c.text,
      citation: c.citation,
    }));
    const allCitations = contexts.map((c) => c.citation);
    const language = await this.documentLanguage(request.collectionName);
    const timeoutMs = this.settings.answerTimeoutMs;

    try {
      const generated = await withDeadline(timeoutMs, (signal) =>
        this.generator.generate({ query: request.question, contexts, language }, signal),
      );

      const referenced = new Set(generated.referencedIndexes);
      const citations = referenced.size === 0
        ? allCitations
        : contexts.filter((c) => referenced.has(c.index)).map((c) => c.citation);

      return ok({ status: 'answered', answer: generated.answer, citations, retrieval });
    } catch (err) {
      const error = err instanceof DeadlineExceededError
        ? new AnswerGenerationTimeoutError(timeoutMs, { cause: err })
        : err instanceof AnswerGenerationFailedError
          ? err
          : new AnswerGenerationFailedError(`Answer generation failed: ${errorMessage(err)}`, { cause: err });

      this.logger.warn('Answer degraded', { code: error.code, error: error.message });
      return ok({
        status: 'degraded',
        answer: DEGRADED_ANSWER,
        citations: allCitations,
        retrieval,
        degradation: { code: error.code, message: error.message },
      });
    }
  }

  /** 匯入時記錄的文件語言；讀不到時視為 unknown */
  private async documentLanguage(collectionName: string): Promise<string> {
    try {
      const described = await this.index.describe(collectionName);
      return described?.info.session?.language ?? UNKNOWN_LANGUAGE;
    } catch (err) {
      this.logger.debug('Session language unavailable', { collectionName, error: errorMessage(err) });
      return UNKNOWN_LANGUAGE;
    }
  }
}
