import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingRateLimitError } from '../../domain/errors/DomainErrors.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';

export interface RateLimitRetry {
  maxRetries: number;
  baseDelayMs: number;
}

const DEFAULT_RATE_LIMIT_RETRY: RateLimitRetry = { maxRetries: 3, baseDelayMs: 1000 };

/**
 * 將大量文字拆成批次送入 EmbeddingPort
 * 單一批次遇到 EmbeddingRateLimitError 時以指數退避重試，其餘錯誤直接拋出
 */
export class EmbeddingBatcher {
  private readonly logger = new Logger('EmbeddingBatcher');

  constructor(
    private readonly provider: EmbeddingPort,
    private readonly maxBatchSize: number = 100,
    private readonly rateLimitRetry: RateLimitRetry = DEFAULT_RATE_LIMIT_RETRY,
  ) {}

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const results: EmbeddingResult[] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      const batch = texts.slice(i, i + this.maxBatchSize);
      const batchResults = await withRetry(() => this.provider.embed(batch), {
        ...this.rateLimitRetry,
        isRetryable: (err) => err instanceof EmbeddingRateLimitError,
        onRetry: (attempt) => this.logger.warn('Embedding rate limited, retrying', { attempt, batchStart: i }),
      });
      if (batchResults.length !== batch.length) {
        throw new Error(`Embedding provider returned ${batchResults.length} vectors for ${batch.length} texts`);
      }
      results.push(...batchResults);
    }
    return results;
  }
}
