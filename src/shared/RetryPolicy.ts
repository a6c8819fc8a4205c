import { PageWiseError } from '../domain/errors/DomainErrors.js';

export interface RetryOptions {
  /** 初始嘗試之外的重試次數 */
  maxRetries: number;
  baseDelayMs: number;
  isRetryable: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

/** 第 attempt 次重試前的等待：base × 2^(attempt-1) 再加最多一個 base 的 jitter */
export function backoffDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * 2 ** (attempt - 1) + Math.random() * baseDelayMs;
}

/**
 * 指數退避重試。不可重試的錯誤或用盡次數時，原樣拋出最後一次的錯誤。
 */
export async function withRetry<T>(
  operation: () => T | Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (attempt > opts.maxRetries || !opts.isRetryable(err)) throw err;
      opts.onRetry?.(attempt, err);
      await new Promise<void>((resolve) => setTimeout(resolve, backoffDelay(attempt, opts.baseDelayMs)));
    }
  }
}

/** 只重試 classification 為 retryable 的 domain 錯誤 */
export function isRetryableError(err: unknown): boolean {
  return err instanceof PageWiseError && err.classification === 'retryable';
}
