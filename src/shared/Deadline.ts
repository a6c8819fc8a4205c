/** 操作超過期限時丟出；呼叫端自行轉為對應的 domain 錯誤 */
export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation exceeded ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * 以 AbortSignal 限制非同步操作的執行時間
 *
 * operation 應把 signal 傳給底層 I/O（例如 OpenAI SDK 的 request options），
 * 期限一到即 abort 並以 DeadlineExceededError reject，不等待底層回應。
 */
export async function withDeadline<T>(
  timeoutMs: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let expired = false;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      reject(new DeadlineExceededError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } catch (err) {
    // abort 造成的底層錯誤一律視為逾時
    if (expired) throw new DeadlineExceededError(timeoutMs);
    throw err;
  } finally {
    clearTimeout(timer);
  }
}
