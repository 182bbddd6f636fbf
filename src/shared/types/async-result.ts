import type { Result } from './result';

/**
 * 非同期Result型処理のユーティリティ
 */

export interface RetryOptions<E> {
  maxAttempts: number;
  delay?: (attempt: number) => number;
  shouldRetry?: (error: E) => boolean;
}

const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * リトライ機能付き非同期実行
 *
 * 最後に得られた失敗をそのまま返す
 */
export const retry = async <T, E>(
  operation: (attempt: number) => Promise<Result<T, E>>,
  options: RetryOptions<E>
): Promise<Result<T, E>> => {
  const { delay = () => 1000, shouldRetry = () => true } = options;
  const maxAttempts = Math.max(1, options.maxAttempts);

  let attempt = 1;
  let result = await operation(attempt);

  while (!result.success && attempt < maxAttempts && shouldRetry(result.error)) {
    const wait = delay(attempt);
    if (wait > 0) {
      await sleep(wait);
    }
    attempt++;
    result = await operation(attempt);
  }

  return result;
};
