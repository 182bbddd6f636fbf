import { type Result, map, flatMap, mapError } from './result';

/**
 * Result型パイプライン処理
 *
 * 関数型プログラミングスタイルでのチェーン操作をサポート
 */

export interface ResultPipe<T, E> {
  map<U>(fn: (data: T) => U): ResultPipe<U, E>;
  flatMap<U>(fn: (data: T) => Result<U, E>): ResultPipe<U, E>;
  mapError<F>(fn: (error: E) => F): ResultPipe<T, F>;
  value(): Result<T, E>;
}

/**
 * Result型専用パイプライン - エラーが発生すると途中で停止
 */
export function resultPipe<T, E>(initial: Result<T, E>): ResultPipe<T, E> {
  return {
    map<U>(fn: (data: T) => U) {
      return resultPipe(map(initial, fn));
    },
    flatMap<U>(fn: (data: T) => Result<U, E>) {
      return resultPipe(flatMap(initial, fn));
    },
    mapError<F>(fn: (error: E) => F) {
      return resultPipe(mapError(initial, fn));
    },
    value(): Result<T, E> {
      return initial;
    }
  };
}
