/**
 * Shared Types - 統合エクスポート
 *
 * - Result型とその操作
 * - 非同期処理ユーティリティ
 * - パイプライン処理
 * - ドメイン固有のブランド型
 */

// === Result型とその基本操作 ===
export {
  type Result,
  Ok,
  Err,
  map,
  flatMap,
  mapError,
  match,
  all,
  parseWith,
  fromAsync
} from './result';

// === 非同期Result型処理 ===
export { retry, type RetryOptions } from './async-result';

// === パイプライン処理 ===
export { resultPipe, type ResultPipe } from './pipeline';

// === ドメイン固有のブランド型 ===
export {
  type StudentId,
  type CourseId,
  type Term,
  type Credits,
  type CreditLimit,
  StudentIdSchema,
  CourseIdSchema,
  TermSchema,
  CreditsSchema,
  CreditLimitSchema
} from './brand-types';
