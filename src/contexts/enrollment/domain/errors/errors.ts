import { z } from 'zod';
import type { Result, CourseId } from '../../../../shared/types/index';
import { Err } from '../../../../shared/types/index';
import type { Schedule } from '../entities/schedule';

/**
 * Domain層エラー
 *
 * 例外ではなく値としてエラーを返す。
 * - 構築時の不変条件違反: ValidationError
 * - 存在しないエンティティ: NotFoundError
 * - 楽観的ロック競合: ConcurrencyError
 * - 履修不可の理由: IneligibilityReason（タイムスタンプを持たない純粋な値）
 */

// === 基底エラースキーマ ===
export const DomainErrorBaseSchema = z.object({
  type: z.string(),
  message: z.string(),
  code: z.string(),
  timestamp: z.date().default(() => new Date())
});

// === 検証エラー（入力値の問題） ===
export const ValidationErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('ValidationError'),
  field: z.string().optional(),
  value: z.unknown().optional()
});

// === 存在しないエンティティエラー ===
export const NotFoundErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('NotFoundError'),
  entity: z.string(),
  id: z.string()
});

// === 並行性制御エラー（楽観的ロック） ===
export const ConcurrencyErrorSchema = DomainErrorBaseSchema.extend({
  type: z.literal('ConcurrencyError'),
  expectedVersion: z.number(),
  actualVersion: z.number(),
  entityId: z.string()
});

export type ValidationError = z.infer<typeof ValidationErrorSchema>;
export type NotFoundError = z.infer<typeof NotFoundErrorSchema>;
export type ConcurrencyError = z.infer<typeof ConcurrencyErrorSchema>;

// === 履修不可の理由（最初に違反したルールのみ） ===

export type IneligibilityReason =
  | {
      readonly type: 'Ineligible';
      readonly rule: 'ALREADY_ENROLLED';
      readonly message: string;
      readonly courseId: CourseId;
    }
  | {
      readonly type: 'Ineligible';
      readonly rule: 'MISSING_PREREQUISITE';
      readonly message: string;
      readonly courseId: CourseId;
      readonly prerequisite: CourseId;
    }
  | {
      readonly type: 'Ineligible';
      readonly rule: 'CREDIT_LIMIT_EXCEEDED';
      readonly message: string;
      readonly courseId: CourseId;
      readonly currentCredits: number;
      readonly requestedCredits: number;
      readonly maxCredits: number;
    }
  | {
      readonly type: 'Ineligible';
      readonly rule: 'SCHEDULE_CONFLICT';
      readonly message: string;
      readonly courseId: CourseId;
      readonly conflictingCourse: CourseId;
      readonly schedule: Schedule;
      readonly conflictingSchedule: Schedule;
    };

export type IneligibilityRule = IneligibilityReason['rule'];

export type EnrollmentError =
  | ValidationError
  | NotFoundError
  | ConcurrencyError
  | IneligibilityReason;

// === エラーファクトリ関数 ===
export const createValidationError = (
  message: string,
  code: string = 'VALIDATION_FAILED',
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  code,
  timestamp: new Date(),
  field,
  value
});

/**
 * ZodErrorの最初の問題をValidationErrorに変換
 */
export const fromZodError = (
  subject: string,
  zodError: z.ZodError,
  code: string,
  value?: unknown
): ValidationError => {
  const issue = zodError.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : undefined;
  const detail = issue ? issue.message : zodError.message;
  return createValidationError(
    field ? `Invalid ${subject}: ${field}: ${detail}` : `Invalid ${subject}: ${detail}`,
    code,
    field,
    value
  );
};

export const createNotFoundError = (
  entity: string,
  id: string
): NotFoundError => ({
  type: 'NotFoundError',
  message: `${entity} with id ${id} not found`,
  code: 'NOT_FOUND',
  entity,
  id,
  timestamp: new Date()
});

export const createConcurrencyError = (
  expectedVersion: number,
  actualVersion: number,
  entityId: string
): ConcurrencyError => ({
  type: 'ConcurrencyError',
  message: `Optimistic lock failure. Expected version ${expectedVersion}, but was ${actualVersion}`,
  code: 'CONCURRENCY_ERROR',
  expectedVersion,
  actualVersion,
  entityId,
  timestamp: new Date()
});

// === エラー分析ヘルパー ===
export const isValidationError = (error: EnrollmentError): error is ValidationError =>
  error.type === 'ValidationError';

export const isNotFoundError = (error: EnrollmentError): error is NotFoundError =>
  error.type === 'NotFoundError';

export const isConcurrencyError = (error: EnrollmentError): error is ConcurrencyError =>
  error.type === 'ConcurrencyError';

export const isIneligible = (error: EnrollmentError): error is IneligibilityReason =>
  error.type === 'Ineligible';

// === Result型用のエラーファクトリ関数 ===

export const validationFailure = <T>(
  message: string,
  code: string = 'VALIDATION_FAILED',
  field?: string,
  value?: unknown
): Result<T, ValidationError> => {
  return Err(createValidationError(message, code, field, value));
};

export const notFoundFailure = <T>(
  entity: string,
  id: string
): Result<T, NotFoundError> => {
  return Err(createNotFoundError(entity, id));
};
