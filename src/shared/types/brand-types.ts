import { z } from 'zod';

/**
 * ブランド型定義
 *
 * ドメインの意味を持つ型安全な識別子
 * 単なる文字列ではなく、ビジネス上の意味を型システムで表現
 */

// === 基本識別子 ===

export const StudentIdSchema = z.string()
  .regex(/^[A-Z0-9]{1,20}$/)
  .brand<'StudentId'>();

export const CourseIdSchema = z.string()
  .regex(/^[A-Z0-9]{1,20}$/)
  .brand<'CourseId'>();

/** 開講学期（1始まりの通し番号） */
export const TermSchema = z.number()
  .int()
  .positive()
  .brand<'Term'>();

/** 単位数 */
export const CreditsSchema = z.number()
  .int()
  .positive()
  .brand<'Credits'>();

/** 同時に履修できる単位数の上限（0以上の整数） */
export const CreditLimitSchema = z.number()
  .int()
  .nonnegative()
  .brand<'CreditLimit'>();

export type StudentId = z.infer<typeof StudentIdSchema>;
export type CourseId = z.infer<typeof CourseIdSchema>;
export type Term = z.infer<typeof TermSchema>;
export type Credits = z.infer<typeof CreditsSchema>;
export type CreditLimit = z.infer<typeof CreditLimitSchema>;
