import { z } from 'zod';
import {
  type Result,
  type CreditLimit,
  Ok,
  Err,
  CreditLimitSchema,
  parseWith,
  resultPipe
} from '../../../../shared/types/index';
import { type IneligibilityReason, type ValidationError, fromZodError } from '../errors/errors';
import type { Course } from '../entities/course';
import { type Student, isEnrolledIn, hasApproved, totalActiveCredits } from '../entities/student';
import { schedulesOverlap, formatSchedule } from '../entities/schedule';

/**
 * 履修可否の判定
 *
 * 純粋関数。学生の状態は変更せず、判定結果だけを返す。
 * ルールは以下の順に評価し、最初に違反したルールのみを理由として返す。
 *   1. 重複履修
 *   2. 前提科目（前提科目リストの順）
 *   3. 単位上限（上限ちょうどは可）
 *   4. 時間割の重複
 */

export const DEFAULT_MAX_CREDITS_PER_TERM = 24;

export interface EvaluationOptions {
  /** 同時に履修できる単位数の上限 */
  readonly maxCredits: CreditLimit;
}

const EvaluationOptionsSchema = z.object({
  maxCredits: CreditLimitSchema
});

/**
 * 判定オプションの作成（上限は0以上の整数）
 */
export function createEvaluationOptions(maxCredits: number): Result<EvaluationOptions, ValidationError> {
  return parseWith(
    EvaluationOptionsSchema,
    { maxCredits },
    zodError => fromZodError('evaluation options', zodError, 'INVALID_CREDIT_LIMIT', maxCredits)
  );
}

export const DEFAULT_EVALUATION_OPTIONS: EvaluationOptions = {
  maxCredits: CreditLimitSchema.parse(DEFAULT_MAX_CREDITS_PER_TERM)
};

export interface EligibleEnrollment {
  readonly course: Course;
  /** 履修後の合計単位数 */
  readonly resultingCredits: number;
}

export type EnrollmentEvaluation = Result<EligibleEnrollment, IneligibilityReason>;

type EnrollmentRule = (
  student: Student,
  course: Course,
  options: EvaluationOptions
) => Result<void, IneligibilityReason>;

const passed: Result<void, IneligibilityReason> = Ok(undefined);

export const checkNotAlreadyEnrolled: EnrollmentRule = (student, course) =>
  isEnrolledIn(student, course.code)
    ? Err<void, IneligibilityReason>({
        type: 'Ineligible',
        rule: 'ALREADY_ENROLLED',
        message: `Already enrolled in ${course.code}`,
        courseId: course.code
      })
    : passed;

export const checkPrerequisites: EnrollmentRule = (student, course) => {
  const missing = course.prerequisites.find(prerequisite => !hasApproved(student, prerequisite));
  if (missing === undefined) {
    return passed;
  }
  return Err<void, IneligibilityReason>({
    type: 'Ineligible',
    rule: 'MISSING_PREREQUISITE',
    message: `Missing prerequisite: ${missing}`,
    courseId: course.code,
    prerequisite: missing
  });
};

export const checkCreditLimit: EnrollmentRule = (student, course, { maxCredits }) => {
  const currentCredits = totalActiveCredits(student);
  if (currentCredits + course.credits <= maxCredits) {
    return passed;
  }
  return Err<void, IneligibilityReason>({
    type: 'Ineligible',
    rule: 'CREDIT_LIMIT_EXCEEDED',
    message: `Exceeds credit limit: ${currentCredits}+${course.credits} of ${maxCredits} credits`,
    courseId: course.code,
    currentCredits,
    requestedCredits: course.credits,
    maxCredits
  });
};

export const checkScheduleConflicts: EnrollmentRule = (student, course) => {
  for (const enrollment of student.enrollments) {
    for (const existing of enrollment.course.schedules) {
      const schedule = course.schedules.find(candidate => schedulesOverlap(candidate, existing));
      if (schedule) {
        return Err<void, IneligibilityReason>({
          type: 'Ineligible',
          rule: 'SCHEDULE_CONFLICT',
          message: `Schedule conflict with ${enrollment.course.code}: ${formatSchedule(schedule)} overlaps ${formatSchedule(existing)}`,
          courseId: course.code,
          conflictingCourse: enrollment.course.code,
          schedule,
          conflictingSchedule: existing
        });
      }
    }
  }
  return passed;
};

/**
 * 学生が科目を履修できるか判定する
 */
export function evaluate(
  student: Student,
  course: Course,
  options: EvaluationOptions = DEFAULT_EVALUATION_OPTIONS
): EnrollmentEvaluation {
  return resultPipe(checkNotAlreadyEnrolled(student, course, options))
    .flatMap(() => checkPrerequisites(student, course, options))
    .flatMap(() => checkCreditLimit(student, course, options))
    .flatMap(() => checkScheduleConflicts(student, course, options))
    .map((): EligibleEnrollment => ({
      course,
      resultingCredits: totalActiveCredits(student) + course.credits
    }))
    .value();
}
