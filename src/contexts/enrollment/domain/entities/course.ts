import { z } from 'zod';
import {
  type Result,
  type CourseId,
  type Credits,
  type Term,
  CourseIdSchema,
  CreditsSchema,
  TermSchema,
  parseWith
} from '../../../../shared/types/index';
import { type ValidationError, fromZodError } from '../errors/errors';
import { type Schedule, ScheduleSchema } from './schedule';

/**
 * 科目
 *
 * カタログ読み込み時に一度だけ作られ、その後は変更されない。
 * 前提科目は科目コードで参照する（オブジェクト同一性には依存しない）。
 */

export const CourseSchema = z.object({
  code: CourseIdSchema,
  name: z.string().trim().min(1),
  credits: CreditsSchema,
  term: TermSchema,
  prerequisites: z.array(CourseIdSchema).default([]),
  schedules: z.array(ScheduleSchema).default([])
}).superRefine((course, ctx) => {
  const seen = new Set<string>();
  course.prerequisites.forEach((prerequisite, index) => {
    if (prerequisite === course.code) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a course cannot be its own prerequisite',
        path: ['prerequisites', index]
      });
    }
    if (seen.has(prerequisite)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate prerequisite ${prerequisite}`,
        path: ['prerequisites', index]
      });
    }
    seen.add(prerequisite);
  });
});

export type CourseInput = z.input<typeof CourseSchema>;

export interface Course {
  readonly code: CourseId;
  readonly name: string;
  readonly credits: Credits;
  readonly term: Term;
  readonly prerequisites: readonly CourseId[];
  readonly schedules: readonly Schedule[];
}

export function createCourse(input: CourseInput): Result<Course, ValidationError> {
  return parseWith(
    CourseSchema,
    input,
    zodError => fromZodError('course', zodError, 'INVALID_COURSE', input)
  );
}

export function formatCourse(course: Course): string {
  return `${course.code} - ${course.name} (${course.credits} credits)`;
}
