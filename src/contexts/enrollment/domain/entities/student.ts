import { z } from 'zod';
import {
  type Result,
  type StudentId,
  type CourseId,
  StudentIdSchema,
  CourseIdSchema,
  parseWith
} from '../../../../shared/types/index';
import { type ValidationError, fromZodError } from '../errors/errors';
import { type Course, CourseSchema } from './course';

/**
 * 学生と履修（アクティブな履修登録）
 *
 * Student は不変値。履修の追加・取消・単位認定は
 * aggregates/student-aggregate の関数が新しい Student を返す。
 */

export const EnrollmentSchema = z.object({
  studentId: StudentIdSchema,
  course: CourseSchema
});

export interface Enrollment {
  readonly studentId: StudentId;
  readonly course: Course;
}

export const StudentSchema = z.object({
  studentId: StudentIdSchema,
  name: z.string().trim().min(1),
  approvedCourses: z.array(CourseIdSchema).default([]),
  enrollments: z.array(EnrollmentSchema).default([]),
  version: z.number().int().positive().default(1)
}).superRefine((student, ctx) => {
  if (new Set(student.approvedCourses).size !== student.approvedCourses.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'approved courses must not contain duplicates',
      path: ['approvedCourses']
    });
  }

  const enrolled = new Set<string>();
  student.enrollments.forEach((enrollment, index) => {
    if (enrollment.studentId !== student.studentId) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `enrollment belongs to ${enrollment.studentId}`,
        path: ['enrollments', index, 'studentId']
      });
    }
    if (enrolled.has(enrollment.course.code)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `already enrolled in ${enrollment.course.code}`,
        path: ['enrollments', index, 'course', 'code']
      });
    }
    enrolled.add(enrollment.course.code);
  });
});

export type StudentInput = z.input<typeof StudentSchema>;

export interface Student {
  readonly studentId: StudentId;
  readonly name: string;
  readonly approvedCourses: readonly CourseId[];
  readonly enrollments: readonly Enrollment[];
  readonly version: number;
}

export function createStudent(input: StudentInput): Result<Student, ValidationError> {
  return parseWith(
    StudentSchema,
    input,
    zodError => fromZodError('student', zodError, 'INVALID_STUDENT', input)
  );
}

// === 参照系ヘルパー ===

export const isEnrolledIn = (student: Student, courseId: CourseId): boolean =>
  student.enrollments.some(enrollment => enrollment.course.code === courseId);

export const hasApproved = (student: Student, courseId: CourseId): boolean =>
  student.approvedCourses.includes(courseId);

export const totalActiveCredits = (student: Student): number =>
  student.enrollments.reduce((total, enrollment) => total + enrollment.course.credits, 0);
