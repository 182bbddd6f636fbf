import { z } from 'zod';
import {
  type Result,
  type StudentId,
  type CourseId,
  Ok,
  Err,
  StudentIdSchema,
  CourseIdSchema
} from '../../../shared/types/index';
import {
  type EnrollmentError,
  type IneligibilityRule,
  type ValidationError,
  fromZodError
} from '../domain/errors/errors';
import type { Student } from '../domain/entities/student';
import { totalActiveCredits } from '../domain/entities/student';
import { formatSchedule } from '../domain/entities/schedule';
import type { EnrollmentEvaluation } from '../domain/services/enrollment-validator';

/**
 * DTO（アプリケーション層の入出力）
 *
 * 入力はプレーンな文字列で受け取りZodで検証する。
 * 出力はドメインオブジェクトを直接公開せず、JSONにできる形へ変換する。
 */

// === Command DTOs (入力用) ===

export const RegisterStudentCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  name: z.string().min(1, 'Name is required'),
  approvedCourses: z.array(z.string()).optional()
});

export type RegisterStudentCommand = z.infer<typeof RegisterStudentCommandSchema>;

export const EnrollmentCommandSchema = z.object({
  studentId: z.string().min(1, 'Student ID is required'),
  courseId: z.string().min(1, 'Course ID is required')
});

/** 履修判定・履修登録・履修取消・単位認定で共通 */
export type EnrollmentCommand = z.infer<typeof EnrollmentCommandSchema>;

// === Response DTOs (出力用) ===

export interface EnrolledCourseResponse {
  courseId: string;
  name: string;
  credits: number;
  term: number;
  schedules: string[];
}

export interface StudentResponse {
  studentId: string;
  name: string;
  approvedCourses: string[];
  enrollments: EnrolledCourseResponse[];
  totalCredits: number;
  version: number;
}

export type EvaluationResponse =
  | { eligible: true; courseId: string; resultingCredits: number }
  | { eligible: false; courseId: string; rule: IneligibilityRule; message: string };

export interface EnrollmentResponse {
  courseId: string;
  resultingCredits: number;
  student: StudentResponse;
}

export interface ErrorResponse {
  type: EnrollmentError['type'];
  message: string;
  code: string;
  timestamp: string;

  field?: string;            // ValidationError用
  rule?: IneligibilityRule;  // Ineligible用
  entity?: string;           // NotFoundError用
  expectedVersion?: number;  // ConcurrencyError用
  actualVersion?: number;    // ConcurrencyError用
  details?: Record<string, unknown>;
}

// === DTO Mappers ===

export const mapStudentToResponse = (student: Student): StudentResponse => ({
  studentId: student.studentId,
  name: student.name,
  approvedCourses: [...student.approvedCourses],
  enrollments: student.enrollments.map(({ course }) => ({
    courseId: course.code,
    name: course.name,
    credits: course.credits,
    term: course.term,
    schedules: course.schedules.map(formatSchedule)
  })),
  totalCredits: totalActiveCredits(student),
  version: student.version
});

export const mapEvaluationToResponse = (
  courseId: CourseId,
  evaluation: EnrollmentEvaluation
): EvaluationResponse =>
  evaluation.success
    ? { eligible: true, courseId, resultingCredits: evaluation.data.resultingCredits }
    : { eligible: false, courseId, rule: evaluation.error.rule, message: evaluation.error.message };

export const mapErrorToResponse = (error: EnrollmentError): ErrorResponse => {
  switch (error.type) {
    case 'ValidationError':
      return {
        type: error.type,
        message: error.message,
        code: error.code,
        timestamp: error.timestamp.toISOString(),
        field: error.field
      };
    case 'NotFoundError':
      return {
        type: error.type,
        message: error.message,
        code: error.code,
        timestamp: error.timestamp.toISOString(),
        entity: error.entity,
        details: { id: error.id }
      };
    case 'ConcurrencyError':
      return {
        type: error.type,
        message: error.message,
        code: error.code,
        timestamp: error.timestamp.toISOString(),
        expectedVersion: error.expectedVersion,
        actualVersion: error.actualVersion,
        details: { entityId: error.entityId }
      };
    case 'Ineligible': {
      const { type, rule, message, ...details } = error;
      return {
        type,
        message,
        code: rule,
        timestamp: new Date().toISOString(),
        rule,
        details
      };
    }
  }
};

// === 入力の変換 ===

/**
 * コマンドを検証し、ブランド型の識別子へ変換する
 */
export const parseEnrollmentCommand = (
  command: unknown
): Result<{ studentId: StudentId; courseId: CourseId }, ValidationError> => {
  const parsed = EnrollmentCommandSchema
    .extend({ studentId: StudentIdSchema, courseId: CourseIdSchema })
    .safeParse(command);
  if (!parsed.success) {
    return Err(fromZodError('command', parsed.error, 'INVALID_COMMAND_FORMAT', command));
  }
  return Ok(parsed.data);
};

export const parseStudentId = (studentId: string): Result<StudentId, ValidationError> => {
  const parsed = StudentIdSchema.safeParse(studentId);
  if (!parsed.success) {
    return Err(fromZodError('student ID', parsed.error, 'INVALID_STUDENT_ID', studentId));
  }
  return Ok(parsed.data);
};
