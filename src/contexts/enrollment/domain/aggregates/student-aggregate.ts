import { type Result, type CourseId, Ok, map } from '../../../../shared/types/index';
import {
  type IneligibilityReason,
  type NotFoundError,
  notFoundFailure
} from '../errors/errors';
import type { Course } from '../entities/course';
import { type Student, type Enrollment, isEnrolledIn, hasApproved } from '../entities/student';
import {
  type EvaluationOptions,
  DEFAULT_EVALUATION_OPTIONS,
  evaluate
} from '../services/enrollment-validator';

/**
 * 学生集約の操作
 *
 * 判定（evaluate）と状態変更を分離する。
 * 各操作は新しい Student を返し、状態が変わった場合のみ version を上げる。
 * version はリポジトリでの楽観的ロックに使う。
 */

export interface EnrollmentOutcome {
  readonly student: Student;
  readonly enrollment: Enrollment;
}

/**
 * 判定して履修可能なら履修を追加した学生を返す
 */
export function enroll(
  student: Student,
  course: Course,
  options: EvaluationOptions = DEFAULT_EVALUATION_OPTIONS
): Result<EnrollmentOutcome, IneligibilityReason> {
  return map(evaluate(student, course, options), ({ course: accepted }) => {
    const enrollment: Enrollment = { studentId: student.studentId, course: accepted };
    return {
      student: {
        ...student,
        enrollments: [...student.enrollments, enrollment],
        version: student.version + 1
      },
      enrollment
    };
  });
}

/**
 * 履修の取消
 */
export function withdraw(
  student: Student,
  courseId: CourseId
): Result<Student, NotFoundError> {
  if (!isEnrolledIn(student, courseId)) {
    return notFoundFailure('Enrollment', `${student.studentId}/${courseId}`);
  }
  return Ok({
    ...student,
    enrollments: student.enrollments.filter(enrollment => enrollment.course.code !== courseId),
    version: student.version + 1
  });
}

/**
 * 単位認定（合格済み科目への追加）
 *
 * すでに認定済みなら同じ学生をそのまま返す。履修登録には触れない。
 */
export function recordApprovedCourse(student: Student, courseId: CourseId): Student {
  if (hasApproved(student, courseId)) {
    return student;
  }
  return {
    ...student,
    approvedCourses: [...student.approvedCourses, courseId],
    version: student.version + 1
  };
}
