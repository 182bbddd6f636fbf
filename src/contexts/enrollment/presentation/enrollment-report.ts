import { type Result, match } from '../../../shared/types/index';
import { type Course, formatCourse } from '../domain/entities/course';

/**
 * 履修結果の表示
 *
 * ドメイン層は出力を持たないため、判定結果・ユースケース結果の文字列化はここで行う。
 */

export const formatEnrollmentOutcome = (
  studentName: string,
  course: Course,
  outcome: Result<unknown, { message: string }>
): string =>
  match(outcome, {
    success: () => `✅ ${studentName} enrolled in: ${formatCourse(course)}`,
    error: error => `❌ Could not enroll in ${formatCourse(course)}: ${error.message}`
  });

export const formatApprovedCourse = (studentName: string, course: Course): string =>
  `🎓 ${studentName} passed: ${formatCourse(course)}`;
