import type { Result } from '../../src/shared/types/index';
import { type Course, type CourseInput, createCourse } from '../../src/contexts/enrollment/domain/entities/course';
import { type Student, type StudentInput, createStudent } from '../../src/contexts/enrollment/domain/entities/student';
import { enroll } from '../../src/contexts/enrollment/domain/aggregates/student-aggregate';
import {
  type EvaluationOptions,
  createEvaluationOptions
} from '../../src/contexts/enrollment/domain/services/enrollment-validator';

/**
 * テスト用フィクスチャ
 */

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.success) {
    throw new Error(`Expected success but got ${JSON.stringify(result.error)}`);
  }
  return result.data;
}

export const makeCourse = (input: CourseInput): Course => unwrap(createCourse(input));

export const limit = (maxCredits: number): EvaluationOptions =>
  unwrap(createEvaluationOptions(maxCredits));

export const makeStudent = (input: Partial<StudentInput> = {}): Student =>
  unwrap(createStudent({ studentId: 'S001', name: 'Alex Doe', ...input }));

/**
 * 判定を通して順に履修させる（上限は十分大きくする）
 */
export const enrollAll = (student: Student, courses: readonly Course[]): Student =>
  courses.reduce(
    (current, course) => unwrap(enroll(current, course, limit(1000))).student,
    student
  );

export const inf101 = (): Course => makeCourse({
  code: 'INF101',
  name: 'Programming I',
  credits: 4,
  term: 1,
  schedules: [{ day: 'Monday', start: '08:00', end: '10:00' }]
});

export const inf201 = (): Course => makeCourse({
  code: 'INF201',
  name: 'Programming II',
  credits: 4,
  term: 2,
  prerequisites: ['INF101'],
  schedules: [{ day: 'Tuesday', start: '10:00', end: '12:00' }]
});

export const mat101 = (): Course => makeCourse({
  code: 'MAT101',
  name: 'Mathematics I',
  credits: 6,
  term: 1,
  schedules: [{ day: 'Monday', start: '09:30', end: '11:30' }]
});

/**
 * 時間割なしの科目（時間割の重複が起きない）
 */
export const unscheduled = (code: string, credits: number, prerequisites: string[] = []): Course =>
  makeCourse({ code, name: `Course ${code}`, credits, term: 1, prerequisites });
