import type { Result, StudentId, CourseId } from '../../../../shared/types/index';
import type { EnrollmentError } from '../../domain/errors/errors';
import type { Student } from '../../domain/entities/student';
import type { Course } from '../../domain/entities/course';

/**
 * ポート（アプリケーション層が依存するインターフェース）
 *
 * 実装はインフラ層。テストではインメモリ実装を使う。
 */

export interface IStudentRepository {
  /**
   * 学生の取得
   *
   * @returns 見つからない場合は null
   */
  findById(studentId: StudentId): Promise<Result<Student | null, EnrollmentError>>;

  /**
   * 学生の保存（楽観的ロック）
   *
   * @param expectedVersion 読み込み時点の version。新規登録は 0
   * @returns 保存済みの version が expectedVersion と異なれば ConcurrencyError
   */
  save(student: Student, expectedVersion: number): Promise<Result<void, EnrollmentError>>;
}

export interface ICourseCatalog {
  findByCode(courseId: CourseId): Promise<Result<Course | null, EnrollmentError>>;

  list(): Promise<Result<readonly Course[], EnrollmentError>>;
}
