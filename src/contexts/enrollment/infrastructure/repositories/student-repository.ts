import { type Result, type StudentId, Ok, Err } from '../../../../shared/types/index';
import { type EnrollmentError, createConcurrencyError } from '../../domain/errors/errors';
import type { Student } from '../../domain/entities/student';
import type { IStudentRepository } from '../../application/ports/ports';

/**
 * インメモリ学生リポジトリ
 *
 * 開発・テスト用。version による楽観的ロックを再現する。
 * 同じインターフェースで永続化ストアの実装に置き換えられる。
 */
export class InMemoryStudentRepository implements IStudentRepository {
  private students = new Map<StudentId, Student>();

  async findById(studentId: StudentId): Promise<Result<Student | null, EnrollmentError>> {
    return Ok(this.students.get(studentId) ?? null);
  }

  async save(student: Student, expectedVersion: number): Promise<Result<void, EnrollmentError>> {
    const actualVersion = this.students.get(student.studentId)?.version ?? 0;
    if (actualVersion !== expectedVersion) {
      return Err(createConcurrencyError(expectedVersion, actualVersion, student.studentId));
    }

    this.students.set(student.studentId, student);
    return Ok(undefined);
  }

  // === テスト用ヘルパーメソッド ===

  /**
   * 全データのクリア
   */
  clear(): void {
    this.students.clear();
  }

  /**
   * 格納されている学生数
   */
  count(): number {
    return this.students.size;
  }
}
