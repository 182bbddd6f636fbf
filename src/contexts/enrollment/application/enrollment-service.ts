import {
  type Result,
  type StudentId,
  type CourseId,
  Ok,
  Err,
  map,
  retry
} from '../../../shared/types/index';
import { type EnrollmentConfig, getCurrentConfig } from '../../../shared/config/index';
import { type Logger, createLogger } from '../../../shared/logging/logger';
import {
  type EnrollmentError,
  type ValidationError,
  createNotFoundError,
  createValidationError,
  isConcurrencyError
} from '../domain/errors/errors';
import type { Course } from '../domain/entities/course';
import { type Student, createStudent } from '../domain/entities/student';
import {
  type EvaluationOptions,
  createEvaluationOptions,
  evaluate
} from '../domain/services/enrollment-validator';
import { enroll, withdraw, recordApprovedCourse } from '../domain/aggregates/student-aggregate';
import type { IStudentRepository, ICourseCatalog } from './ports/ports';
import {
  type RegisterStudentCommand,
  type EnrollmentCommand,
  type StudentResponse,
  type EvaluationResponse,
  type EnrollmentResponse,
  type ErrorResponse,
  RegisterStudentCommandSchema,
  mapStudentToResponse,
  mapEvaluationToResponse,
  mapErrorToResponse,
  parseEnrollmentCommand,
  parseStudentId
} from './dto';

/**
 * 履修アプリケーションサービス
 *
 * ユースケースの調整役。判定ロジックはドメイン層に委譲する。
 *
 * 同じ学生への同時リクエストで、どちらも更新前の状態に対して判定を通過して
 * 単位上限や時間割の不変条件が破れることを防ぐため、
 * 「読み込み → 判定 → 保存」を version による楽観的ロックで保護し、
 * 競合した場合は読み込みからやり直す。
 */

export interface EnrollmentServiceOptions {
  /** 指定しない場合は getCurrentConfig() を使う */
  config?: EnrollmentConfig;
  logger?: Logger;
}

type StudentChange = (student: Student) => Result<Student, EnrollmentError>;

export class EnrollmentApplicationService {
  private readonly logger: Logger;

  constructor(
    private readonly studentRepository: IStudentRepository,
    private readonly courseCatalog: ICourseCatalog,
    private readonly options: EnrollmentServiceOptions = {}
  ) {
    this.logger = options.logger ?? createLogger('enrollment');
  }

  /**
   * 設定を取得する
   */
  private getConfig(): EnrollmentConfig {
    return this.options.config ?? getCurrentConfig();
  }

  private evaluationOptions(): Result<EvaluationOptions, ValidationError> {
    return createEvaluationOptions(this.getConfig().businessRules.enrollment.maxCreditsPerTerm);
  }

  /**
   * 学生登録ユースケース
   *
   * 合格済み科目を指定する場合、各科目はカタログに存在する必要がある。
   */
  async registerStudent(
    command: RegisterStudentCommand
  ): Promise<Result<StudentResponse, ErrorResponse>> {
    const validated = RegisterStudentCommandSchema.safeParse(command);
    if (!validated.success) {
      return Err(mapErrorToResponse(createValidationError(
        'Invalid input format',
        'INVALID_COMMAND_FORMAT',
        validated.error.issues[0]?.path.join('.')
      )));
    }

    const studentResult = createStudent({
      studentId: validated.data.studentId,
      name: validated.data.name,
      approvedCourses: validated.data.approvedCourses ?? []
    });
    if (!studentResult.success) {
      return Err(mapErrorToResponse(studentResult.error));
    }
    const student = studentResult.data;

    // 合格済み科目は単位認定と同じくカタログに存在する必要がある
    for (const courseId of student.approvedCourses) {
      const course = await this.loadCourse(courseId);
      if (!course.success) {
        return Err(mapErrorToResponse(course.error));
      }
    }

    const existing = await this.studentRepository.findById(student.studentId);
    if (!existing.success) {
      return Err(mapErrorToResponse(existing.error));
    }
    if (existing.data) {
      return Err(mapErrorToResponse(createValidationError(
        `Student ${student.studentId} is already registered`,
        'DUPLICATE_STUDENT',
        'studentId',
        student.studentId
      )));
    }

    const saved = await this.studentRepository.save(student, 0);
    if (!saved.success) {
      return Err(mapErrorToResponse(saved.error));
    }

    this.logger.audit('student.registered', { studentId: student.studentId });
    return Ok(mapStudentToResponse(student));
  }

  /**
   * 学生取得ユースケース
   */
  async getStudent(studentId: string): Promise<Result<StudentResponse, ErrorResponse>> {
    const idResult = parseStudentId(studentId);
    if (!idResult.success) {
      return Err(mapErrorToResponse(idResult.error));
    }

    const studentResult = await this.loadStudent(idResult.data);
    if (!studentResult.success) {
      return Err(mapErrorToResponse(studentResult.error));
    }
    return Ok(mapStudentToResponse(studentResult.data));
  }

  /**
   * 履修判定ユースケース（状態は変更しない）
   */
  async evaluateEnrollment(
    command: EnrollmentCommand
  ): Promise<Result<EvaluationResponse, ErrorResponse>> {
    const loaded = await this.loadStudentAndCourse(command);
    if (!loaded.success) {
      return Err(mapErrorToResponse(loaded.error));
    }

    const options = this.evaluationOptions();
    if (!options.success) {
      return Err(mapErrorToResponse(options.error));
    }

    const { student, course } = loaded.data;
    const evaluation = evaluate(student, course, options.data);
    this.logger.debug('evaluated enrollment', {
      studentId: student.studentId,
      courseId: course.code,
      eligible: evaluation.success
    });
    return Ok(mapEvaluationToResponse(course.code, evaluation));
  }

  /**
   * 履修登録ユースケース
   *
   * フロー:
   * 1. 入力検証
   * 2. 科目の取得
   * 3. 学生の読み込み → 判定 → 保存（競合時はリトライ）
   * 4. レスポンス変換
   */
  async enroll(command: EnrollmentCommand): Promise<Result<EnrollmentResponse, ErrorResponse>> {
    const ids = parseEnrollmentCommand(command);
    if (!ids.success) {
      return Err(mapErrorToResponse(ids.error));
    }

    const courseResult = await this.loadCourse(ids.data.courseId);
    if (!courseResult.success) {
      return Err(mapErrorToResponse(courseResult.error));
    }
    const course = courseResult.data;

    const options = this.evaluationOptions();
    if (!options.success) {
      return Err(mapErrorToResponse(options.error));
    }

    const result = await this.updateStudent(ids.data.studentId, student =>
      map(enroll(student, course, options.data), outcome => outcome.student)
    );

    if (!result.success) {
      this.logger.info('enrollment rejected', {
        studentId: ids.data.studentId,
        courseId: course.code,
        reason: result.error.message
      });
      return Err(mapErrorToResponse(result.error));
    }

    const student = result.data;
    const response = mapStudentToResponse(student);
    this.logger.audit('enrollment.created', {
      studentId: student.studentId,
      courseId: course.code,
      totalCredits: response.totalCredits
    });
    return Ok({
      courseId: course.code,
      resultingCredits: response.totalCredits,
      student: response
    });
  }

  /**
   * 履修取消ユースケース
   */
  async withdraw(command: EnrollmentCommand): Promise<Result<StudentResponse, ErrorResponse>> {
    const ids = parseEnrollmentCommand(command);
    if (!ids.success) {
      return Err(mapErrorToResponse(ids.error));
    }
    const { studentId, courseId } = ids.data;

    const result = await this.updateStudent(studentId, student => withdraw(student, courseId));
    if (!result.success) {
      return Err(mapErrorToResponse(result.error));
    }

    this.logger.audit('enrollment.withdrawn', { studentId, courseId });
    return Ok(mapStudentToResponse(result.data));
  }

  /**
   * 単位認定ユースケース
   *
   * 科目はカタログに存在する必要がある。履修登録はそのまま残る。
   */
  async recordApprovedCourse(
    command: EnrollmentCommand
  ): Promise<Result<StudentResponse, ErrorResponse>> {
    const ids = parseEnrollmentCommand(command);
    if (!ids.success) {
      return Err(mapErrorToResponse(ids.error));
    }
    const { studentId, courseId } = ids.data;

    const courseResult = await this.loadCourse(courseId);
    if (!courseResult.success) {
      return Err(mapErrorToResponse(courseResult.error));
    }

    const result = await this.updateStudent(studentId, student =>
      Ok(recordApprovedCourse(student, courseId))
    );
    if (!result.success) {
      return Err(mapErrorToResponse(result.error));
    }

    this.logger.audit('course.approved', { studentId, courseId });
    return Ok(mapStudentToResponse(result.data));
  }

  // === プライベートヘルパーメソッド ===

  private async loadStudent(studentId: StudentId): Promise<Result<Student, EnrollmentError>> {
    const found = await this.studentRepository.findById(studentId);
    if (!found.success) {
      return found;
    }
    return found.data ? Ok(found.data) : Err(createNotFoundError('Student', studentId));
  }

  private async loadCourse(courseId: CourseId): Promise<Result<Course, EnrollmentError>> {
    const found = await this.courseCatalog.findByCode(courseId);
    if (!found.success) {
      return found;
    }
    return found.data ? Ok(found.data) : Err(createNotFoundError('Course', courseId));
  }

  private async loadStudentAndCourse(
    command: EnrollmentCommand
  ): Promise<Result<{ student: Student; course: Course }, EnrollmentError>> {
    const ids = parseEnrollmentCommand(command);
    if (!ids.success) {
      return ids;
    }

    const course = await this.loadCourse(ids.data.courseId);
    if (!course.success) {
      return course;
    }

    const student = await this.loadStudent(ids.data.studentId);
    if (!student.success) {
      return student;
    }

    return Ok({ student: student.data, course: course.data });
  }

  /**
   * 読み込み → 変更 → 保存 を楽観的ロック付きで実行する
   *
   * 保存時に ConcurrencyError となった場合のみ、設定された回数まで最初からやり直す。
   * 変更で version が変わらなければ保存しない。
   */
  private async updateStudent(
    studentId: StudentId,
    change: StudentChange
  ): Promise<Result<Student, EnrollmentError>> {
    const { maxAttempts, baseDelayMs, exponentialBackoff } = this.getConfig().processing.retry;

    return retry(
      async (attempt): Promise<Result<Student, EnrollmentError>> => {
        const loaded = await this.loadStudent(studentId);
        if (!loaded.success) {
          return loaded;
        }

        const changed = change(loaded.data);
        if (!changed.success || changed.data.version === loaded.data.version) {
          return changed;
        }

        const saved = await this.studentRepository.save(changed.data, loaded.data.version);
        if (!saved.success) {
          if (isConcurrencyError(saved.error)) {
            this.logger.warn('concurrent update detected', {
              studentId,
              attempt,
              expectedVersion: saved.error.expectedVersion,
              actualVersion: saved.error.actualVersion
            });
          }
          return saved;
        }
        return changed;
      },
      {
        maxAttempts,
        delay: attempt => (exponentialBackoff ? baseDelayMs * 2 ** (attempt - 1) : baseDelayMs),
        shouldRetry: isConcurrencyError
      }
    );
  }
}
