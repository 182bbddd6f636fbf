import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import {
  type Result,
  type CourseId,
  Ok,
  Err,
  all,
  flatMap,
  fromAsync,
  parseWith,
  resultPipe
} from '../../../../shared/types/index';
import {
  type EnrollmentError,
  type ValidationError,
  createValidationError,
  fromZodError,
  validationFailure
} from '../../domain/errors/errors';
import { type Course, CourseSchema } from '../../domain/entities/course';
import type { ICourseCatalog } from '../../application/ports/ports';

/**
 * 科目カタログ
 *
 * 外部データ（JSONなど）から科目を読み込み、検証済みの Course として保持する。
 *
 * 入力形式:
 * { "courses": [{ "code", "name", "credits", "term", "prerequisites"?, "schedules"? }] }
 */

const CatalogEnvelopeSchema = z.object({
  courses: z.array(z.unknown())
});

export class InMemoryCourseCatalog implements ICourseCatalog {
  private readonly courses: ReadonlyMap<CourseId, Course>;

  constructor(courses: readonly Course[]) {
    this.courses = new Map(courses.map(course => [course.code, course]));
  }

  async findByCode(courseId: CourseId): Promise<Result<Course | null, EnrollmentError>> {
    return Ok(this.courses.get(courseId) ?? null);
  }

  async list(): Promise<Result<readonly Course[], EnrollmentError>> {
    return Ok([...this.courses.values()]);
  }

  get size(): number {
    return this.courses.size;
  }
}

const parseCourseEntry = (raw: unknown, index: number): Result<Course, ValidationError> =>
  parseWith(
    CourseSchema,
    raw,
    zodError => {
      const error = fromZodError('course', zodError, 'INVALID_COURSE', raw);
      const field = error.field ? `courses.${index}.${error.field}` : `courses.${index}`;
      return { ...error, field, message: `${field}: ${zodError.issues[0]?.message ?? error.message}` };
    }
  );

const ensureUniqueCodes = (courses: Course[]): Result<Course[], ValidationError> => {
  const seen = new Set<CourseId>();
  for (const course of courses) {
    if (seen.has(course.code)) {
      return validationFailure(`Duplicate course code ${course.code}`, 'DUPLICATE_COURSE', 'code', course.code);
    }
    seen.add(course.code);
  }
  return Ok(courses);
};

const ensurePrerequisitesExist = (courses: Course[]): Result<Course[], ValidationError> => {
  const codes = new Set(courses.map(course => course.code));
  for (const course of courses) {
    const missing = course.prerequisites.find(prerequisite => !codes.has(prerequisite));
    if (missing !== undefined) {
      return validationFailure(
        `Course ${course.code} references unknown prerequisite ${missing}`,
        'UNKNOWN_PREREQUISITE',
        'prerequisites',
        missing
      );
    }
  }
  return Ok(courses);
};

/**
 * 未検証のデータから科目カタログを作成する
 */
export function parseCourseCatalog(data: unknown): Result<InMemoryCourseCatalog, ValidationError> {
  return resultPipe(
    parseWith(
      CatalogEnvelopeSchema,
      data,
      zodError => fromZodError('catalog', zodError, 'INVALID_CATALOG', data)
    )
  )
    .flatMap(envelope => all(envelope.courses.map(parseCourseEntry)))
    .flatMap(ensureUniqueCodes)
    .flatMap(ensurePrerequisitesExist)
    .map(courses => new InMemoryCourseCatalog(courses))
    .value();
}

/**
 * JSONファイルから科目カタログを読み込む
 */
export async function loadCourseCatalogFile(
  path: string | URL
): Promise<Result<InMemoryCourseCatalog, ValidationError>> {
  const content = await fromAsync(() => readFile(path, 'utf8'));
  if (!content.success) {
    return Err(createValidationError(
      `Failed to read catalog: ${content.error.message}`,
      'CATALOG_READ_FAILED',
      undefined,
      String(path)
    ));
  }

  const json = parseJson(content.data);
  return flatMap(json, parseCourseCatalog);
}

function parseJson(text: string): Result<unknown, ValidationError> {
  try {
    const value: unknown = JSON.parse(text);
    return Ok(value);
  } catch (error) {
    return Err(createValidationError(
      `Catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'CATALOG_PARSE_FAILED'
    ));
  }
}
