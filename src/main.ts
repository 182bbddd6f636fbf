import { CourseIdSchema } from './shared/types/index';
import { loadConfig } from './shared/config/index';
import { createLogger } from './shared/logging/logger';
import { EnrollmentApplicationService } from './contexts/enrollment/application/enrollment-service';
import { InMemoryStudentRepository } from './contexts/enrollment/infrastructure/repositories/student-repository';
import { loadCourseCatalogFile } from './contexts/enrollment/infrastructure/catalog/course-catalog';
import { formatEnrollmentOutcome, formatApprovedCourse } from './contexts/enrollment/presentation/enrollment-report';

/**
 * サンプルシナリオの実行
 *
 * 1. INF101 を履修（成功）
 * 2. INF201 を履修（前提科目 INF101 が未認定のため失敗）
 * 3. MAT101 を履修（INF101 と月曜の時間帯が重なるため失敗）
 * 4. INF101 を単位認定
 * 5. INF201 を再度履修（成功）
 */

type Step =
  | { action: 'enroll'; courseId: string }
  | { action: 'approve'; courseId: string };

const STUDENT = { studentId: 'S001', name: 'Alex Doe' };

const SCENARIO: Step[] = [
  { action: 'enroll', courseId: 'INF101' },
  { action: 'enroll', courseId: 'INF201' },
  { action: 'enroll', courseId: 'MAT101' },
  { action: 'approve', courseId: 'INF101' },
  { action: 'enroll', courseId: 'INF201' }
];

async function main(): Promise<number> {
  const config = loadConfig();
  if (!config.success) {
    console.error('Invalid configuration:', config.error.issues);
    return 1;
  }

  const logger = createLogger('demo');
  const catalogPath = process.argv[2] ?? new URL('../data/sample-catalog.json', import.meta.url);

  const catalogResult = await loadCourseCatalogFile(catalogPath);
  if (!catalogResult.success) {
    logger.error(catalogResult.error.message, { code: catalogResult.error.code });
    return 1;
  }
  const catalog = catalogResult.data;
  logger.info('catalog loaded', {
    courses: catalog.size,
    maxCredits: config.data.businessRules.enrollment.maxCreditsPerTerm
  });

  const service = new EnrollmentApplicationService(new InMemoryStudentRepository(), catalog);
  const registered = await service.registerStudent(STUDENT);
  if (!registered.success) {
    logger.error(registered.error.message, { code: registered.error.code });
    return 1;
  }

  for (const step of SCENARIO) {
    const courseId = CourseIdSchema.safeParse(step.courseId);
    const course = courseId.success ? await catalog.findByCode(courseId.data) : undefined;
    if (!course || !course.success || !course.data) {
      logger.error(`unknown course ${step.courseId}`);
      return 1;
    }

    const command = { studentId: STUDENT.studentId, courseId: step.courseId };
    if (step.action === 'enroll') {
      const outcome = await service.enroll(command);
      console.log(formatEnrollmentOutcome(STUDENT.name, course.data, outcome));
    } else {
      const approved = await service.recordApprovedCourse(command);
      if (!approved.success) {
        logger.error(approved.error.message, { code: approved.error.code });
        return 1;
      }
      console.log(formatApprovedCourse(STUDENT.name, course.data));
    }
  }

  return 0;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
