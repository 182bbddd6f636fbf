import { describe, test, expect } from 'vitest';
import {
  evaluate,
  checkCreditLimit,
  checkPrerequisites,
  createEvaluationOptions,
  DEFAULT_MAX_CREDITS_PER_TERM
} from '../../src/contexts/enrollment/domain/services/enrollment-validator';
import { isIneligible } from '../../src/contexts/enrollment/domain/errors/errors';
import {
  enrollAll,
  inf101,
  inf201,
  limit,
  makeCourse,
  makeStudent,
  mat101,
  unscheduled
} from '../helpers/fixtures';

const LIMIT = limit(DEFAULT_MAX_CREDITS_PER_TERM);

/** 時間割なしの4単位科目を5つ履修済み（合計20単位） */
const studentWith20Credits = () =>
  enrollAll(makeStudent(), ['C1', 'C2', 'C3', 'C4', 'C5'].map(code => unscheduled(code, 4)));

describe('履修可否の判定', () => {
  test('条件を満たせば履修可能で、履修後の合計単位数を返す', () => {
    const result = evaluate(makeStudent(), inf101(), LIMIT);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.course.code).toBe('INF101');
      expect(result.data.resultingCredits).toBe(4);
    }
  });

  test('判定は学生の状態を変更しない', () => {
    const student = enrollAll(makeStudent(), [inf101()]);
    const before = structuredClone(student);

    evaluate(student, mat101(), LIMIT);
    evaluate(student, inf101(), LIMIT);

    expect(student).toEqual(before);
    expect(student.enrollments).toHaveLength(1);
    expect(student.version).toBe(2);
  });

  test('上限を省略すると24単位で判定する', () => {
    const result = evaluate(studentWith20Credits(), unscheduled('X1', 5));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.rule).toBe('CREDIT_LIMIT_EXCEEDED');
    }
  });

  describe('重複履修', () => {
    test('履修中の科目は再度履修できない', () => {
      const student = enrollAll(makeStudent(), [inf101()]);

      const result = evaluate(student, inf101(), LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          type: 'Ineligible',
          rule: 'ALREADY_ENROLLED',
          message: 'Already enrolled in INF101',
          courseId: 'INF101'
        });
      }
    });

    test('重複履修は他のどのルールより先に判定される', () => {
      // 前提科目未認定・単位上限超過・時間割重複のすべてに該当する状態を作る
      const heavy = makeCourse({
        code: 'ADV900',
        name: 'Advanced Seminar',
        credits: 20,
        term: 4,
        prerequisites: ['INF101'],
        schedules: [{ day: 'Monday', start: '08:00', end: '10:00' }]
      });
      const student = enrollAll(makeStudent({ approvedCourses: ['INF101'] }), [heavy]);
      const stripped = { ...student, approvedCourses: [] };

      const result = evaluate(stripped, heavy, limit(24));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(isIneligible(result.error)).toBe(true);
        expect(result.error.rule).toBe('ALREADY_ENROLLED');
      }
    });
  });

  describe('前提科目', () => {
    test('前提科目が未認定なら履修できない', () => {
      const result = evaluate(makeStudent(), inf201(), LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          type: 'Ineligible',
          rule: 'MISSING_PREREQUISITE',
          message: 'Missing prerequisite: INF101',
          courseId: 'INF201',
          prerequisite: 'INF101'
        });
      }
    });

    test('前提科目の履修中は認定済みとみなさない', () => {
      const student = enrollAll(makeStudent(), [inf101()]);

      const result = evaluate(student, inf201(), LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Missing prerequisite: INF101');
      }
    });

    test('未認定の前提科目が複数あれば、リスト順で最初のものを返す', () => {
      const course = unscheduled('INF301', 4, ['MAT101', 'INF101', 'INF201']);
      const student = makeStudent({ approvedCourses: ['INF101'] });

      const result = checkPrerequisites(student, course, LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Missing prerequisite: MAT101');
      }
    });

    test('前提科目がすべて認定済みなら履修可能', () => {
      const student = makeStudent({ approvedCourses: ['INF101'] });

      const result = evaluate(student, inf201(), LIMIT);

      expect(result.success).toBe(true);
    });

    test('前提科目は単位上限より先に判定される', () => {
      const result = evaluate(makeStudent(), unscheduled('BIG100', 30, ['INF101']), LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.rule).toBe('MISSING_PREREQUISITE');
      }
    });
  });

  describe('単位上限', () => {
    test('上限ちょうどまでは履修できる', () => {
      const result = evaluate(studentWith20Credits(), unscheduled('X1', 4), LIMIT);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.resultingCredits).toBe(24);
      }
    });

    test('上限を1単位でも超えると履修できない', () => {
      const result = evaluate(studentWith20Credits(), unscheduled('X1', 5), LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          type: 'Ineligible',
          rule: 'CREDIT_LIMIT_EXCEEDED',
          message: 'Exceeds credit limit: 20+5 of 24 credits',
          courseId: 'X1',
          currentCredits: 20,
          requestedCredits: 5,
          maxCredits: 24
        });
      }
    });

    test('上限は設定値に従う', () => {
      const result = checkCreditLimit(makeStudent(), inf101(), limit(3));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Exceeds credit limit: 0+4 of 3 credits');
      }
    });

    test('上限0なら単位のある科目はすべて履修できない', () => {
      const result = evaluate(makeStudent(), unscheduled('SEM100', 1), limit(0));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Exceeds credit limit: 0+1 of 0 credits');
      }
    });

    test('単位上限は時間割の重複より先に判定される', () => {
      const student = enrollAll(makeStudent(), [inf101()]);

      const result = evaluate(student, mat101(), limit(8));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.rule).toBe('CREDIT_LIMIT_EXCEEDED');
      }
    });
  });

  describe('時間割の重複', () => {
    test('同じ曜日で時間帯が重なれば履修できない', () => {
      const student = enrollAll(makeStudent(), [inf101()]);

      const result = evaluate(student, mat101(), LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          type: 'Ineligible',
          rule: 'SCHEDULE_CONFLICT',
          message: 'Schedule conflict with INF101: Monday 09:30-11:30 overlaps Monday 08:00-10:00',
          courseId: 'MAT101',
          conflictingCourse: 'INF101',
          schedule: { day: 'Monday', start: '09:30', end: '11:30' },
          conflictingSchedule: { day: 'Monday', start: '08:00', end: '10:00' }
        });
      }
    });

    test('終了時刻と開始時刻が接するだけなら履修できる', () => {
      const student = enrollAll(makeStudent(), [inf101()]);
      const next = makeCourse({
        code: 'PHY101',
        name: 'Physics I',
        credits: 4,
        term: 1,
        schedules: [{ day: 'Monday', start: '10:00', end: '12:00' }]
      });

      const result = evaluate(student, next, LIMIT);

      expect(result.success).toBe(true);
    });

    test('時間割のない科目は重複しない', () => {
      const student = enrollAll(makeStudent(), [inf101()]);

      const result = evaluate(student, unscheduled('SEM100', 2), LIMIT);

      expect(result.success).toBe(true);
    });

    test('複数コマのうち一つでも重なれば履修できない', () => {
      const student = enrollAll(makeStudent(), [inf101()]);
      const course = makeCourse({
        code: 'LAB200',
        name: 'Laboratory',
        credits: 2,
        term: 1,
        schedules: [
          { day: 'Wednesday', start: '14:00', end: '16:00' },
          { day: 'Monday', start: '07:00', end: '08:30' }
        ]
      });

      const result = evaluate(student, course, LIMIT);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe(
          'Schedule conflict with INF101: Monday 07:00-08:30 overlaps Monday 08:00-10:00'
        );
      }
    });
  });

  test('シナリオ: 前提科目不足・時間割重複・単位認定後の再履修', () => {
    let student = enrollAll(makeStudent(), [inf101()]);

    const second = evaluate(student, inf201(), LIMIT);
    expect(second.success).toBe(false);
    if (!second.success) {
      expect(second.error.message).toBe('Missing prerequisite: INF101');
    }

    const third = evaluate(student, mat101(), LIMIT);
    expect(third.success).toBe(false);
    if (!third.success) {
      expect(third.error.message).toBe(
        'Schedule conflict with INF101: Monday 09:30-11:30 overlaps Monday 08:00-10:00'
      );
    }

    student = { ...student, approvedCourses: [...student.approvedCourses, inf101().code] };
    const retry = evaluate(student, inf201(), LIMIT);
    expect(retry.success).toBe(true);
    if (retry.success) {
      expect(retry.data.resultingCredits).toBe(8);
    }
  });

  describe('createEvaluationOptions', () => {
    test('0以上の整数なら作成できる', () => {
      expect(createEvaluationOptions(0)).toEqual({ success: true, data: { maxCredits: 0 } });
      expect(createEvaluationOptions(24)).toEqual({ success: true, data: { maxCredits: 24 } });
    });

    test('小数の上限はエラー', () => {
      const result = createEvaluationOptions(4.5);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_CREDIT_LIMIT');
        expect(result.error.field).toBe('maxCredits');
        expect(result.error.message).toBe('Invalid evaluation options: maxCredits: Expected integer, received float');
      }
    });

    test('NaN の上限はエラー', () => {
      const result = createEvaluationOptions(Number.NaN);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_CREDIT_LIMIT');
        expect(result.error.value).toBeNaN();
      }
    });

    test('負の上限はエラー', () => {
      expect(createEvaluationOptions(-1).success).toBe(false);
    });
  });
});
