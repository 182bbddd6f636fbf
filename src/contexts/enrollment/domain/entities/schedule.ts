import { z } from 'zod';
import { type Result, parseWith } from '../../../../shared/types/index';
import { type ValidationError, fromZodError } from '../errors/errors';

/**
 * 時間割（曜日 + 開始・終了時刻）
 *
 * 時刻は同日内の壁時計時刻 "HH:MM"（24時間制）。
 * 時間帯は半開区間 [start, end) として扱うため、
 * 前のコマの終了時刻と次のコマの開始時刻が同じでも重複しない。
 */

export const DAYS_OF_WEEK = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday'
] as const;

export const DayOfWeekSchema = z.enum(DAYS_OF_WEEK);

export const TimeOfDaySchema = z.string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected a HH:MM time')
  .brand<'TimeOfDay'>();

export type DayOfWeek = z.infer<typeof DayOfWeekSchema>;
export type TimeOfDay = z.infer<typeof TimeOfDaySchema>;

/**
 * 0:00 からの経過分
 */
export const toMinutes = (time: TimeOfDay): number =>
  Number(time.slice(0, 2)) * 60 + Number(time.slice(3, 5));

export const ScheduleSchema = z.object({
  day: DayOfWeekSchema,
  start: TimeOfDaySchema,
  end: TimeOfDaySchema
}).refine(
  schedule => toMinutes(schedule.end) > toMinutes(schedule.start),
  { message: 'end must be later than start', path: ['end'] }
);

export type ScheduleInput = z.input<typeof ScheduleSchema>;

export interface Schedule {
  readonly day: DayOfWeek;
  readonly start: TimeOfDay;
  readonly end: TimeOfDay;
}

export function createSchedule(input: ScheduleInput): Result<Schedule, ValidationError> {
  return parseWith(
    ScheduleSchema,
    input,
    zodError => fromZodError('schedule', zodError, 'INVALID_SCHEDULE', input)
  );
}

/**
 * 同じ曜日かつ時間帯が交差する場合に重複とみなす
 */
export function schedulesOverlap(a: Schedule, b: Schedule): boolean {
  if (a.day !== b.day) {
    return false;
  }
  return !(
    toMinutes(a.end) <= toMinutes(b.start) ||
    toMinutes(a.start) >= toMinutes(b.end)
  );
}

export function formatSchedule(schedule: Schedule): string {
  return `${schedule.day} ${schedule.start}-${schedule.end}`;
}
