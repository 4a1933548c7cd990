import type { SimpleDate } from '../domain/simple-date';

/**
 * A calendar day without any time component
 */
export interface YearMonthDay {
  year: number;
  month: number;
  day: number;
}

export enum Weekday {
  Monday = 'Monday',
  Tuesday = 'Tuesday',
  Wednesday = 'Wednesday',
  Thursday = 'Thursday',
  Friday = 'Friday',
  Saturday = 'Saturday',
  Sunday = 'Sunday',
}

/**
 * Repeat every `nth` days
 */
export interface DayDelta {
  nth: number;
}

/**
 * Repeat every `nth` weeks on the given weekdays (Monday first)
 */
export interface WeekDelta {
  nth: number;
  on: Weekday[];
}

/**
 * Repeat every `nth` months on the given days of the month
 */
export interface MonthDeltaDate {
  nth: number;
  days: number[];
}

/**
 * Repeat every `nth` months on an ordinal weekday of the month.
 * `weekid` indexes the ordinal words ("first" is 0), but a step lands
 * `max(weekid - 1, 0)` weeks after the first `day` of the month, so
 * weekids 0 and 1 both land on the first one.
 */
export interface MonthDeltaWeek {
  nth: number;
  weekid: number;
  day: Weekday;
}

export type MonthDelta =
  | { type: 'OnDate'; value: MonthDeltaDate }
  | { type: 'OnWeek'; value: MonthDeltaWeek };

/**
 * Repeat every `nth` years
 */
export interface YearDelta {
  nth: number;
}

/**
 * One recurrence step
 */
export type RepDelta =
  | { type: 'Day'; value: DayDelta }
  | { type: 'Week'; value: WeekDelta }
  | { type: 'Month'; value: MonthDelta }
  | { type: 'Year'; value: YearDelta };

/**
 * When a recurring schedule stops
 */
export type RepEnd =
  | { type: 'Never' }
  | { type: 'Date'; value: SimpleDate }
  | { type: 'Count'; value: number };

export interface Repetition {
  readonly delta: RepDelta;
  readonly end: RepEnd;
}

/**
 * Outcome of resolving a free-text schedule against a start date
 */
export interface ScheduleSummary {
  start: SimpleDate;
  repetition: Repetition | null;
  description: string;
  next: SimpleDate | null;
  last: SimpleDate | null;
}
