import { Weekday } from '../interfaces/recurrence.interface';

/**
 * Default number of occurrences to list when no count is requested
 */
export const DEFAULT_OCCURRENCE_COUNT = 50;

/**
 * Maximum number of occurrences to list
 */
export const MAX_OCCURRENCE_COUNT = 200;

/**
 * Largest repeat count accepted in an ending phrase, and the default number
 * of steps taken when resolving the last occurrence of a schedule
 */
export const MAX_REPEAT_COUNT = 100000;

/**
 * Days of the week, Monday first. Index order matches the weekday congruence.
 */
export const WEEKDAYS: readonly Weekday[] = [
  Weekday.Monday,
  Weekday.Tuesday,
  Weekday.Wednesday,
  Weekday.Thursday,
  Weekday.Friday,
  Weekday.Saturday,
  Weekday.Sunday,
];

/**
 * Abbreviations recognised in free-text weekday lists ("on mon, wed")
 */
export const WEEKDAY_ABBREVIATIONS: ReadonlyArray<[string, Weekday]> = [
  ['mon', Weekday.Monday],
  ['tue', Weekday.Tuesday],
  ['wed', Weekday.Wednesday],
  ['thu', Weekday.Thursday],
  ['fri', Weekday.Friday],
  ['sat', Weekday.Saturday],
  ['sun', Weekday.Sunday],
];

/**
 * Ordinal words for a weekday within a month, indexed by weekid
 */
export const WEEK_ORDINALS: ReadonlyArray<[string, string]> = [
  ['first', '1st'],
  ['second', '2nd'],
  ['third', '3rd'],
  ['fourth', '4th'],
  ['fifth', '5th'],
];

/**
 * Weekday congruence anchor: 1700-01-01 was a Friday
 */
export const WEEKDAY_ANCHOR_YEAR = 1700;
export const WEEKDAY_ANCHOR_INDEX = 4;

/**
 * Days elapsed before the first of each month in a common year
 */
export const CUMULATIVE_MONTH_DAYS = [
  0, 31, 59, 90, 120, 151, 181, 212, 243, 273, 304, 334,
];

/**
 * Last occurrence reported for schedules that never end, and the latest
 * date accepted by the parser
 */
export const FAR_FUTURE = { year: 9999, month: 12, day: 31 } as const;

export const ERROR_MESSAGES = {
  SCHEDULE: "couldn't parse schedule",
  ENDING_SCHEDULE: "couldn't parse ending schedule",
  INTERVAL: 'repeat interval must be at least 1',
  INVALID_DATE: 'invalid date',
  INVALID_END_DATE: 'invalid end date',
  INVALID_MONTH: 'invalid month',
  EARLIEST_YEAR: `dates before ${WEEKDAY_ANCHOR_YEAR} are not supported`,
  LATEST_DATE: 'dates after 9999-12-31 are not supported',
  REPEAT_COUNT: `repeat count must be at most ${MAX_REPEAT_COUNT}`,
  TOO_MANY_REPETITIONS: 'schedule repeats too many times to resolve',
};

export const NO_RECURRENCE_TEXT = 'No recurrence';
