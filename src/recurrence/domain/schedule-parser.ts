import {
  ERROR_MESSAGES,
  FAR_FUTURE,
  MAX_REPEAT_COUNT,
  WEEKDAY_ABBREVIATIONS,
  WEEKDAY_ANCHOR_YEAR,
  WEEK_ORDINALS,
} from '../constants/recurrence.constants';
import {
  DayDelta,
  MonthDelta,
  RepDelta,
  RepEnd,
  Repetition,
  Weekday,
  WeekDelta,
  YearDelta,
} from '../interfaces/recurrence.interface';
import { daysInMonth } from './calendar';
import { DateError } from './date.error';
import { SimpleDate } from './simple-date';

/**
 * One accepted phrase for a repeat interval. Matchers are tried in order
 * and the first match wins.
 */
interface IntervalMatcher {
  pattern: RegExp;
  nth: (match: RegExpMatchArray) => number;
}

function intervalMatchers(
  unit: string,
  aliases: Record<string, number>,
): IntervalMatcher[] {
  const matchers: IntervalMatcher[] = [
    {
      pattern: new RegExp(`^every\\s+(\\d+)\\s+${unit}s?$`),
      nth: (match) => toInterval(match[1]),
    },
    {
      pattern: new RegExp(`^(\\d+)\\s+${unit}s?$`),
      nth: (match) => toInterval(match[1]),
    },
    { pattern: new RegExp(`^every\\s+${unit}$`), nth: () => 1 },
  ];

  for (const [alias, nth] of Object.entries(aliases)) {
    matchers.push({ pattern: new RegExp(`^${alias}$`), nth: () => nth });
  }

  return matchers;
}

const DAY_MATCHERS = intervalMatchers('day', { daily: 1 });
const WEEK_MATCHERS = intervalMatchers('week', { weekly: 1, fortnightly: 2 });
const MONTH_MATCHERS = intervalMatchers('month', { monthly: 1, quarterly: 3 });
const YEAR_MATCHERS = intervalMatchers('year', { annually: 1, yearly: 1 });

const COUNT_KEYWORDS = ['after', 'times', 'occurrences', 'reps'];
const DATE_PATTERN = /(\d+)-(\d+)-(\d+)/;

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

function toInterval(digits: string): number {
  const nth = Number(digits);
  if (!Number.isSafeInteger(nth)) {
    throw new DateError(ERROR_MESSAGES.SCHEDULE);
  }
  if (nth < 1) {
    throw new DateError(ERROR_MESSAGES.INTERVAL);
  }
  return nth;
}

function matchInterval(text: string, matchers: IntervalMatcher[]): number {
  for (const matcher of matchers) {
    const match = text.match(matcher.pattern);
    if (match) {
      return matcher.nth(match);
    }
  }
  throw new DateError(ERROR_MESSAGES.SCHEDULE);
}

/**
 * Split off an optional " on ..." qualifier. The qualifier keeps its
 * leading " on " so that "month" in the head is never read as "mon".
 */
function splitQualifier(text: string): [string, string | undefined] {
  const index = text.indexOf(' on ');
  if (index === -1) {
    return [text, undefined];
  }
  return [text.slice(0, index), text.slice(index)];
}

export function parseDayDelta(text: string): DayDelta {
  return { nth: matchInterval(normalize(text), DAY_MATCHERS) };
}

/**
 * "every 2 weeks on mon, fri", "weekly", "fortnightly". Without an
 * " on " list the schedule repeats on the weekday of `reference`.
 */
export function parseWeekDelta(text: string, reference: SimpleDate): WeekDelta {
  const [head, qualifier] = splitQualifier(normalize(text));
  const on =
    qualifier === undefined ? [reference.weekday] : parseWeekdays(qualifier);

  return { nth: matchInterval(head, WEEK_MATCHERS), on };
}

function parseWeekdays(text: string): Weekday[] {
  const days = WEEKDAY_ABBREVIATIONS.filter(([abbreviation]) =>
    text.includes(abbreviation),
  ).map(([, weekday]) => weekday);

  if (days.length === 0) {
    throw new DateError(ERROR_MESSAGES.SCHEDULE);
  }
  return days;
}

/**
 * "every 3 months", "monthly on the 1st and 15th",
 * "every 2 months on the second tuesday", "quarterly".
 * Without an " on " qualifier the day of `reference` is used.
 */
export function parseMonthDelta(
  text: string,
  reference: SimpleDate,
): MonthDelta {
  const [head, qualifier] = splitQualifier(normalize(text));
  const nth = matchInterval(head, MONTH_MATCHERS);

  if (qualifier === undefined) {
    return { type: 'OnDate', value: { nth, days: [reference.day] } };
  }

  const weekday = WEEKDAY_ABBREVIATIONS.find(([abbreviation]) =>
    qualifier.includes(abbreviation),
  );
  if (weekday) {
    const weekid = WEEK_ORDINALS.findIndex(
      ([word, short]) => qualifier.includes(word) || qualifier.includes(short),
    );
    if (weekid === -1) {
      throw new DateError(ERROR_MESSAGES.SCHEDULE);
    }
    return { type: 'OnWeek', value: { nth, weekid, day: weekday[1] } };
  }

  const days = new Set<number>();
  for (const match of qualifier.matchAll(/\d+/g)) {
    const day = Number(match[0]);
    if (!Number.isInteger(day) || day < 1 || day > 31) {
      throw new DateError(ERROR_MESSAGES.SCHEDULE);
    }
    days.add(day);
  }

  if (days.size === 0) {
    throw new DateError(ERROR_MESSAGES.SCHEDULE);
  }
  return {
    type: 'OnDate',
    value: { nth, days: [...days].sort((a, b) => a - b) },
  };
}

export function parseYearDelta(text: string): YearDelta {
  return { nth: matchInterval(normalize(text), YEAR_MATCHERS) };
}

/**
 * "never" (or nothing), "after 5 times", "10 occurrences", "until 2021-06-30"
 */
export function parseRepEnd(text: string): RepEnd {
  const normalized = normalize(text);

  if (normalized === '' || normalized.includes('never')) {
    return { type: 'Never' };
  }

  if (COUNT_KEYWORDS.some((keyword) => normalized.includes(keyword))) {
    const match = normalized.match(/\d+/);
    const count = match ? Number(match[0]) : NaN;
    if (!Number.isSafeInteger(count)) {
      throw new DateError(ERROR_MESSAGES.ENDING_SCHEDULE);
    }
    if (count > MAX_REPEAT_COUNT) {
      throw new DateError(ERROR_MESSAGES.REPEAT_COUNT);
    }
    return { type: 'Count', value: count };
  }

  const match = normalized.match(DATE_PATTERN);
  if (!match) {
    throw new DateError(ERROR_MESSAGES.INVALID_END_DATE);
  }

  return {
    type: 'Date',
    value: toSimpleDate(match, ERROR_MESSAGES.INVALID_DATE),
  };
}

/**
 * A `YYYY-MM-DD` start date between 1700-01-01 and 9999-12-31; blank input
 * means today.
 */
export function parseSimpleDate(
  text: string,
  today: () => SimpleDate = () => SimpleDate.today(),
): SimpleDate {
  const normalized = text.trim();
  if (normalized === '') {
    return today();
  }

  const match = normalized.match(/^(\d+)-(\d+)-(\d+)$/);
  if (!match) {
    throw new DateError(ERROR_MESSAGES.INVALID_DATE);
  }

  const date = toSimpleDate(match, ERROR_MESSAGES.INVALID_MONTH);
  if (date.year < WEEKDAY_ANCHOR_YEAR) {
    throw new DateError(ERROR_MESSAGES.EARLIEST_YEAR);
  }
  return date;
}

function toSimpleDate(match: RegExpMatchArray, monthError: string): SimpleDate {
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  if (!Number.isSafeInteger(year)) {
    throw new DateError(ERROR_MESSAGES.INVALID_DATE);
  }
  if (year > FAR_FUTURE.year) {
    throw new DateError(ERROR_MESSAGES.LATEST_DATE);
  }
  if (month < 1 || month > 12) {
    throw new DateError(monthError);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new DateError(ERROR_MESSAGES.INVALID_DATE);
  }

  return SimpleDate.fromYmd(year, month, day);
}

function parseRepDelta(schedule: string, start: SimpleDate): RepDelta {
  if (schedule.includes('year') || schedule.includes('annual')) {
    return { type: 'Year', value: parseYearDelta(schedule) };
  } else if (schedule.includes('month') || schedule.includes('quarter')) {
    return { type: 'Month', value: parseMonthDelta(schedule, start) };
  } else if (schedule.includes('week') || schedule.includes('fortnight')) {
    return { type: 'Week', value: parseWeekDelta(schedule, start) };
  }
  return { type: 'Day', value: parseDayDelta(schedule) };
}

/**
 * Build a repetition from a schedule phrase and an ending phrase.
 * A blank schedule means the date does not repeat.
 */
export function parseRepetition(
  schedule: string,
  end: string,
  start: SimpleDate,
): Repetition | null {
  const normalized = normalize(schedule);
  if (normalized === '') {
    return null;
  }

  return {
    delta: parseRepDelta(normalized, start),
    end: parseRepEnd(end),
  };
}
