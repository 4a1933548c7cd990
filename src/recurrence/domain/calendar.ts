import {
  CUMULATIVE_MONTH_DAYS,
  WEEKDAYS,
  WEEKDAY_ANCHOR_INDEX,
  WEEKDAY_ANCHOR_YEAR,
} from '../constants/recurrence.constants';
import { Weekday, YearMonthDay } from '../interfaces/recurrence.interface';

/**
 * Number of days in a month of the proleptic Gregorian calendar.
 *
 * @throws RangeError when `month` is not in 1..12
 */
export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 1:
    case 3:
    case 5:
    case 7:
    case 8:
    case 10:
    case 12:
      return 31;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    case 2:
      if (year % 400 === 0) {
        return 29;
      } else if (year % 100 === 0) {
        return 28;
      } else if (year % 4 === 0) {
        return 29;
      }
      return 28;
    default:
      throw new RangeError(`month must be between 1 and 12, got ${month}`);
  }
}

/**
 * Day of the week of a calendar day, counted from 1700-01-01.
 *
 * @throws RangeError for years before 1700
 */
export function weekdayOfDate(date: YearMonthDay): Weekday {
  if (date.year < WEEKDAY_ANCHOR_YEAR) {
    throw new RangeError(
      `weekday is only defined from ${WEEKDAY_ANCHOR_YEAR}, got ${date.year}`,
    );
  }

  const afterFeb = date.month > 2 ? 0 : 1;
  const aux = date.year - WEEKDAY_ANCHOR_YEAR - afterFeb;
  const leapDays =
    Math.floor(aux / 4) - Math.floor(aux / 100) + Math.floor((aux + 100) / 400);
  const index =
    (WEEKDAY_ANCHOR_INDEX +
      (aux + afterFeb) * 365 +
      leapDays +
      CUMULATIVE_MONTH_DAYS[date.month - 1] +
      (date.day - 1)) %
    7;

  return WEEKDAYS[index];
}
