import {
  MonthDeltaDate,
  MonthDeltaWeek,
  RepDelta,
  Weekday,
  WeekDelta,
} from '../interfaces/recurrence.interface';
import { daysInMonth } from './calendar';
import { Duration } from './duration';
import { SimpleDate } from './simple-date';

/**
 * Apply one recurrence step to `date`.
 *
 * @throws RangeError when the delta cannot advance a date (interval below 1,
 * no weekdays or no days of the month)
 */
export function advance(date: SimpleDate, delta: RepDelta): SimpleDate {
  switch (delta.type) {
    case 'Day':
      assertInterval(delta.value.nth);
      return date.add(Duration.days(delta.value.nth));
    case 'Week':
      return advanceWeek(date, delta.value);
    case 'Month':
      return delta.value.type === 'OnDate'
        ? advanceMonthOnDate(date, delta.value.value)
        : advanceMonthOnWeek(date, delta.value.value);
    case 'Year':
      assertInterval(delta.value.nth);
      return date.add(Duration.years(delta.value.nth));
  }
}

function assertInterval(nth: number): void {
  if (!Number.isSafeInteger(nth) || nth < 1) {
    throw new RangeError(`repeat interval must be at least 1, got ${nth}`);
  }
}

function advanceWeek(date: SimpleDate, delta: WeekDelta): SimpleDate {
  assertInterval(delta.nth);
  if (delta.on.length === 0) {
    throw new RangeError('weekly schedule needs at least one weekday');
  }

  const target = delta.on[delta.on.length - 1];
  let end = date;
  while (end.weekday !== target) {
    end = end.add(Duration.days(1));
  }

  return end.add(Duration.weeks(delta.nth));
}

function advanceMonthOnDate(
  date: SimpleDate,
  delta: MonthDeltaDate,
): SimpleDate {
  assertInterval(delta.nth);
  if (delta.days.length === 0) {
    throw new RangeError(
      'monthly schedule needs at least one day of the month',
    );
  }

  const minDay = Math.min(...delta.days);
  const maxDay = Math.max(...delta.days);
  const onDay = (months: number): SimpleDate => {
    const shifted = date.add(Duration.months(months));
    return shifted.withDay(
      Math.min(maxDay, daysInMonth(shifted.year, shifted.month)),
    );
  };

  const end = onDay(date.day >= minDay ? delta.nth : delta.nth - 1);

  // the target day clamped back onto the start: move a whole interval instead
  return end.isAfter(date) ? end : onDay(delta.nth);
}

function advanceMonthOnWeek(
  date: SimpleDate,
  delta: MonthDeltaWeek,
): SimpleDate {
  assertInterval(delta.nth);
  const weeksAfterFirst = Math.max(delta.weekid - 1, 0);

  const anchor = firstWeekdayOfMonth(date, delta.day).add(
    Duration.weeks(weeksAfterFirst),
  );
  const shifted = date.add(
    Duration.months(date.day >= anchor.day ? delta.nth : delta.nth - 1),
  );

  return firstWeekdayOfMonth(shifted, delta.day).add(
    Duration.weeks(weeksAfterFirst),
  );
}

function firstWeekdayOfMonth(date: SimpleDate, weekday: Weekday): SimpleDate {
  let current = date.withDay(1);
  while (current.weekday !== weekday) {
    current = current.add(Duration.days(1));
  }
  return current;
}
