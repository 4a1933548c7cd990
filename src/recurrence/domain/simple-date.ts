import { getDate, getMonth, getYear } from 'date-fns';
import { Weekday, YearMonthDay } from '../interfaces/recurrence.interface';
import { daysInMonth, weekdayOfDate } from './calendar';
import { Duration } from './duration';

/**
 * A single day of the proleptic Gregorian calendar.
 *
 * Values are immutable and always hold a valid day for their month.
 * Adding and then subtracting the same month or year duration does not
 * always give back the original date: 2020-01-31 plus one month is
 * 2020-02-29, and 2020-02-29 minus one month is 2020-01-29.
 */
export class SimpleDate implements YearMonthDay {
  private constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {}

  /**
   * @throws RangeError when the values do not name a calendar day
   */
  static fromYmd(year: number, month: number, day: number): SimpleDate {
    if (!Number.isSafeInteger(year) || year < 0) {
      throw new RangeError(`invalid year ${year}`);
    }

    const length = daysInMonth(year, month);
    if (!Number.isInteger(day) || day < 1 || day > length) {
      throw new RangeError(
        `day must be between 1 and ${length} for ${year}-${month}, got ${day}`,
      );
    }

    return new SimpleDate(year, month, day);
  }

  static today(now: Date = new Date()): SimpleDate {
    return SimpleDate.fromYmd(getYear(now), getMonth(now) + 1, getDate(now));
  }

  get weekday(): Weekday {
    return weekdayOfDate(this);
  }

  /**
   * Same year and month on another day
   */
  withDay(day: number): SimpleDate {
    return SimpleDate.fromYmd(this.year, this.month, day);
  }

  add(duration: Duration): SimpleDate {
    let { year, month, day } = this;

    switch (duration.unit) {
      case 'day':
        day += duration.amount;
        break;
      case 'week':
        day += duration.amount * 7;
        break;
      case 'month':
        month += duration.amount;
        break;
      case 'year':
        year += duration.amount;
        break;
    }

    for (;;) {
      let extraYears = Math.floor(month / 12);
      let relativeMonth = month % 12;

      if (relativeMonth === 0) {
        extraYears -= 1;
        relativeMonth = 12;
      }

      year += extraYears;
      month = relativeMonth;

      // the starting month may keep a day it does not have; clamped below
      if (day === this.day || day <= daysInMonth(year, month)) {
        break;
      }

      day -= daysInMonth(year, month);
      month += 1;
    }

    return SimpleDate.fromYmd(
      year,
      month,
      Math.min(day, daysInMonth(year, month)),
    );
  }

  sub(duration: Duration): SimpleDate {
    let { year, month, day } = this;
    let daysToSub = 0;
    let monthsToSub = 0;

    switch (duration.unit) {
      case 'day':
        daysToSub = duration.amount;
        break;
      case 'week':
        daysToSub = duration.amount * 7;
        break;
      case 'month':
        monthsToSub = duration.amount;
        break;
      case 'year':
        year -= duration.amount;
        break;
    }

    for (let i = 0; i < daysToSub; i++) {
      day -= 1;
      if (day === 0) {
        month -= 1;
        if (month === 0) {
          year -= 1;
          month = 12;
        }
        day = daysInMonth(year, month);
      }
    }

    for (let i = 0; i < monthsToSub; i++) {
      month -= 1;
      if (month === 0) {
        year -= 1;
        month = 12;
      }
    }

    return SimpleDate.fromYmd(
      year,
      month,
      Math.min(day, daysInMonth(year, month)),
    );
  }

  /**
   * Negative when this date comes first, positive when it comes last
   */
  compare(other: YearMonthDay): number {
    if (this.year !== other.year) {
      return this.year - other.year;
    } else if (this.month !== other.month) {
      return this.month - other.month;
    }
    return this.day - other.day;
  }

  isBefore(other: YearMonthDay): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: YearMonthDay): boolean {
    return this.compare(other) > 0;
  }

  equals(other: YearMonthDay): boolean {
    return this.compare(other) === 0;
  }

  toString(): string {
    const year = String(this.year).padStart(4, '0');
    const month = String(this.month).padStart(2, '0');
    const day = String(this.day).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  toJSON(): YearMonthDay {
    return { year: this.year, month: this.month, day: this.day };
  }
}
