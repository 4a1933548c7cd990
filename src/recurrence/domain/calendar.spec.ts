import { daysInMonth, weekdayOfDate } from './calendar';
import { Weekday } from '../interfaces/recurrence.interface';
import { WEEKDAYS } from '../constants/recurrence.constants';
import { SimpleDate } from './simple-date';
import { Duration } from './duration';

describe('calendar', () => {
  describe('daysInMonth', () => {
    it('should follow the leap year rules for February', () => {
      expect(daysInMonth(1999, 2)).toBe(28);
      expect(daysInMonth(2000, 2)).toBe(29);
      expect(daysInMonth(2004, 2)).toBe(29);
      expect(daysInMonth(2100, 2)).toBe(28);
    });

    it('should match the leap year rule over four centuries', () => {
      for (let year = 1700; year < 2100; year++) {
        const isLeap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
        expect(daysInMonth(year, 2)).toBe(isLeap ? 29 : 28);
      }
    });

    it('should use the fixed table for the other months', () => {
      const lengths = [31, 0, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
      lengths.forEach((length, index) => {
        if (index !== 1) {
          expect(daysInMonth(2100, index + 1)).toBe(length);
          expect(daysInMonth(2000, index + 1)).toBe(length);
        }
      });
    });

    it('should throw a RangeError for months outside 1..12', () => {
      expect(() => daysInMonth(2020, 0)).toThrow(RangeError);
      expect(() => daysInMonth(2020, 13)).toThrow(RangeError);
    });
  });

  describe('weekdayOfDate', () => {
    it('should return the weekday of known dates', () => {
      expect(weekdayOfDate({ year: 1700, month: 1, day: 1 })).toBe(
        Weekday.Friday,
      );
      expect(weekdayOfDate({ year: 1789, month: 7, day: 14 })).toBe(
        Weekday.Tuesday,
      );
      expect(weekdayOfDate({ year: 1900, month: 1, day: 1 })).toBe(
        Weekday.Monday,
      );
      expect(weekdayOfDate({ year: 1945, month: 4, day: 30 })).toBe(
        Weekday.Monday,
      );
      expect(weekdayOfDate({ year: 1969, month: 7, day: 20 })).toBe(
        Weekday.Sunday,
      );
      expect(weekdayOfDate({ year: 2000, month: 2, day: 29 })).toBe(
        Weekday.Tuesday,
      );
      expect(weekdayOfDate({ year: 2013, month: 6, day: 15 })).toBe(
        Weekday.Saturday,
      );
      expect(weekdayOfDate({ year: 2020, month: 12, day: 31 })).toBe(
        Weekday.Thursday,
      );
    });

    it('should advance by one weekday per calendar day', () => {
      let date = SimpleDate.fromYmd(1999, 12, 1);
      let index = WEEKDAYS.indexOf(weekdayOfDate(date));

      for (let i = 0; i < 800; i++) {
        date = date.add(Duration.days(1));
        index = (index + 1) % 7;
        expect(weekdayOfDate(date)).toBe(WEEKDAYS[index]);
      }
    });

    it('should reject years before 1700', () => {
      expect(() => weekdayOfDate({ year: 1699, month: 12, day: 31 })).toThrow(
        RangeError,
      );
    });
  });
});
