import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RecurrenceService } from './recurrence.service';
import { DateError } from './domain/date.error';
import { SimpleDate } from './domain/simple-date';
import { Weekday } from './interfaces/recurrence.interface';

describe('RecurrenceService', () => {
  let service: RecurrenceService;
  let maxOccurrenceCount: number;
  let maxRepeatCount: number;

  const fortnightly = {
    schedule: 'every 2 weeks on mon, thu',
    end: 'after 5 times',
    start: '2024-10-07',
  };

  beforeEach(async () => {
    maxOccurrenceCount = 200;
    maxRepeatCount = 100000;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RecurrenceService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn().mockImplementation((key: string) => {
              if (key === 'recurrence.defaultOccurrenceCount') {
                return 50;
              }
              if (key === 'recurrence.maxOccurrenceCount') {
                return maxOccurrenceCount;
              }
              if (key === 'recurrence.maxRepeatCount') {
                return maxRepeatCount;
              }
              return null;
            }),
          },
        },
      ],
    }).compile();

    service = module.get<RecurrenceService>(RecurrenceService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('parseStartDate', () => {
    it('should default to today', () => {
      expect(service.parseStartDate()).toEqual(SimpleDate.today());
    });

    it('should reject dates that do not exist', () => {
      expect(() => service.parseStartDate('2023-02-29')).toThrow(DateError);
    });
  });

  describe('getRecurrenceDescription', () => {
    it('should describe a missing repetition', () => {
      expect(service.getRecurrenceDescription(null)).toBe('No recurrence');
    });

    it('should describe a monthly repetition', () => {
      expect(
        service.getRecurrenceDescription({
          delta: {
            type: 'Month',
            value: {
              type: 'OnWeek',
              value: { nth: 1, weekid: 2, day: Weekday.Wednesday },
            },
          },
          end: { type: 'Never' },
        }),
      ).toBe('Every 1 month on the third Wednesday');
    });
  });

  describe('resolveSchedule', () => {
    it('should resolve a counted weekly schedule', () => {
      const summary = service.resolveSchedule(fortnightly);

      expect(summary.start.toString()).toBe('2024-10-07');
      expect(summary.repetition).toEqual({
        delta: {
          type: 'Week',
          value: { nth: 2, on: [Weekday.Monday, Weekday.Thursday] },
        },
        end: { type: 'Count', value: 5 },
      });
      expect(summary.description).toBe(
        'Every 2 weeks on Monday, Thursday ending after 5 occurrences',
      );
      expect(summary.next?.toString()).toBe('2024-10-24');
      expect(summary.last?.toString()).toBe('2024-12-19');
    });

    it('should report far future as the end of a never ending schedule', () => {
      const summary = service.resolveSchedule({
        schedule: 'daily',
        start: '2024-10-07',
      });

      expect(summary.next?.toString()).toBe('2024-10-08');
      expect(summary.last?.toString()).toBe('9999-12-31');
    });

    it('should reject counts past the repeat limit before stepping', () => {
      expect(() =>
        service.resolveSchedule({
          schedule: 'daily',
          end: 'after 99999999999 times',
          start: '2020-01-01',
        }),
      ).toThrow(new DateError('repeat count must be at most 100000'));
    });

    it('should reject end dates after the far future before stepping', () => {
      expect(() =>
        service.resolveSchedule({
          schedule: 'weekly',
          end: 'until 20000-01-01',
          start: '2020-01-01',
        }),
      ).toThrow(new DateError('dates after 9999-12-31 are not supported'));
    });

    it('should stop stepping at the configured repeat limit', () => {
      maxRepeatCount = 3;

      expect(() =>
        service.resolveSchedule({
          schedule: 'daily',
          end: 'until 2024-10-31',
          start: '2024-10-07',
        }),
      ).toThrow(new DateError('schedule repeats too many times to resolve'));
      expect(
        service
          .resolveSchedule({
            schedule: 'daily',
            end: 'after 3 times',
            start: '2024-10-07',
          })
          .last?.toString(),
      ).toBe('2024-10-10');
    });

    it('should resolve a blank schedule without repetition', () => {
      const summary = service.resolveSchedule({
        schedule: '',
        start: '2024-10-07',
      });

      expect(summary).toEqual({
        start: SimpleDate.fromYmd(2024, 10, 7),
        repetition: null,
        description: 'No recurrence',
        next: null,
        last: null,
      });
    });

    it('should propagate parse errors', () => {
      expect(() =>
        service.resolveSchedule({
          schedule: 'now and then',
          start: '2024-10-07',
        }),
      ).toThrow(new DateError("couldn't parse schedule"));
      expect(() =>
        service.resolveSchedule({
          schedule: 'daily',
          end: 'someday',
          start: '2024-10-07',
        }),
      ).toThrow(new DateError('invalid end date'));
    });
  });

  describe('resolveOccurrences', () => {
    it('should list the start and each counted occurrence', () => {
      expect(
        service.resolveOccurrences(fortnightly).map((date) => date.toString()),
      ).toEqual([
        '2024-10-07',
        '2024-10-24',
        '2024-11-07',
        '2024-11-21',
        '2024-12-05',
        '2024-12-19',
      ]);
    });

    it('should stop at the end date', () => {
      const dates = service.resolveOccurrences({
        schedule: 'every 3 months on the 15th',
        end: 'until 2021-12-31',
        start: '2020-09-20',
      });

      expect(dates.map((date) => date.toString())).toEqual([
        '2020-09-20',
        '2020-12-15',
        '2021-03-15',
        '2021-06-15',
        '2021-09-15',
        '2021-12-15',
      ]);
    });

    it('should honour the requested count', () => {
      expect(
        service
          .resolveOccurrences(fortnightly, 2)
          .map((date) => date.toString()),
      ).toEqual(['2024-10-07', '2024-10-24']);
    });

    it('should cap the count at the configured maximum', () => {
      maxOccurrenceCount = 3;

      expect(
        service
          .resolveOccurrences({ schedule: 'daily', start: '2024-10-07' }, 100)
          .map((date) => date.toString()),
      ).toEqual(['2024-10-07', '2024-10-08', '2024-10-09']);
    });

    it('should use the configured default count', () => {
      expect(
        service.resolveOccurrences({ schedule: 'daily', start: '2024-10-07' }),
      ).toHaveLength(50);
    });

    it('should return only the start for a blank schedule', () => {
      expect(
        service.resolveOccurrences({ schedule: ' ', start: '2024-10-07' }),
      ).toEqual([SimpleDate.fromYmd(2024, 10, 7)]);
    });
  });
});
