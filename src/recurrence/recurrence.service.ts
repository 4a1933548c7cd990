import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import {
  DEFAULT_OCCURRENCE_COUNT,
  MAX_OCCURRENCE_COUNT,
  MAX_REPEAT_COUNT,
  NO_RECURRENCE_TEXT,
} from './constants/recurrence.constants';
import { DateError } from './domain/date.error';
import {
  lastOccurrence,
  listOccurrences,
  nextOccurrence,
} from './domain/repetition';
import { formatRepetition } from './domain/schedule-formatter';
import { parseRepetition, parseSimpleDate } from './domain/schedule-parser';
import { SimpleDate } from './domain/simple-date';
import {
  Repetition,
  ScheduleSummary,
} from './interfaces/recurrence.interface';

/**
 * Free-text schedule as typed by a user
 */
export interface ScheduleInput {
  schedule: string;
  end?: string;
  start?: string;
}

@Injectable()
export class RecurrenceService {
  private readonly logger = new Logger(RecurrenceService.name);

  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  /**
   * Parse a `YYYY-MM-DD` start date, defaulting to today when blank
   */
  parseStartDate(text = ''): SimpleDate {
    return this.withParseLogging('start date', text, () =>
      parseSimpleDate(text),
    );
  }

  /**
   * Parse a schedule phrase and its ending phrase against a start date.
   * Returns null for a blank schedule.
   */
  parseSchedule(
    schedule: string,
    end: string | undefined,
    start: SimpleDate,
  ): Repetition | null {
    return this.withParseLogging(
      'schedule',
      `${schedule} / ${end ?? ''}`,
      () => parseRepetition(schedule, end ?? '', start),
    );
  }

  /**
   * Generate a human-readable description of a repetition
   */
  getRecurrenceDescription(repetition: Repetition | null): string {
    if (!repetition) {
      return NO_RECURRENCE_TEXT;
    }
    return `Every ${formatRepetition(repetition)}`;
  }

  getNextOccurrence(start: SimpleDate, repetition: Repetition): SimpleDate {
    return nextOccurrence(start, repetition);
  }

  /**
   * Final occurrence, resolved in at most the configured number of steps
   */
  getLastOccurrence(start: SimpleDate, repetition: Repetition): SimpleDate {
    const maxSteps =
      this.configService.get('recurrence.maxRepeatCount', { infer: true }) ??
      MAX_REPEAT_COUNT;

    return lastOccurrence(start, repetition, maxSteps);
  }

  /**
   * Generate occurrence dates, the start date included.
   *
   * @param count - Maximum number of dates; defaults to the configured
   * count and never exceeds the configured maximum
   */
  generateOccurrences(
    start: SimpleDate,
    repetition: Repetition,
    count?: number,
  ): SimpleDate[] {
    const defaultCount =
      this.configService.get('recurrence.defaultOccurrenceCount', {
        infer: true,
      }) ?? DEFAULT_OCCURRENCE_COUNT;
    const maxCount =
      this.configService.get('recurrence.maxOccurrenceCount', {
        infer: true,
      }) ?? MAX_OCCURRENCE_COUNT;

    const limitedCount = Math.min(count ?? defaultCount, maxCount);
    this.logger.debug(
      `Generating up to ${limitedCount} occurrences from ${start.toString()}`,
    );

    return listOccurrences(start, repetition, limitedCount);
  }

  /**
   * Resolve free text into a repetition together with its next and last
   * occurrences
   */
  resolveSchedule(input: ScheduleInput): ScheduleSummary {
    const start = this.parseStartDate(input.start);
    const repetition = this.parseSchedule(input.schedule, input.end, start);

    return {
      start,
      repetition,
      description: this.getRecurrenceDescription(repetition),
      next: repetition ? this.getNextOccurrence(start, repetition) : null,
      last: repetition ? this.getLastOccurrence(start, repetition) : null,
    };
  }

  /**
   * Occurrences of a free-text schedule; a blank schedule yields the start only
   */
  resolveOccurrences(input: ScheduleInput, count?: number): SimpleDate[] {
    const start = this.parseStartDate(input.start);
    const repetition = this.parseSchedule(input.schedule, input.end, start);

    if (!repetition) {
      return [start];
    }
    return this.generateOccurrences(start, repetition, count);
  }

  private withParseLogging<T>(what: string, text: string, parse: () => T): T {
    try {
      return parse();
    } catch (error) {
      if (error instanceof DateError) {
        this.logger.debug(`Rejected ${what} "${text}": ${error.message}`);
      }
      throw error;
    }
  }
}
