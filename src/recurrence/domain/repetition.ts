import {
  ERROR_MESSAGES,
  FAR_FUTURE,
  MAX_REPEAT_COUNT,
} from '../constants/recurrence.constants';
import { Repetition } from '../interfaces/recurrence.interface';
import { DateError } from './date.error';
import { advance } from './rep-delta';
import { SimpleDate } from './simple-date';

/**
 * The occurrence that follows `start`
 */
export function nextOccurrence(
  start: SimpleDate,
  repetition: Repetition,
): SimpleDate {
  return advance(start, repetition.delta);
}

/**
 * The final occurrence of a schedule beginning on `start`.
 * Schedules that never end report 9999-12-31.
 *
 * @param maxSteps - Steps allowed before giving up with a `DateError`
 */
export function lastOccurrence(
  start: SimpleDate,
  repetition: Repetition,
  maxSteps = MAX_REPEAT_COUNT,
): SimpleDate {
  const { delta, end } = repetition;

  switch (end.type) {
    case 'Never':
      return SimpleDate.fromYmd(
        FAR_FUTURE.year,
        FAR_FUTURE.month,
        FAR_FUTURE.day,
      );
    case 'Count': {
      if (end.value > maxSteps) {
        throw new DateError(ERROR_MESSAGES.TOO_MANY_REPETITIONS);
      }
      let current = start;
      for (let i = 0; i < end.value; i++) {
        current = advance(current, delta);
      }
      return current;
    }
    case 'Date': {
      let current = start;
      let steps = 0;
      while (current.isBefore(end.value)) {
        steps += 1;
        if (steps > maxSteps) {
          throw new DateError(ERROR_MESSAGES.TOO_MANY_REPETITIONS);
        }
        const next = advance(current, delta);
        if (next.isAfter(end.value)) {
          return current;
        }
        current = next;
      }
      return current;
    }
  }
}

/**
 * `start` followed by the occurrences after it, stopping at the end
 * condition or once `limit` dates have been collected.
 */
export function listOccurrences(
  start: SimpleDate,
  repetition: Repetition,
  limit: number,
): SimpleDate[] {
  const { delta, end } = repetition;
  const occurrences: SimpleDate[] = [];
  if (limit < 1) {
    return occurrences;
  }

  let current = start;
  occurrences.push(current);

  while (occurrences.length < limit) {
    if (end.type === 'Count' && occurrences.length > end.value) {
      break;
    }

    const next = advance(current, delta);
    if (end.type === 'Date' && next.isAfter(end.value)) {
      break;
    }

    occurrences.push(next);
    current = next;
  }

  return occurrences;
}
