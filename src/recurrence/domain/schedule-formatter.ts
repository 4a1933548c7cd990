import { WEEK_ORDINALS } from '../constants/recurrence.constants';
import {
  MonthDelta,
  RepDelta,
  RepEnd,
  Repetition,
} from '../interfaces/recurrence.interface';
import { Duration } from './duration';

function plural(count: number, singular: string, pluralForm = `${singular}s`) {
  return count === 1 ? singular : pluralForm;
}

/**
 * Get the ordinal suffix for a day of the month (1st, 2nd, 3rd, etc.)
 */
export function ordinalSuffix(n: number): string {
  const j = n % 10;
  const k = n % 100;

  if (j === 1 && k !== 11) {
    return 'st';
  }
  if (j === 2 && k !== 12) {
    return 'nd';
  }
  if (j === 3 && k !== 13) {
    return 'rd';
  }
  return 'th';
}

export function formatDuration(duration: Duration): string {
  return `${duration.amount} ${plural(duration.amount, duration.unit)}`;
}

/**
 * "every" is left to the caller: "2 weeks on Monday, Friday"
 */
export function formatRepDelta(delta: RepDelta): string {
  switch (delta.type) {
    case 'Day':
      return delta.value.nth === 1 ? 'day' : `${delta.value.nth} days`;
    case 'Week': {
      const { nth, on } = delta.value;
      const unit = nth === 1 ? 'week' : `${nth} weeks`;
      return `${unit} on ${on.join(', ')}`;
    }
    case 'Month':
      return formatMonthDelta(delta.value);
    case 'Year':
      return delta.value.nth === 1 ? 'year' : `${delta.value.nth} years`;
  }
}

function formatMonthDelta(delta: MonthDelta): string {
  if (delta.type === 'OnDate') {
    const { nth, days } = delta.value;
    const unit = nth === 1 ? 'month' : `${nth} months`;
    const list = days.map((day) => `${day}${ordinalSuffix(day)}`).join(', ');
    return `${unit} on the ${list}`;
  }

  const { nth, weekid, day } = delta.value;
  const ordinal = WEEK_ORDINALS[weekid]?.[0] ?? `#${weekid + 1}`;
  return `${nth} ${plural(nth, 'month')} on the ${ordinal} ${day}`;
}

export function formatRepEnd(end: RepEnd): string {
  switch (end.type) {
    case 'Never':
      return 'never ending';
    case 'Date':
      return `ending on ${end.value.toString()}`;
    case 'Count':
      return `ending after ${end.value} ${plural(end.value, 'occurrence')}`;
  }
}

export function formatRepetition(repetition: Repetition): string {
  const delta = formatRepDelta(repetition.delta);
  return repetition.end.type === 'Never'
    ? delta
    : `${delta} ${formatRepEnd(repetition.end)}`;
}
