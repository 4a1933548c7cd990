export type DurationUnit = 'day' | 'week' | 'month' | 'year';

/**
 * A non-negative calendar offset. Whether it moves a date forward or
 * backward depends on `SimpleDate.add` or `SimpleDate.sub`.
 */
export interface Duration {
  readonly unit: DurationUnit;
  readonly amount: number;
}

export const Duration = {
  days: (amount: number): Duration => ({ unit: 'day', amount }),
  weeks: (amount: number): Duration => ({ unit: 'week', amount }),
  months: (amount: number): Duration => ({ unit: 'month', amount }),
  years: (amount: number): Duration => ({ unit: 'year', amount }),
};
