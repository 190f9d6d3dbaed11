/**
 * Time grains
 *
 * The truncation granularities a time dimension can be floored to, ordered
 * from finest to coarsest.
 */

export const TIME_GRAINS = [
  'millisecond',
  'second',
  'minute',
  'hour',
  'day',
  'week',
  'month',
  'quarter',
  'year',
] as const;

export type TimeGrain = (typeof TIME_GRAINS)[number];

/**
 * Check whether a string names a supported grain
 */
export function isTimeGrain(value: string): value is TimeGrain {
  return (TIME_GRAINS as readonly string[]).includes(value);
}

/**
 * Compare two grains: negative when `a` is finer than `b`
 */
export function compareGrains(a: TimeGrain, b: TimeGrain): number {
  return TIME_GRAINS.indexOf(a) - TIME_GRAINS.indexOf(b);
}

/**
 * Calendar conventions used when truncating to week, quarter and year.
 */
export interface CalendarConventions {
  /** IANA time zone name */
  timeZone: string;
  /** 1 = Monday ... 7 = Sunday */
  firstDayOfWeek: number;
  /** 1 = January ... 12 = December */
  firstMonthOfYear: number;
}

export const DEFAULT_CALENDAR: CalendarConventions = {
  timeZone: 'UTC',
  firstDayOfWeek: 1,
  firstMonthOfYear: 1,
};
