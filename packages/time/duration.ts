/**
 * ISO 8601 durations (PnYnMnWnDTnHnMnS)
 */

import { addUnits, type CalendarUnit } from './zoned.js';

export interface Duration {
  years: number;
  months: number;
  weeks: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

/** Sentinel for an unbounded duration ("all time") */
export const INFINITE_DURATION = 'inf';

const ISO_DURATION =
  /^P(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

/**
 * Parse an ISO 8601 duration. Returns null when the string is malformed or
 * carries no components at all ("P", "PT").
 */
export function parseDuration(text: string): Duration | null {
  const match = ISO_DURATION.exec(text.trim().toUpperCase());
  if (!match || match.slice(1).every(part => part === undefined)) {
    return null;
  }

  const num = (index: number): number => {
    const raw = match[index];
    return raw === undefined ? 0 : parseInt(raw, 10);
  };

  return {
    years: num(1),
    months: num(2),
    weeks: num(3),
    days: num(4),
    hours: num(5),
    minutes: num(6),
    seconds: num(7),
  };
}

// calendar components first (largest to smallest), then clock components
const COMPONENTS: ReadonlyArray<[keyof Duration, CalendarUnit]> = [
  ['years', 'year'],
  ['months', 'month'],
  ['weeks', 'week'],
  ['days', 'day'],
  ['hours', 'hour'],
  ['minutes', 'minute'],
  ['seconds', 'second'],
];

function shift(date: Date, duration: Duration, sign: 1 | -1, timeZone: string): Date {
  let result = date;
  for (const [field, unit] of COMPONENTS) {
    const amount = duration[field];
    if (amount !== 0) {
      result = addUnits(result, sign * amount, unit, timeZone);
    }
  }
  return result;
}

/**
 * Move an instant forward by a duration in the given zone
 */
export function addDuration(date: Date, duration: Duration, timeZone: string): Date {
  return shift(date, duration, 1, timeZone);
}

/**
 * Move an instant back by a duration in the given zone
 */
export function subtractDuration(date: Date, duration: Duration, timeZone: string): Date {
  return shift(date, duration, -1, timeZone);
}
