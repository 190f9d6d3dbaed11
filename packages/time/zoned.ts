/**
 * Time zone arithmetic on top of Intl.DateTimeFormat.
 *
 * Dates are absolute instants; "zoned parts" are the wall-clock fields of an
 * instant as observed in a given IANA zone. Calendar units (days and larger)
 * are applied to wall-clock parts, clock units to the instant.
 */

import type { CalendarConventions, TimeGrain } from './grain.js';

export interface ZonedParts {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export type CalendarUnit = 'year' | 'quarter' | 'month' | 'week' | 'day' | 'hour' | 'minute' | 'second';

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    // throws RangeError for unknown zones
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Check whether a string is a time zone the runtime knows about
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Wall-clock fields of an instant in a zone
 */
export function toZonedParts(date: Date, timeZone: string): ZonedParts {
  if (timeZone === 'UTC') {
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hour: date.getUTCHours(),
      minute: date.getUTCMinutes(),
      second: date.getUTCSeconds(),
      millisecond: date.getUTCMilliseconds(),
    };
  }

  const fields: Record<string, number> = {};
  for (const part of getFormatter(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      fields[part.type] = parseInt(part.value, 10);
    }
  }

  return {
    year: fields.year ?? 1970,
    month: fields.month ?? 1,
    day: fields.day ?? 1,
    hour: fields.hour ?? 0,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
    millisecond: date.getUTCMilliseconds(),
  };
}

function partsToUTC(parts: ZonedParts): number {
  return Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
    parts.millisecond
  );
}

function zoneOffset(instant: number, timeZone: string): number {
  return partsToUTC(toZonedParts(new Date(instant), timeZone)) - instant;
}

/**
 * The instant at which a zone's wall clock shows the given fields.
 * Out-of-range fields roll over (Jan 32 is Feb 1). Wall-clock times that
 * fall into a DST gap resolve to the later offset.
 */
export function fromZonedParts(parts: ZonedParts, timeZone: string): Date {
  const local = partsToUTC(parts);
  if (timeZone === 'UTC') {
    return new Date(local);
  }

  const firstGuess = local - zoneOffset(local, timeZone);
  const correctedOffset = zoneOffset(firstGuess, timeZone);
  return new Date(local - correctedOffset);
}

/**
 * ISO weekday of a calendar date: 1 = Monday ... 7 = Sunday
 */
export function isoWeekday(parts: Pick<ZonedParts, 'year' | 'month' | 'day'>): number {
  const day = new Date(Date.UTC(parts.year, parts.month - 1, parts.day)).getUTCDay();
  return day === 0 ? 7 : day;
}

/**
 * Add an amount of a unit. Calendar units move the wall clock in `timeZone`
 * (so "1 day" across a DST change is 23 or 25 hours); clock units move the
 * instant. Month arithmetic rolls over like the calendar does: Jan 31 + 1
 * month is Mar 2 or 3.
 */
export function addUnits(date: Date, amount: number, unit: CalendarUnit, timeZone: string): Date {
  switch (unit) {
    case 'hour':
      return new Date(date.getTime() + amount * MS_PER_HOUR);
    case 'minute':
      return new Date(date.getTime() + amount * MS_PER_MINUTE);
    case 'second':
      return new Date(date.getTime() + amount * MS_PER_SECOND);
    default:
      break;
  }

  const parts = toZonedParts(date, timeZone);
  switch (unit) {
    case 'year':
      parts.year += amount;
      break;
    case 'quarter':
      parts.month += amount * 3;
      break;
    case 'month':
      parts.month += amount;
      break;
    case 'week':
      parts.day += amount * 7;
      break;
    case 'day':
      parts.day += amount;
      break;
  }
  return fromZonedParts(parts, timeZone);
}

/**
 * Floor an instant to the start of its grain in the calendar's zone
 */
export function truncateTime(date: Date, grain: TimeGrain, calendar: CalendarConventions): Date {
  if (grain === 'millisecond') {
    return new Date(date.getTime());
  }

  const parts = toZonedParts(date, calendar.timeZone);
  parts.millisecond = 0;
  if (grain === 'second') {
    return fromZonedParts(parts, calendar.timeZone);
  }
  parts.second = 0;
  if (grain === 'minute') {
    return fromZonedParts(parts, calendar.timeZone);
  }
  parts.minute = 0;
  if (grain === 'hour') {
    return fromZonedParts(parts, calendar.timeZone);
  }
  parts.hour = 0;

  switch (grain) {
    case 'day':
      break;
    case 'week': {
      const back = (isoWeekday(parts) - calendar.firstDayOfWeek + 7) % 7;
      parts.day -= back;
      break;
    }
    case 'month':
      parts.day = 1;
      break;
    case 'quarter': {
      const monthsIntoYear = (parts.month - calendar.firstMonthOfYear + 12) % 12;
      parts.month -= monthsIntoYear % 3;
      parts.day = 1;
      break;
    }
    case 'year': {
      if (parts.month < calendar.firstMonthOfYear) {
        parts.year -= 1;
      }
      parts.month = calendar.firstMonthOfYear;
      parts.day = 1;
      break;
    }
  }
  return fromZonedParts(parts, calendar.timeZone);
}
