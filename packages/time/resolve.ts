/**
 * Time range resolution
 *
 * Turns a relative TimeRange (ISO duration, ISO offset, round-to-grain,
 * free-form expression) into an absolute [start, end) pair. Month, quarter
 * and year arithmetic follows the calendar in the range's time zone.
 */

import type { TimeRange } from '../query/ast.js';
import { isRelativeTimeRange } from '../query/ast.js';
import type { CalendarConventions } from './grain.js';
import { INFINITE_DURATION, parseDuration, addDuration, subtractDuration, type Duration } from './duration.js';
import {
  evaluateTimeExpression,
  parseTimeExpression,
  TimeExpressionError,
  type TimeAnchors,
} from './time-expression-parser.js';
import { isValidTimeZone, truncateTime } from './zoned.js';

export interface TimeResolutionContext {
  /** reference instant for `now` and for ranges with no explicit end */
  executionTime: Date;
  calendar: CalendarConventions;
  /** data bounds for `earliest`, `latest` and `watermark` */
  anchors?: Omit<TimeAnchors, 'now'>;
}

function requireDuration(text: string, field: string): Duration {
  const duration = parseDuration(text);
  if (!duration) {
    throw new TimeExpressionError(`Invalid ISO 8601 duration '${text}' in ${field}`);
  }
  return duration;
}

function absolute(start: Date | undefined, end: Date | undefined): TimeRange {
  return {
    ...(start ? { start } : {}),
    ...(end ? { end } : {}),
  };
}

/**
 * Resolve a range to absolute bounds. A range with no relative fields is
 * returned unchanged, so resolving twice yields the same pair.
 */
export function resolveTimeRange(range: TimeRange, context: TimeResolutionContext): TimeRange {
  if (!isRelativeTimeRange(range)) {
    return range;
  }

  if (!isValidTimeZone(context.calendar.timeZone)) {
    throw new TimeExpressionError(`Unknown time zone '${context.calendar.timeZone}'`);
  }

  let calendar = context.calendar;
  let start = range.start;
  let end = range.end;

  if (range.expression !== undefined) {
    const parsed = parseTimeExpression(range.expression);
    if (parsed.timeZone !== undefined && !isValidTimeZone(parsed.timeZone)) {
      throw new TimeExpressionError(`Unknown time zone '${parsed.timeZone}'`);
    }
    const evaluated = evaluateTimeExpression(parsed, { ...context.anchors, now: context.executionTime }, calendar);
    calendar = { ...calendar, timeZone: evaluated.timeZone };
    start = evaluated.start;
    end = evaluated.end;
  }

  if (range.isoDuration !== undefined) {
    if (range.isoDuration === INFINITE_DURATION) {
      return {};
    }
    const duration = requireDuration(range.isoDuration, 'isoDuration');
    if (start && !end) {
      end = addDuration(start, duration, calendar.timeZone);
    } else {
      end = end ?? context.executionTime;
      start = subtractDuration(end, duration, calendar.timeZone);
    }
  }

  // relative ranges resolve to both bounds or neither
  if (start && !end) {
    end = context.executionTime;
  } else if (end && !start) {
    throw new TimeExpressionError('A relative time range with an end needs a start or an isoDuration');
  }

  if (range.isoOffset !== undefined) {
    const offset = requireDuration(range.isoOffset, 'isoOffset');
    start = start && subtractDuration(start, offset, calendar.timeZone);
    end = end && subtractDuration(end, offset, calendar.timeZone);
  }

  if (range.roundToGrain !== undefined) {
    const grain = range.roundToGrain;
    start = start && truncateTime(start, grain, calendar);
    end = end && truncateTime(end, grain, calendar);
  }

  return absolute(start, end);
}

/**
 * Resolve a comparison range. When it sets neither bound nor an expression it
 * inherits the primary range's resolved bounds, so an ISO offset alone
 * ("P1W") compares against the same window one week earlier.
 */
export function resolveComparisonTimeRange(
  comparison: TimeRange,
  primary: TimeRange | undefined,
  context: TimeResolutionContext
): TimeRange {
  if (!isRelativeTimeRange(comparison)) {
    return comparison;
  }

  const inherits =
    comparison.expression === undefined &&
    comparison.start === undefined &&
    comparison.end === undefined;

  if (!inherits || !primary) {
    return resolveTimeRange(comparison, context);
  }

  return resolveTimeRange(
    {
      ...comparison,
      ...(primary.start ? { start: primary.start } : {}),
      ...(primary.end ? { end: primary.end } : {}),
    },
    context
  );
}
