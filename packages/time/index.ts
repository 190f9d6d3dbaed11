/**
 * time package
 *
 * grains, ISO durations, zoned calendar arithmetic, time expressions, range resolution
 */

export {
  TIME_GRAINS,
  DEFAULT_CALENDAR,
  isTimeGrain,
  compareGrains,
  type TimeGrain,
  type CalendarConventions,
} from './grain.js';

export {
  toZonedParts,
  fromZonedParts,
  isoWeekday,
  addUnits,
  truncateTime,
  isValidTimeZone,
  type ZonedParts,
  type CalendarUnit,
} from './zoned.js';

export {
  INFINITE_DURATION,
  parseDuration,
  addDuration,
  subtractDuration,
  type Duration,
} from './duration.js';

export {
  parseTimeExpression,
  evaluateTimeExpression,
  TimeExpressionError,
  type TimeExpression,
  type TimePoint,
  type TimeOffset,
  type AnchorName,
  type TimeAnchors,
  type EvaluatedTimeRange,
} from './time-expression-parser.js';

export {
  resolveTimeRange,
  resolveComparisonTimeRange,
  type TimeResolutionContext,
} from './resolve.js';
