/**
 * ClickHouse dialect
 *
 * Identifiers are quoted with backticks. Grains map onto the toStartOfX
 * family, which takes the time zone directly.
 */

import { UnsupportedFeatureError } from '../compiler/errors.js';
import type { TimeGrain } from '../time/grain.js';
import { AnsiDialect } from './base.js';
import type { TruncateOptions } from './dialect.js';

const START_OF: Record<Exclude<TimeGrain, 'week'>, string> = {
  millisecond: 'toStartOfMillisecond',
  second: 'toStartOfSecond',
  minute: 'toStartOfMinute',
  hour: 'toStartOfHour',
  day: 'toStartOfDay',
  month: 'toStartOfMonth',
  quarter: 'toStartOfQuarter',
  year: 'toStartOfYear',
};

/** toStartOfWeek modes: 0 starts weeks on Sunday, 1 on Monday */
const WEEK_MODES: Record<number, number> = { 1: 1, 7: 0 };

// these return Date rather than DateTime
const DATE_VALUED = new Set<TimeGrain>(['week', 'month', 'quarter', 'year']);

export class ClickHouseDialect extends AnsiDialect {
  readonly name = 'clickhouse';

  protected override readonly identifierQuote = '`';
  protected override readonly doubleType = 'Float64';

  override escapeStringValue(value: string): string {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
  }

  override dateTruncExpr(expr: string, grain: TimeGrain, options: TruncateOptions): string {
    const tz = this.escapeStringValue(options.timeZone);
    let truncated: string;

    if (grain === 'week') {
      const mode = WEEK_MODES[options.firstDayOfWeek];
      if (mode === undefined) {
        throw new UnsupportedFeatureError(
          'week grain',
          this.name,
          `weeks can start on Monday or Sunday, not day ${options.firstDayOfWeek}`
        );
      }
      truncated = `toStartOfWeek(${expr}, ${mode}, ${tz})`;
    } else if ((grain === 'year' || grain === 'quarter') && options.firstMonthOfYear !== 1) {
      const shift = grain === 'year' ? options.firstMonthOfYear - 1 : (options.firstMonthOfYear - 1) % 3;
      const inner = `${START_OF[grain]}(addMonths(${expr}, -${shift}), ${tz})`;
      truncated = shift === 0 ? `${START_OF[grain]}(${expr}, ${tz})` : `addMonths(${inner}, ${shift})`;
    } else {
      truncated = `${START_OF[grain]}(${expr}, ${tz})`;
    }

    return DATE_VALUED.has(grain) ? `toDateTime(${truncated}, ${tz})` : truncated;
  }

  override joinOnExpression(lhs: string, rhs: string): string {
    return `isNotDistinctFrom(${lhs}, ${rhs})`;
  }

  override anyValueExpr(expr: string): string {
    return `any(${expr})`;
  }
}
