/**
 * Apache Druid SQL
 *
 * No ILIKE, no right or full joins, and grouped selects over joins need every
 * non-grouped field aggregated.
 */

import type { TimeGrain } from '../time/grain.js';
import { AnsiDialect } from './base.js';
import type { JoinKind, TruncateOptions } from './dialect.js';

const PERIODS: Record<TimeGrain, string> = {
  millisecond: 'PT0.001S',
  second: 'PT1S',
  minute: 'PT1M',
  hour: 'PT1H',
  day: 'P1D',
  week: 'P1W',
  month: 'P1M',
  quarter: 'P3M',
  year: 'P1Y',
};

const SUPPORTED_JOINS = new Set<JoinKind>(['inner', 'left', 'cross']);

export class DruidDialect extends AnsiDialect {
  readonly name = 'druid';

  override readonly supportsILike = false;
  override readonly requiresAggregateForJoins = true;
  override readonly defaultRowCap = 10_000;

  override dateTruncExpr(expr: string, grain: TimeGrain, options: TruncateOptions): string {
    const tz = this.escapeStringValue(options.timeZone);
    const floor = (e: string): string => `TIME_FLOOR(${e}, '${PERIODS[grain]}', NULL, ${tz})`;
    const shift = (e: string, period: string, step: number): string =>
      `TIME_SHIFT(${e}, '${period}', ${step}, ${tz})`;

    let amount = 0;
    let period = 'P1D';
    if (grain === 'week') {
      amount = options.firstDayOfWeek - 1;
    } else if (grain === 'year') {
      amount = options.firstMonthOfYear - 1;
      period = 'P1M';
    } else if (grain === 'quarter') {
      amount = (options.firstMonthOfYear - 1) % 3;
      period = 'P1M';
    }

    if (amount === 0) return floor(expr);
    return shift(floor(shift(expr, period, -amount)), period, amount);
  }

  override joinOnExpression(lhs: string, rhs: string): string {
    return `(${lhs} = ${rhs} OR (${lhs} IS NULL AND ${rhs} IS NULL))`;
  }

  override supportsJoin(kind: JoinKind): boolean {
    return SUPPORTED_JOINS.has(kind);
  }

  override safeDivideExpr(numerator: string, denominator: string): string {
    return `SAFE_DIVIDE(${numerator}, ${denominator})`;
  }
}
