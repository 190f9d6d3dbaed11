/**
 * ANSI dialect base
 *
 * Shared implementation of the capability contract. Backends override the
 * hooks that differ; date truncation is built from four primitives so that
 * week and fiscal-year conventions come for free.
 */

import type { TimeGrain } from '../time/grain.js';
import type { Dialect, JoinKind, TruncateOptions } from './dialect.js';

export type IntervalUnit = 'day' | 'month';

const JOIN_KEYWORDS: Record<JoinKind, string> = {
  inner: 'INNER JOIN',
  left: 'LEFT OUTER JOIN',
  right: 'RIGHT OUTER JOIN',
  full: 'FULL OUTER JOIN',
  cross: 'CROSS JOIN',
};

export abstract class AnsiDialect implements Dialect {
  abstract readonly name: string;

  readonly supportsILike: boolean = true;
  readonly supportsApproximateComparisons: boolean = true;
  readonly requiresAggregateForJoins: boolean = false;
  readonly defaultRowCap: number = 0;
  readonly groupByOrdinals: boolean = false;

  protected readonly identifierQuote: string = '"';
  protected readonly doubleType: string = 'DOUBLE';

  escapeIdentifier(name: string): string {
    const q = this.identifierQuote;
    return `${q}${name.split(q).join(q + q)}${q}`;
  }

  escapeTable(table: string, database?: string, schema?: string): string {
    return [database, schema, table]
      .filter((part): part is string => part !== undefined && part !== '')
      .map(part => this.escapeIdentifier(part))
      .join('.');
  }

  escapeStringValue(value: string): string {
    return `'${value.split("'").join("''")}'`;
  }

  placeholder(_position: number): string {
    return '?';
  }

  dateTruncExpr(expr: string, grain: TimeGrain, options: TruncateOptions): string {
    const utc = options.timeZone === 'UTC';
    const local = utc ? expr : this.toLocalTime(expr, options.timeZone);
    const truncated = this.truncateLocal(local, grain, options);
    return utc ? truncated : this.fromLocalTime(truncated, options.timeZone);
  }

  /**
   * Truncate a wall-clock timestamp. Weeks start on Monday and years in
   * January for `truncate`; other conventions shift, truncate and shift back.
   */
  protected truncateLocal(expr: string, grain: TimeGrain, options: TruncateOptions): string {
    switch (grain) {
      case 'week':
        return this.shifted(expr, options.firstDayOfWeek - 1, 'day', e => this.truncate(e, 'week'));
      case 'quarter':
        return this.shifted(expr, (options.firstMonthOfYear - 1) % 3, 'month', e => this.truncate(e, 'quarter'));
      case 'year':
        return this.shifted(expr, options.firstMonthOfYear - 1, 'month', e => this.truncate(e, 'year'));
      default:
        return this.truncate(expr, grain);
    }
  }

  private shifted(expr: string, amount: number, unit: IntervalUnit, fn: (e: string) => string): string {
    if (amount === 0) return fn(expr);
    return this.addInterval(fn(this.addInterval(expr, -amount, unit)), amount, unit);
  }

  protected truncate(expr: string, grain: TimeGrain): string {
    return `date_trunc('${grain}', ${expr})`;
  }

  protected addInterval(expr: string, amount: number, unit: IntervalUnit): string {
    const sign = amount < 0 ? '-' : '+';
    return `(${expr} ${sign} INTERVAL '${Math.abs(amount)} ${unit}')`;
  }

  protected toLocalTime(expr: string, timeZone: string): string {
    return `(${expr} AT TIME ZONE ${this.escapeStringValue(timeZone)})`;
  }

  protected fromLocalTime(expr: string, timeZone: string): string {
    return `(${expr} AT TIME ZONE ${this.escapeStringValue(timeZone)})`;
  }

  joinOnExpression(lhs: string, rhs: string): string {
    return `${lhs} IS NOT DISTINCT FROM ${rhs}`;
  }

  joinKeyword(kind: JoinKind): string {
    return JOIN_KEYWORDS[kind];
  }

  supportsJoin(_kind: JoinKind): boolean {
    return true;
  }

  anyValueExpr(expr: string): string {
    return `ANY_VALUE(${expr})`;
  }

  limitClause(limit?: number, offset?: number): string {
    const parts: string[] = [];
    if (limit !== undefined) parts.push(`LIMIT ${limit}`);
    if (offset !== undefined && offset > 0) parts.push(`OFFSET ${offset}`);
    return parts.join(' ');
  }

  safeDivideExpr(numerator: string, denominator: string): string {
    return `${numerator} / NULLIF(${denominator}, 0)`;
  }

  castToDouble(expr: string): string {
    return `CAST(${expr} AS ${this.doubleType})`;
  }
}
