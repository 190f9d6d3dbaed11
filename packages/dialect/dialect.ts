/**
 * Dialect capability contract
 *
 * Everything the translator, builder, emitter and rewrite passes need to know
 * about a backend. Callers branch on these flags and generators only, never on
 * the dialect's name.
 */

import type { TimeGrain } from '../time/grain.js';

export type JoinKind = 'inner' | 'left' | 'right' | 'full' | 'cross';

export interface TruncateOptions {
  /** IANA zone the grain boundaries are computed in */
  timeZone: string;
  /** 1 = Monday ... 7 = Sunday */
  firstDayOfWeek: number;
  /** 1 = January ... 12 = December */
  firstMonthOfYear: number;
}

export interface Dialect {
  readonly name: string;

  /** Quote an identifier (column, alias) */
  escapeIdentifier(name: string): string;
  /** Quote a possibly qualified table reference */
  escapeTable(table: string, database?: string, schema?: string): string;
  /** Quote a string as a SQL literal; only for values the compiler itself generates */
  escapeStringValue(value: string): string;
  /** Placeholder for the 1-based argument position */
  placeholder(position: number): string;

  /** Whether ILIKE is available natively */
  readonly supportsILike: boolean;

  /** SQL truncating a timestamp expression to a grain */
  dateTruncExpr(expr: string, grain: TimeGrain, options: TruncateOptions): string;

  /** Null-safe equality used to join the sides of a comparison */
  joinOnExpression(lhs: string, rhs: string): string;
  joinKeyword(kind: JoinKind): string;
  supportsJoin(kind: JoinKind): boolean;

  /** Whether one-sided comparison joins are worth choosing over a full join */
  readonly supportsApproximateComparisons: boolean;
  /**
   * Whether a select with join children must group explicitly and wrap
   * measures in a deterministic aggregate
   */
  readonly requiresAggregateForJoins: boolean;
  anyValueExpr(expr: string): string;

  /** Row cap applied when the caller configures none (0 = unlimited) */
  readonly defaultRowCap: number;

  /** Emit GROUP BY 1, 2 instead of repeating expressions */
  readonly groupByOrdinals: boolean;
  limitClause(limit?: number, offset?: number): string;

  /** Division yielding NULL for a zero denominator */
  safeDivideExpr(numerator: string, denominator: string): string;
  castToDouble(expr: string): string;
}
