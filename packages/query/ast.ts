/**
 * Query Model Type Definitions
 *
 * These types describe one analytical request against a metrics view:
 * dimensions, measures, filter expressions, time windows, sort and limits.
 * A Query is logically immutable; rewrite passes return new values.
 */

import type { TimeGrain } from '../time/grain.js';

// ---
// EXPRESSIONS
// ---

/**
 * Literal values. Lists are only meaningful as the right-hand side of
 * `in`/`nin`.
 */
export type LiteralValue = string | number | boolean | null | readonly LiteralValue[];

export const OPERATORS = [
  'eq',
  'neq',
  'lt',
  'lte',
  'gt',
  'gte',
  'in',
  'nin',
  'ilike',
  'nilike',
  'like',
  'nlike',
  'and',
  'or',
] as const;

export type Operator = (typeof OPERATORS)[number];

/** Operators taking exactly two operands */
export const BINARY_OPERATORS: ReadonlySet<Operator> = new Set<Operator>([
  'eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'ilike', 'nilike', 'like', 'nlike', 'in', 'nin',
]);

/** Operators joining two or more predicates */
export const LOGICAL_OPERATORS: ReadonlySet<Operator> = new Set<Operator>(['and', 'or']);

/**
 * A filter/condition expression: exactly one of a name reference, a literal,
 * a condition or a subquery.
 */
export type Expression =
  | NameExpression
  | ValueExpression
  | ConditionExpression
  | SubqueryExpression;

/** Reference to a dimension or measure */
export interface NameExpression {
  readonly type: 'name';
  readonly name: string;
}

export interface ValueExpression {
  readonly type: 'value';
  readonly value: LiteralValue;
}

export interface ConditionExpression {
  readonly type: 'condition';
  readonly op: Operator;
  readonly exprs: readonly Expression[];
}

/**
 * Restricts a dimension to the values for which an aggregate condition holds:
 * `dimension IN (SELECT dimension ... GROUP BY dimension HAVING having)`.
 */
export interface SubqueryExpression {
  readonly type: 'subquery';
  readonly dimension: string;
  readonly measures: readonly string[];
  readonly where?: Expression;
  readonly having?: Expression;
}

// ---
// FIELDS
// ---

export interface Dimension {
  readonly name: string;
  /** Truncate a time dimension to this grain */
  readonly timeGrain?: TimeGrain;
}

/**
 * Computations a measure can request instead of (or on top of) a plain
 * metrics-view measure. When a compute is present the measure's `name` is
 * the output alias.
 */
export type MeasureCompute =
  | { readonly type: 'count' }
  | { readonly type: 'countDistinct'; readonly dimension: string }
  | { readonly type: 'comparisonValue'; readonly measure: string }
  | { readonly type: 'comparisonDelta'; readonly measure: string }
  | { readonly type: 'comparisonRatio'; readonly measure: string }
  | {
      readonly type: 'percentOfTotal';
      readonly measure: string;
      /** grand total captured by the percent-of-total rewrite */
      readonly total?: number | null;
    };

export type MeasureComputeType = MeasureCompute['type'];

export interface Measure {
  readonly name: string;
  readonly compute?: MeasureCompute;
}

export interface Sort {
  readonly name: string;
  readonly desc: boolean;
}

// ---
// TIME
// ---

/**
 * Either an absolute [start, end) pair or a relative specification that the
 * time-range rewrite resolves to one.
 */
export interface TimeRange {
  readonly start?: Date;
  readonly end?: Date;
  /** ISO 8601 duration, or 'inf' for all time */
  readonly isoDuration?: string;
  /** ISO 8601 duration to shift the range back by */
  readonly isoOffset?: string;
  readonly roundToGrain?: TimeGrain;
  /** free-form range expression, e.g. `7D as of latest/D` */
  readonly expression?: string;
}

// ---
// QUERY
// ---

export interface Query {
  readonly metricsView: string;
  readonly dimensions: readonly Dimension[];
  readonly measures: readonly Measure[];
  /** pre-aggregation filter */
  readonly where?: Expression;
  /** post-aggregation filter */
  readonly having?: Expression;
  readonly timeRange?: TimeRange;
  readonly comparisonTimeRange?: TimeRange;
  readonly sort: readonly Sort[];
  readonly limit?: number;
  readonly offset?: number;
  /** return underlying rows instead of aggregates */
  readonly rows?: boolean;
  readonly pivotOn?: readonly string[];
  /** IANA zone for time grains and relative ranges */
  readonly timeZone?: string;
}

// ---
// HELPERS
// ---

export function isNameExpression(expr: Expression): expr is NameExpression {
  return expr.type === 'name';
}

export function isValueExpression(expr: Expression): expr is ValueExpression {
  return expr.type === 'value';
}

export function isConditionExpression(expr: Expression): expr is ConditionExpression {
  return expr.type === 'condition';
}

export function isSubqueryExpression(expr: Expression): expr is SubqueryExpression {
  return expr.type === 'subquery';
}

export function isListLiteral(value: LiteralValue): value is readonly LiteralValue[] {
  return Array.isArray(value);
}

/**
 * Whether a time range still carries relative fields
 */
export function isRelativeTimeRange(range: TimeRange): boolean {
  return (
    range.isoDuration !== undefined ||
    range.isoOffset !== undefined ||
    range.roundToGrain !== undefined ||
    range.expression !== undefined
  );
}

/**
 * Output name of every requested field, dimensions first
 */
export function outputNames(query: Query): string[] {
  return [...query.dimensions.map(d => d.name), ...query.measures.map(m => m.name)];
}

/**
 * Walk an expression tree depth-first
 */
export function walkExpression(expr: Expression, visit: (node: Expression) => void): void {
  visit(expr);
  if (expr.type === 'condition') {
    for (const child of expr.exprs) {
      walkExpression(child, visit);
    }
  }
}

/**
 * Collect every name an expression references. Subqueries contribute their
 * dimension only; their inner filters are scoped to the subquery.
 */
export function collectNames(expr: Expression): string[] {
  const names: string[] = [];
  walkExpression(expr, node => {
    if (node.type === 'name') {
      names.push(node.name);
    } else if (node.type === 'subquery') {
      names.push(node.dimension);
    }
  });
  return names;
}
