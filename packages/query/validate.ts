/**
 * Query validation
 *
 * Pure checks of a Query against a metrics view and a security policy. Runs
 * before any rewrite; never consults the database and never mutates the query.
 */

import { ValidationError } from '../compiler/errors.js';
import { INFINITE_DURATION, parseDuration } from '../time/duration.js';
import { isValidTimeZone } from '../time/zoned.js';
import type { Expression, LiteralValue, Measure, Query, TimeRange } from './ast.js';
import { BINARY_OPERATORS, LOGICAL_OPERATORS, OPERATORS, isListLiteral } from './ast.js';
import type { MetricsView } from './metrics-view.js';
import { findMeasure, isTimeDimension, measureDependencies, resolveDimension } from './metrics-view.js';
import type { SecurityPolicy } from './security.js';
import { allowAllPolicy } from './security.js';

const COMPARISON_COMPUTES = new Set(['comparisonValue', 'comparisonDelta', 'comparisonRatio']);

/** Resolves a name in some scope, returning a reason when it is not allowed */
type NameScope = (name: string) => string | undefined;

/** Filters over the base table can hold subqueries; filters over aggregates cannot */
type FilterKind = 'base' | 'aggregate';

interface ValidationContext {
  view: MetricsView;
  security: SecurityPolicy;
}

function fail(field: string, message: string): never {
  throw new ValidationError(field, message);
}

function checkDimensionName(ctx: ValidationContext, name: string, field: string): void {
  if (!resolveDimension(ctx.view, name)) {
    fail(field, `unknown dimension '${name}'`);
  }
  if (!ctx.security.canAccessField(name)) {
    fail(field, `dimension '${name}' is not accessible`);
  }
}

function checkMeasureName(ctx: ValidationContext, name: string, field: string): void {
  if (!findMeasure(ctx.view, name)) {
    fail(field, `unknown measure '${name}'`);
  }
  if (!ctx.security.canAccessField(name)) {
    fail(field, `measure '${name}' is not accessible`);
  }
  try {
    measureDependencies(ctx.view, name);
  } catch (error) {
    fail(field, error instanceof Error ? error.message : String(error));
  }
}

function isLiteral(value: unknown): value is LiteralValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value) && value.every(isLiteral);
    default:
      return false;
  }
}

function checkExpression(
  ctx: ValidationContext,
  expr: Expression,
  field: string,
  scope: NameScope,
  kind: FilterKind
): void {
  switch (expr.type) {
    case 'name': {
      if (!expr.name) fail(field, 'name must not be empty');
      const reason = scope(expr.name);
      if (reason) fail(field, reason);
      return;
    }
    case 'value':
      if (!isLiteral(expr.value)) fail(field, 'value must be a string, number, boolean, null or list');
      return;
    case 'condition':
      checkCondition(ctx, expr.op, expr.exprs, field, scope, kind);
      return;
    case 'subquery':
      if (kind === 'aggregate') fail(field, 'subqueries are only allowed in filters over dimensions');
      checkSubquery(ctx, expr, field);
      return;
    default:
      fail(field, 'expression must populate exactly one of name, value, condition, subquery');
  }
}

function checkCondition(
  ctx: ValidationContext,
  op: string,
  exprs: readonly Expression[],
  field: string,
  scope: NameScope,
  kind: FilterKind
): void {
  const operator = OPERATORS.find(candidate => candidate === op);
  if (!operator) {
    fail(`${field}.op`, `unknown operator '${op}'`);
  }
  if (LOGICAL_OPERATORS.has(operator)) {
    if (exprs.length < 2) fail(field, `'${operator}' requires at least 2 operands, got ${exprs.length}`);
  } else if (BINARY_OPERATORS.has(operator) && exprs.length !== 2) {
    fail(field, `'${operator}' requires exactly 2 operands, got ${exprs.length}`);
  }

  exprs.forEach((child, i) => {
    const childField = `${field}.exprs[${i}]`;
    checkExpression(ctx, child, childField, scope, kind);
    const isList = child.type === 'value' && isListLiteral(child.value);
    if (operator === 'in' || operator === 'nin') {
      if (i === 1 && !isList) fail(childField, `'${operator}' requires a list value as its second operand`);
      if (i === 0 && isList) fail(childField, `'${operator}' requires a list only as its second operand`);
    } else if (isList) {
      fail(childField, `list values are only allowed with 'in' and 'nin'`);
    }
  });
}

function checkSubquery(
  ctx: ValidationContext,
  expr: Extract<Expression, { type: 'subquery' }>,
  field: string
): void {
  checkDimensionName(ctx, expr.dimension, `${field}.dimension`);
  if (expr.measures.length === 0 && expr.having) {
    fail(`${field}.having`, 'having requires at least one measure');
  }
  expr.measures.forEach((name, i) => checkMeasureName(ctx, name, `${field}.measures[${i}]`));
  if (expr.where) {
    checkExpression(ctx, expr.where, `${field}.where`, dimensionScope(ctx), 'base');
  }
  if (expr.having) {
    const allowed = new Set([expr.dimension, ...expr.measures]);
    checkExpression(
      ctx,
      expr.having,
      `${field}.having`,
      name => (allowed.has(name) ? undefined : `'${name}' is not selected by the subquery`),
      'aggregate'
    );
  }
}

function dimensionScope(ctx: ValidationContext): NameScope {
  return name => {
    if (!resolveDimension(ctx.view, name)) return `unknown dimension '${name}'`;
    if (!ctx.security.canAccessField(name)) return `dimension '${name}' is not accessible`;
    return undefined;
  };
}

function checkMeasure(ctx: ValidationContext, query: Query, measure: Measure, field: string): void {
  const compute = measure.compute;
  if (!compute) {
    checkMeasureName(ctx, measure.name, `${field}.name`);
    return;
  }
  if (
    (compute.type === 'count' || compute.type === 'countDistinct' || compute.type === 'percentOfTotal') &&
    (findMeasure(ctx.view, measure.name) || resolveDimension(ctx.view, measure.name))
  ) {
    fail(`${field}.name`, `'${measure.name}' shadows a metrics view field`);
  }
  switch (compute.type) {
    case 'count':
      return;
    case 'countDistinct':
      checkDimensionName(ctx, compute.dimension, `${field}.compute.dimension`);
      return;
    case 'comparisonValue':
    case 'comparisonDelta':
    case 'comparisonRatio':
      checkMeasureName(ctx, compute.measure, `${field}.compute.measure`);
      if (!query.comparisonTimeRange) {
        fail(`${field}.compute`, `'${compute.type}' requires a comparisonTimeRange`);
      }
      return;
    case 'percentOfTotal': {
      checkMeasureName(ctx, compute.measure, `${field}.compute.measure`);
      if (!findMeasure(ctx.view, compute.measure)?.validPercentOfTotal) {
        fail(`${field}.compute`, `measure '${compute.measure}' does not support percent of total`);
      }
      if (query.rows) {
        fail(`${field}.compute`, 'percent of total is not available in rows mode');
      }
      return;
    }
  }
}

function checkTimeRange(ctx: ValidationContext, range: TimeRange, field: string): void {
  if (!ctx.view.timeDimension) {
    fail(field, `metrics view '${ctx.view.name}' has no time dimension`);
  }
  for (const key of ['start', 'end'] as const) {
    const value = range[key];
    if (value !== undefined && Number.isNaN(value.getTime())) {
      fail(`${field}.${key}`, 'invalid date');
    }
  }
  if (range.start && range.end && range.start.getTime() > range.end.getTime()) {
    fail(field, 'start must not be after end');
  }
  if (range.isoDuration !== undefined && range.isoDuration !== INFINITE_DURATION && !parseDuration(range.isoDuration)) {
    fail(`${field}.isoDuration`, `invalid ISO 8601 duration '${range.isoDuration}'`);
  }
  if (range.isoOffset !== undefined && !parseDuration(range.isoOffset)) {
    fail(`${field}.isoOffset`, `invalid ISO 8601 duration '${range.isoOffset}'`);
  }
  if (range.expression !== undefined && (range.isoDuration !== undefined || range.start || range.end)) {
    fail(`${field}.expression`, 'expression cannot be combined with start, end or isoDuration');
  }
}

function checkCount(value: number | undefined, field: string): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0) {
    fail(field, `must be a non-negative integer, got ${value}`);
  }
}

function validate(query: Query, ctx: ValidationContext): void {
  if (query.metricsView !== ctx.view.name) {
    fail('metricsView', `query targets '${query.metricsView}' but the view is '${ctx.view.name}'`);
  }
  if (query.rows) {
    if (query.dimensions.length > 0) fail('rows', 'rows mode cannot be combined with dimensions');
    if (query.measures.length > 0) fail('rows', 'rows mode cannot be combined with measures');
  }

  const outputs = new Set<string>();
  const claim = (name: string, field: string): void => {
    if (outputs.has(name)) fail(field, `duplicate output name '${name}'`);
    outputs.add(name);
  };

  query.dimensions.forEach((dim, i) => {
    const field = `dimensions[${i}]`;
    checkDimensionName(ctx, dim.name, `${field}.name`);
    if (dim.timeGrain && !isTimeDimension(ctx.view, dim.name)) {
      fail(`${field}.timeGrain`, `dimension '${dim.name}' is not a time dimension`);
    }
    claim(dim.name, `${field}.name`);
  });

  query.measures.forEach((measure, i) => {
    const field = `measures[${i}]`;
    checkMeasure(ctx, query, measure, field);
    claim(measure.name, `${field}.name`);
  });

  if (query.rows) {
    ctx.view.dimensions.filter(d => ctx.security.canAccessField(d.name)).forEach(d => outputs.add(d.name));
  }

  if (query.where) {
    checkExpression(ctx, query.where, 'where', dimensionScope(ctx), 'base');
  }

  if (query.having) {
    if (query.measures.length === 0) {
      fail('having', 'having requires at least one measure');
    }
    checkExpression(
      ctx,
      query.having,
      'having',
      name => (outputs.has(name) ? undefined : `'${name}' is not a requested dimension or measure`),
      'aggregate'
    );
  }

  query.sort.forEach((sort, i) => {
    if (!outputs.has(sort.name)) {
      fail(`sort[${i}].name`, `'${sort.name}' is not a requested dimension or measure`);
    }
  });

  checkCount(query.limit, 'limit');
  checkCount(query.offset, 'offset');

  if (query.timeRange) checkTimeRange(ctx, query.timeRange, 'timeRange');
  if (query.comparisonTimeRange) checkTimeRange(ctx, query.comparisonTimeRange, 'comparisonTimeRange');

  if (query.timeZone !== undefined && !isValidTimeZone(query.timeZone)) {
    fail('timeZone', `unknown time zone '${query.timeZone}'`);
  }

  const hasComparison = query.measures.some(m => m.compute && COMPARISON_COMPUTES.has(m.compute.type));
  if (hasComparison && query.rows) {
    fail('comparisonTimeRange', 'comparisons are not available in rows mode');
  }
  if (hasComparison) {
    query.dimensions.forEach((dim, i) => {
      if (dim.name === ctx.view.timeDimension) {
        fail(`dimensions[${i}].name`, 'comparisons cannot group by the time dimension');
      }
    });
  }
}

/**
 * Validate a query against a metrics view. Returns the first problem found,
 * or undefined when the query is valid.
 */
export function validateQuery(
  query: Query,
  view: MetricsView,
  security: SecurityPolicy = allowAllPolicy
): ValidationError | undefined {
  try {
    validate(query, { view, security });
    return undefined;
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
}
