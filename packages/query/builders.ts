/**
 * Expression builders for constructing filters in code.
 *
 * @example
 * ```typescript
 * const where = and(eq(name('country'), value('UK')), gt(name('views'), value(10)));
 * ```
 */

import type {
  ConditionExpression,
  Expression,
  LiteralValue,
  NameExpression,
  Operator,
  SubqueryExpression,
  ValueExpression,
} from './ast.js';

export function name(fieldName: string): NameExpression {
  return { type: 'name', name: fieldName };
}

export function value(literal: LiteralValue): ValueExpression {
  return { type: 'value', value: literal };
}

export function condition(op: Operator, ...exprs: Expression[]): ConditionExpression {
  return { type: 'condition', op, exprs };
}

export const eq = (left: Expression, right: Expression) => condition('eq', left, right);
export const neq = (left: Expression, right: Expression) => condition('neq', left, right);
export const lt = (left: Expression, right: Expression) => condition('lt', left, right);
export const lte = (left: Expression, right: Expression) => condition('lte', left, right);
export const gt = (left: Expression, right: Expression) => condition('gt', left, right);
export const gte = (left: Expression, right: Expression) => condition('gte', left, right);
export const like = (left: Expression, right: Expression) => condition('like', left, right);
export const ilike = (left: Expression, right: Expression) => condition('ilike', left, right);

export function inList(left: Expression, values: readonly LiteralValue[]): ConditionExpression {
  return condition('in', left, value(values));
}

export function notInList(left: Expression, values: readonly LiteralValue[]): ConditionExpression {
  return condition('nin', left, value(values));
}

export function and(...exprs: Expression[]): ConditionExpression {
  return condition('and', ...exprs);
}

export function or(...exprs: Expression[]): ConditionExpression {
  return condition('or', ...exprs);
}

export function subquery(
  dimension: string,
  measures: string[],
  filters: { where?: Expression; having?: Expression } = {}
): SubqueryExpression {
  return { type: 'subquery', dimension, measures, ...filters };
}

/**
 * AND together the expressions that are present. Returns undefined when none
 * are, the expression itself when only one is.
 */
export function andAll(...exprs: Array<Expression | undefined>): Expression | undefined {
  const present = exprs.filter((e): e is Expression => e !== undefined);
  if (present.length === 0) return undefined;
  if (present.length === 1) return present[0];
  return and(...present);
}
