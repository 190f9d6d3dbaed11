/**
 * Expression Translator
 *
 * Turns a filter Expression into a SQL fragment with positional arguments.
 * One SqlWriter is shared by every recursive call of a single translation;
 * it never outlives that call.
 */

import type { Dialect } from '../dialect/dialect.js';
import type {
  ConditionExpression,
  Expression,
  LiteralValue,
  Operator,
  SubqueryExpression,
} from '../query/ast.js';
import { isListLiteral } from '../query/ast.js';
import { CompileInvariantError, ValidationError } from './errors.js';
import { Sql } from './fragment.js';

// ---
// WRITER
// ---

/**
 * Accumulates SQL text and the arguments its placeholders bind
 */
export class SqlWriter {
  private readonly strings: string[] = [''];
  private readonly values: unknown[] = [];

  write(text: string): this {
    this.strings[this.strings.length - 1] += text;
    return this;
  }

  bind(value: unknown): this {
    this.values.push(value);
    this.strings.push('');
    return this;
  }

  append(fragment: Sql): this {
    this.write(fragment.strings[0] ?? '');
    fragment.values.forEach((value, i) => {
      this.bind(value);
      this.write(fragment.strings[i + 1] ?? '');
    });
    return this;
  }

  toSql(): Sql {
    return new Sql(this.strings, this.values);
  }
}

// ---
// SCOPE
// ---

export interface TranslationScope {
  readonly dialect: Dialect;
  /** SQL for a dimension or measure name in the current block */
  resolveName(name: string): Sql;
  /** SQL for a subquery filter; absent where subqueries are not allowed */
  subquery?(expr: SubqueryExpression): Sql;
}

const COMPARISON_SQL: Partial<Record<Operator, string>> = {
  eq: '=',
  neq: '!=',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
  like: 'LIKE',
  nlike: 'NOT LIKE',
};

// ---
// TRANSLATION
// ---

/**
 * Translate an expression. Structurally equal expressions always produce the
 * same text and arguments.
 */
export function translateExpression(expr: Expression, scope: TranslationScope): Sql {
  const writer = new SqlWriter();
  emitExpression(expr, scope, writer);
  return writer.toSql();
}

function emitExpression(expr: Expression, scope: TranslationScope, out: SqlWriter): void {
  switch (expr.type) {
    case 'name':
      out.append(scope.resolveName(expr.name));
      return;
    case 'value':
      emitValue(expr.value, out);
      return;
    case 'condition':
      emitCondition(expr, scope, out);
      return;
    case 'subquery':
      if (!scope.subquery) {
        throw new CompileInvariantError(`subquery on '${expr.dimension}' is not allowed in this position`);
      }
      out.append(scope.subquery(expr));
      return;
  }
}

function emitValue(value: LiteralValue, out: SqlWriter): void {
  if (isListLiteral(value)) {
    value.forEach((item, i) => {
      if (i > 0) out.write(', ');
      emitValue(item, out);
    });
    return;
  }
  out.bind(value);
}

/** Operands that are themselves comparisons get parentheses */
function emitOperand(expr: Expression, scope: TranslationScope, out: SqlWriter): void {
  const nested = expr.type === 'condition' && expr.op !== 'and' && expr.op !== 'or';
  if (nested) out.write('(');
  emitExpression(expr, scope, out);
  if (nested) out.write(')');
}

function isNullValue(expr: Expression | undefined): boolean {
  return expr?.type === 'value' && expr.value === null;
}

function operands(expr: ConditionExpression): [Expression, Expression] {
  const [left, right] = expr.exprs;
  if (!left || !right || expr.exprs.length !== 2) {
    throw new ValidationError('expression', `'${expr.op}' requires exactly 2 operands, got ${expr.exprs.length}`);
  }
  return [left, right];
}

function emitCondition(expr: ConditionExpression, scope: TranslationScope, out: SqlWriter): void {
  switch (expr.op) {
    case 'and':
    case 'or':
      emitLogical(expr, scope, out);
      return;
    case 'in':
    case 'nin':
      emitMembership(expr, scope, out);
      return;
    case 'ilike':
    case 'nilike':
      emitILike(expr, scope, out);
      return;
    case 'eq':
    case 'neq': {
      const [left, right] = operands(expr);
      if (isNullValue(right) || isNullValue(left)) {
        emitOperand(isNullValue(right) ? left : right, scope, out);
        out.write(expr.op === 'eq' ? ' IS NULL' : ' IS NOT NULL');
        return;
      }
      emitBinary(left, expr.op, right, scope, out);
      return;
    }
    default: {
      const [left, right] = operands(expr);
      emitBinary(left, expr.op, right, scope, out);
    }
  }
}

function emitBinary(
  left: Expression,
  op: Operator,
  right: Expression,
  scope: TranslationScope,
  out: SqlWriter
): void {
  const keyword = COMPARISON_SQL[op];
  if (!keyword) {
    throw new CompileInvariantError(`'${op}' is not a comparison operator`);
  }
  emitOperand(left, scope, out);
  out.write(` ${keyword} `);
  emitOperand(right, scope, out);
}

function emitLogical(expr: ConditionExpression, scope: TranslationScope, out: SqlWriter): void {
  if (expr.exprs.length === 0) {
    throw new ValidationError('expression', `'${expr.op}' requires at least one operand`);
  }
  const keyword = expr.op === 'and' ? ' AND ' : ' OR ';
  out.write('(');
  expr.exprs.forEach((child, i) => {
    if (i > 0) out.write(keyword);
    emitExpression(child, scope, out);
  });
  out.write(')');
}

function emitILike(expr: ConditionExpression, scope: TranslationScope, out: SqlWriter): void {
  const [left, right] = operands(expr);
  const negated = expr.op === 'nilike';
  if (scope.dialect.supportsILike) {
    emitOperand(left, scope, out);
    out.write(negated ? ' NOT ILIKE ' : ' ILIKE ');
    emitOperand(right, scope, out);
    return;
  }
  out.write('lower(');
  emitExpression(left, scope, out);
  out.write(negated ? ') NOT LIKE lower(' : ') LIKE lower(');
  emitExpression(right, scope, out);
  out.write(')');
}

/**
 * `x IN (?, ?)`. NULLs in the list cannot match through IN, so they become an
 * explicit IS NULL test; an empty list matches nothing.
 */
function emitMembership(expr: ConditionExpression, scope: TranslationScope, out: SqlWriter): void {
  const [left, right] = operands(expr);
  if (right.type !== 'value' || !isListLiteral(right.value)) {
    throw new ValidationError('expression', `'${expr.op}' requires a list value as its second operand`);
  }
  const negated = expr.op === 'nin';
  const values = right.value.filter(v => v !== null);
  const hasNull = values.length !== right.value.length;

  if (values.length === 0) {
    if (!hasNull) {
      out.write(negated ? 'TRUE' : 'FALSE');
      return;
    }
    emitOperand(left, scope, out);
    out.write(negated ? ' IS NOT NULL' : ' IS NULL');
    return;
  }

  if (hasNull) out.write('(');
  emitOperand(left, scope, out);
  out.write(negated ? ' NOT IN (' : ' IN (');
  emitValue(values, out);
  out.write(')');
  if (hasNull) {
    out.write(negated ? ' AND ' : ' OR ');
    emitOperand(left, scope, out);
    out.write(negated ? ' IS NOT NULL)' : ' IS NULL)');
  }
}
