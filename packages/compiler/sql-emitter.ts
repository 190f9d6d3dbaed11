/**
 * SQL Emitter
 *
 * Prints a plan tree depth-first. Each block becomes
 * `SELECT … FROM … [JOIN …] [WHERE …] [GROUP BY …] [HAVING …] [ORDER BY …] [LIMIT …]`;
 * child blocks become parenthesized, aliased derived tables.
 */

import type { Dialect } from '../dialect/dialect.js';
import { CompileInvariantError } from './errors.js';
import { empty, joinSql, raw, sql, type Sql } from './fragment.js';
import type { DataSource, PlanTree, SelectBlock } from './plan.js';

function derivedTable(tree: PlanTree, alias: string, dialect: Dialect): Sql {
  return sql`(${emitBlock(tree, alias, dialect)}) AS ${raw(dialect.escapeIdentifier(alias))}`;
}

function source(tree: PlanTree, from: DataSource, dialect: Dialect): Sql {
  return from.kind === 'table' ? raw(from.table) : derivedTable(tree, from.alias, dialect);
}

function groupByClause(block: SelectBlock, dialect: Dialect): Sql | undefined {
  if (!block.groupBy || block.dimensions.length === 0) return undefined;
  if (dialect.groupByOrdinals) {
    return raw(`GROUP BY ${block.dimensions.map((_, i) => i + 1).join(', ')}`);
  }
  return sql`GROUP BY ${joinSql(block.dimensions.map(d => d.expr))}`;
}

export function emitBlock(tree: PlanTree, alias: string, dialect: Dialect): Sql {
  const block = tree.get(alias);
  const fields = [...block.dimensions, ...block.measures];
  if (fields.length === 0) {
    throw new CompileInvariantError(`block '${alias}' selects no fields`);
  }

  const parts: Sql[] = [
    sql`SELECT ${joinSql(fields.map(f => sql`${f.expr} AS ${raw(dialect.escapeIdentifier(f.name))}`))}`,
    sql`FROM ${source(tree, block.from, dialect)}`,
  ];

  for (const join of block.joins) {
    parts.push(
      sql`${raw(dialect.joinKeyword(join.kind))} ${derivedTable(tree, join.alias, dialect)}${join.on ? sql` ON ${join.on}` : empty}`
    );
  }

  if (block.where) parts.push(sql`WHERE ${block.where}`);

  const groupBy = groupByClause(block, dialect);
  if (groupBy) parts.push(groupBy);

  if (block.having) parts.push(sql`HAVING ${block.having}`);

  if (block.orderBy.length > 0) {
    const order = block.orderBy.map(o => `${dialect.escapeIdentifier(o.name)} ${o.desc ? 'DESC' : 'ASC'}`);
    parts.push(raw(`ORDER BY ${order.join(', ')}`));
  }

  const limit = dialect.limitClause(block.limit, block.offset);
  if (limit) parts.push(raw(limit));

  return joinSql(parts, ' ');
}

/**
 * Emit the whole tree starting at its root
 */
export function emitPlan(tree: PlanTree, dialect: Dialect): Sql {
  return emitBlock(tree, tree.root.alias, dialect);
}
