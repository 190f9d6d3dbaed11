/**
 * SQL fragments
 *
 * Every piece of generated SQL is a sql-template-tag `Sql` value, so literal
 * arguments travel with the text they belong to and stay in placeholder order
 * however fragments are nested.
 */

import sql, { Sql, empty, join, raw } from 'sql-template-tag';
import type { Dialect } from '../dialect/dialect.js';

export { sql, Sql, empty, raw };

/**
 * join() that tolerates an empty list
 */
export function joinSql(fragments: readonly Sql[], separator = ', '): Sql {
  if (fragments.length === 0) return empty;
  return join(fragments, separator);
}

export function isEmptySql(fragment: Sql): boolean {
  return fragment.values.length === 0 && fragment.strings.every(s => s === '');
}

const HOLE = '\u0000';

/**
 * Wrap a fragment with a string-level generator such as a dialect's
 * `anyValueExpr`, keeping the fragment's arguments.
 */
export function wrapSql(fragment: Sql, wrap: (inner: string) => string): Sql {
  const template = wrap(HOLE);
  const at = template.indexOf(HOLE);
  if (at < 0 || template.indexOf(HOLE, at + 1) >= 0) {
    throw new Error('wrapSql expects the generator to use its argument exactly once');
  }
  return new Sql([template.slice(0, at), template.slice(at + HOLE.length)], [fragment]);
}

export interface RenderedSql {
  sql: string;
  args: unknown[];
}

/**
 * Print a fragment with the dialect's placeholders, numbered from 1
 */
export function renderSql(fragment: Sql, dialect: Dialect): RenderedSql {
  const text = fragment.strings.reduce((out, part, i) => out + dialect.placeholder(i) + part);
  return { sql: text, args: [...fragment.values] };
}
