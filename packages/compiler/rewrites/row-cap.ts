/**
 * Row-cap enforcement
 *
 * With cap C, a query without a limit asks for C+1 rows so the caller can
 * tell a truncated result (more than C rows) from a complete one. A limit
 * above C is rejected before anything is built.
 */

import type { Query } from '../../query/ast.js';
import { CapExceededError } from '../errors.js';
import type { CompilationState, QueryPass } from './pass.js';

export const rowCapPass: QueryPass = {
  name: 'row-cap',

  run(query: Query, state: CompilationState): Query {
    const cap = state.options.rowCap ?? state.dialect.defaultRowCap;
    if (cap <= 0) {
      return query;
    }
    if (query.limit === undefined) {
      state.cap = cap;
      state.logger.info('row cap applied', { cap, limit: cap + 1, metricsView: query.metricsView });
      return { ...query, limit: cap + 1 };
    }
    if (query.limit > cap) {
      throw new CapExceededError(query.limit, cap);
    }
    return query;
  },
};

/**
 * Whether a result of `rowCount` rows was cut off by the cap
 */
export function isTruncated(rowCount: number, cap: number | undefined): boolean {
  return cap !== undefined && cap > 0 && rowCount > cap;
}
