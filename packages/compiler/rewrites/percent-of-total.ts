/**
 * Percent-of-total expansion
 *
 * Captures the grand total of each base measure by running a scalar
 * sub-query (same filters, time range and security policy, no dimensions)
 * through the executor. The builder then binds the total as an argument.
 */

import type { Measure, Query } from '../../query/ast.js';
import { CompileCancelledError, RewriteError } from '../errors.js';
import type { CompilationState, QueryPass } from './pass.js';

function isAbort(error: unknown, signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true || (error instanceof Error && error.name === 'AbortError');
}

export function totalsQuery(query: Query, measure: string): Query {
  return {
    metricsView: query.metricsView,
    dimensions: [],
    measures: [{ name: measure }],
    ...(query.where ? { where: query.where } : {}),
    ...(query.timeRange ? { timeRange: query.timeRange } : {}),
    ...(query.timeZone ? { timeZone: query.timeZone } : {}),
    sort: [],
  };
}

export const percentOfTotalPass: QueryPass = {
  name: 'percent-of-total',

  async run(query: Query, state: CompilationState): Promise<Query> {
    const pending = new Set<string>();
    for (const m of query.measures) {
      if (m.compute?.type === 'percentOfTotal' && m.compute.total === undefined) {
        pending.add(m.compute.measure);
      }
    }
    if (pending.size === 0) {
      return query;
    }

    const { executor, signal, priority, security } = state.context;
    if (!executor) {
      throw new RewriteError('percent-of-total', 'an executor is required to compute percent of total');
    }

    const totals = new Map<string, number | null>();
    for (const measure of pending) {
      if (signal?.aborted) {
        throw new CompileCancelledError('percent-of-total', signal.reason);
      }
      state.logger.debug('computing grand total', { measure, metricsView: query.metricsView });
      try {
        const total = await executor.executeScalar(totalsQuery(query, measure), {
          ...(signal ? { signal } : {}),
          ...(priority !== undefined ? { priority } : {}),
          ...(security ? { security } : {}),
        });
        totals.set(measure, total);
      } catch (error) {
        if (isAbort(error, signal)) {
          throw new CompileCancelledError('percent-of-total', error);
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new RewriteError('percent-of-total', `grand total for '${measure}' failed: ${message}`, {
          cause: error,
        });
      }
    }

    const measures = query.measures.map((m): Measure => {
      const compute = m.compute;
      if (compute?.type !== 'percentOfTotal' || compute.total !== undefined) {
        return m;
      }
      return { ...m, compute: { ...compute, total: totals.get(compute.measure) ?? null } };
    });
    return { ...query, measures };
  },
};
