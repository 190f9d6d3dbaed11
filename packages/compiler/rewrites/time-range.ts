/**
 * Time-range resolution: relative ranges become absolute [start, end) pairs
 * anchored at the execution time.
 */

import type { Query } from '../../query/ast.js';
import { isRelativeTimeRange } from '../../query/ast.js';
import { resolveComparisonTimeRange, resolveTimeRange, type TimeResolutionContext } from '../../time/resolve.js';
import { TimeExpressionError } from '../../time/time-expression-parser.js';
import { RewriteError } from '../errors.js';
import type { CompilationState, QueryPass } from './pass.js';

function resolveRanges(query: Query, context: TimeResolutionContext): Query {
  const timeRange = query.timeRange && resolveTimeRange(query.timeRange, context);
  const comparisonTimeRange =
    query.comparisonTimeRange && resolveComparisonTimeRange(query.comparisonTimeRange, timeRange, context);
  return { ...query, timeRange, comparisonTimeRange };
}

export const timeRangePass: QueryPass = {
  name: 'time-range',

  run(query: Query, state: CompilationState): Query {
    const relative = [query.timeRange, query.comparisonTimeRange].some(r => r !== undefined && isRelativeTimeRange(r));
    if (!relative) {
      return query;
    }
    try {
      return resolveRanges(query, {
        executionTime: state.executionTime,
        calendar: state.calendar,
        ...(state.context.timeAnchors ? { anchors: state.context.timeAnchors } : {}),
      });
    } catch (error) {
      if (error instanceof TimeExpressionError) {
        throw new RewriteError('time-range', error.message, { cause: error });
      }
      throw error;
    }
  },
};
