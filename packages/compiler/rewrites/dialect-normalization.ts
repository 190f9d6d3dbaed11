/**
 * Dialect-specific normalization
 *
 * Some backends reject or mis-evaluate a select over joins without explicit
 * aggregation. For those, every block with join children is grouped and its
 * measures are wrapped in the dialect's first-value aggregate.
 */

import { wrapSql } from '../fragment.js';
import type { PlanTree } from '../plan.js';
import type { CompilationState, TreePass } from './pass.js';

export const dialectNormalizationPass: TreePass = {
  name: 'dialect-normalization',

  run(tree: PlanTree, state: CompilationState): PlanTree {
    const { dialect } = state;
    if (!dialect.requiresAggregateForJoins) {
      return tree;
    }
    for (const block of tree.all()) {
      // already grouped blocks aggregate their measures themselves
      if (block.joins.length === 0 || block.groupBy) continue;
      block.groupBy = true;
      for (const measure of block.measures) {
        measure.expr = wrapSql(measure.expr, inner => dialect.anyValueExpr(inner));
      }
      state.logger.debug('grouped join block', { block: block.alias, dialect: dialect.name });
    }
    return tree;
  },
};
