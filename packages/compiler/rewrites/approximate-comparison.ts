/**
 * Approximate-comparison join selection
 *
 * Replaces the full join between the current and comparison periods with a
 * one-sided join anchored on the period the result is sorted by. Rows present
 * only in the other period are dropped, so this runs only when both the
 * compiler options and the dialect allow it.
 *
 * When every sort field lives in the anchor side, its ORDER BY and LIMIT are
 * pushed into the anchor so the join only sees the top rows. A filter on the
 * joined rows (the query's having) must see every row, so it blocks the
 * pushdown.
 */

import type { JoinKind } from '../../dialect/dialect.js';
import { raw } from '../fragment.js';
import { COMPARISON_ALIAS, CURRENT_ALIAS, comparisonDimensionSql } from '../plan-builder.js';
import type { FieldOrigin, OrderField, PlanTree, SelectBlock } from '../plan.js';
import { RewriteError } from '../errors.js';
import type { CompilationState, TreePass } from './pass.js';

type Anchor = Exclude<FieldOrigin, 'both'>;

/**
 * Side the first sort field reads; undefined when it needs both sides
 */
function chooseAnchor(root: SelectBlock): Anchor | undefined {
  const first = root.orderBy[0];
  if (!first) return 'current';
  const measure = root.measures.find(m => m.name === first.name);
  if (!measure) return 'current';
  switch (measure.origin) {
    case 'comparison':
      return 'comparison';
    case 'both':
      return undefined;
    default:
      return 'current';
  }
}

/**
 * Sort fields translated to the anchor block's columns, or undefined when
 * some field is not available there
 */
function anchorOrder(root: SelectBlock, anchor: Anchor): OrderField[] | undefined {
  const order: OrderField[] = [];
  for (const field of root.orderBy) {
    if (root.dimensions.some(d => d.name === field.name)) {
      order.push(field);
      continue;
    }
    const measure = root.measures.find(m => m.name === field.name);
    if (!measure || measure.origin !== anchor || measure.sourceColumn === undefined) {
      return undefined;
    }
    order.push({ name: measure.sourceColumn, desc: field.desc });
  }
  return order;
}

export const approximateComparisonPass: TreePass = {
  name: 'approximate-comparison',

  run(tree: PlanTree, state: CompilationState): PlanTree {
    const { dialect, options, logger } = state;
    if (!options.allowApproximateComparisons || !dialect.supportsApproximateComparisons) {
      return tree;
    }

    const root = tree.root;
    const join = root.joins.find(j => j.alias === COMPARISON_ALIAS);
    if (!join || join.kind !== 'full' || root.from.kind !== 'block' || root.from.alias !== CURRENT_ALIAS) {
      return tree;
    }

    const anchor = chooseAnchor(root);
    if (!anchor) {
      logger.debug('approximate comparison skipped: sorted by a value of both periods');
      return tree;
    }

    const kind: JoinKind = anchor === 'current' ? 'left' : 'right';
    if (!dialect.supportsJoin(kind)) {
      throw new RewriteError(
        'approximate-comparison',
        `the ${dialect.name} dialect cannot execute the ${kind} join an approximate comparison needs`
      );
    }

    join.kind = kind;
    for (const dim of root.dimensions) {
      dim.expr = raw(comparisonDimensionSql(dialect, dim.name, kind));
    }

    const order = anchorOrder(root, anchor);
    const filtered = root.where !== undefined || root.having !== undefined;
    const pushdown = order !== undefined && order.length > 0 && root.limit !== undefined && !filtered;
    if (pushdown) {
      const target = tree.get(anchor === 'current' ? CURRENT_ALIAS : COMPARISON_ALIAS);
      target.orderBy = order;
      target.limit = (root.limit ?? 0) + (root.offset ?? 0);
    }

    logger.debug('approximate comparison applied', { join: kind, pushdown });
    return tree;
  },
};
