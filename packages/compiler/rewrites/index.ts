/**
 * Rewrite pipeline order. Query passes run before the plan builder, tree
 * passes after it; the first failure aborts the compilation.
 */

import { approximateComparisonPass } from './approximate-comparison.js';
import { dialectNormalizationPass } from './dialect-normalization.js';
import type { QueryPass, TreePass } from './pass.js';
import { percentOfTotalPass } from './percent-of-total.js';
import { rowCapPass } from './row-cap.js';
import { timeRangePass } from './time-range.js';

export const QUERY_PASSES: readonly QueryPass[] = [timeRangePass, rowCapPass, percentOfTotalPass];

export const TREE_PASSES: readonly TreePass[] = [approximateComparisonPass, dialectNormalizationPass];

export type { CompilationState, QueryPass, TreePass } from './pass.js';
export { timeRangePass } from './time-range.js';
export { rowCapPass, isTruncated } from './row-cap.js';
export { percentOfTotalPass, totalsQuery } from './percent-of-total.js';
export { approximateComparisonPass } from './approximate-comparison.js';
export { dialectNormalizationPass } from './dialect-normalization.js';
