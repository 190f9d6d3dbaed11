/**
 * Rewrite pass contracts
 *
 * Query passes run before the plan builder and may be async (percent of total
 * waits on the executor). Tree passes run on the built plan.
 */

import type { Dialect, TruncateOptions } from '../../dialect/dialect.js';
import type { Query } from '../../query/ast.js';
import type { MetricsView } from '../../query/metrics-view.js';
import type { RewritePassName } from '../errors.js';
import type { Logger } from '../logger.js';
import type { CompileContext, ResolvedCompilerOptions } from '../options.js';
import type { PlanTree } from '../plan.js';

/**
 * State shared by the passes of one compilation
 */
export interface CompilationState {
  readonly view: MetricsView;
  readonly dialect: Dialect;
  readonly options: ResolvedCompilerOptions;
  readonly context: CompileContext;
  readonly logger: Logger;
  /** zone and week/year conventions for this query */
  readonly calendar: TruncateOptions;
  readonly executionTime: Date;
  /** row cap in effect, recorded by the row-cap pass */
  cap?: number;
}

export interface QueryPass {
  readonly name: RewritePassName;
  run(query: Query, state: CompilationState): Query | Promise<Query>;
}

export interface TreePass {
  readonly name: RewritePassName;
  run(tree: PlanTree, state: CompilationState): PlanTree;
}
