/**
 * compiler package
 *
 * query -> rewrite passes -> plan tree -> SQL with positional arguments
 */

export {
  CompileError,
  ValidationError,
  RewriteError,
  CapExceededError,
  CompileCancelledError,
  UnsupportedFeatureError,
  CompileInvariantError,
  isCompileError,
  isUserError,
} from './errors.js';
export type { CompileErrorCode, RewritePassName } from './errors.js';

export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LogFields } from './logger.js';

export { compilerOptionsSchema, resolveCompilerOptions, compilerOptionsFromEnv } from './options.js';
export type { CompilerOptions, ResolvedCompilerOptions, CompileContext } from './options.js';

export { sql, raw, empty, joinSql, wrapSql, renderSql, Sql } from './fragment.js';
export type { RenderedSql } from './fragment.js';

export { PlanTree, printPlanTree } from './plan.js';
export type { SelectBlock, FieldNode, FieldOrigin, DataSource, JoinNode, OrderField } from './plan.js';

export { translateExpression, SqlWriter } from './expression-translator.js';
export type { TranslationScope } from './expression-translator.js';

export {
  buildPlan,
  checkDialectSupport,
  comparisonDimensionSql,
  ROOT_ALIAS,
  CURRENT_ALIAS,
  COMPARISON_ALIAS,
} from './plan-builder.js';
export type { BuildInput } from './plan-builder.js';

export { emitBlock, emitPlan } from './sql-emitter.js';

export {
  QUERY_PASSES,
  TREE_PASSES,
  timeRangePass,
  rowCapPass,
  percentOfTotalPass,
  approximateComparisonPass,
  dialectNormalizationPass,
  totalsQuery,
  isTruncated,
} from './rewrites/index.js';
export type { CompilationState, QueryPass, TreePass } from './rewrites/index.js';

export { compileQuery } from './compile.js';
export type { CompileResult } from './compile.js';
