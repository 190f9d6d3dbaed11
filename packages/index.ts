/**
 * metrics-sql
 *
 * Compiles declarative metrics-view queries (dimensions, measures, filters,
 * time windows, sort, limits) into dialect-specific SQL with positional
 * arguments.
 *
 * @example
 * ```typescript
 * import { createCompiler, parseQuery, parseMetricsView } from 'metrics-sql';
 *
 * const compiler = createCompiler({ dialect: 'duckdb', rowCap: 10_000 });
 *
 * const { sql, args, cap } = await compiler.compile(
 *   parseQuery({
 *     metricsView: 'WebsiteAnalytics',
 *     dimensions: [{ name: 'country' }],
 *     measures: [{ name: 'total_views' }],
 *     timeRange: { isoDuration: 'P7D' },
 *     sort: [{ name: 'total_views', desc: true }],
 *   }),
 *   parseMetricsView(viewJson)
 * );
 * ```
 */

// query model
export * from './query/index.js';

// time
export * from './time/index.js';

// dialects
export * from './dialect/index.js';

// compiler
export * from './compiler/index.js';

// executor
export {
  createStatementScalarExecutor,
  scalarFromRows,
  withTimeout,
  ExecutionTimeoutError,
} from './executor/index.js';
export type {
  QueryExecutor,
  ScalarExecutionOptions,
  Statement,
  Row,
  StatementScalarExecutorOptions,
} from './executor/index.js';

// --- internal imports ---

import type { Query } from './query/ast.js';
import type { MetricsView } from './query/metrics-view.js';
import type { SecurityPolicy } from './query/security.js';
import { allowAllPolicy } from './query/security.js';
import { validateQuery } from './query/validate.js';
import type { Dialect } from './dialect/dialect.js';
import { compileQuery, type CompileResult } from './compiler/compile.js';
import type { ValidationError } from './compiler/errors.js';
import {
  resolveCompilerOptions,
  type CompileContext,
  type CompilerOptions,
  type ResolvedCompilerOptions,
} from './compiler/options.js';
import type { QueryExecutor } from './executor/index.js';
import { createStatementScalarExecutor, type Row, type Statement } from './executor/index.js';

/**
 * High-level API: one compiler per dialect configuration, shared by any
 * number of concurrent compilations.
 */
export class MetricsSqlCompiler {
  readonly options: ResolvedCompilerOptions;

  constructor(options: CompilerOptions = {}) {
    this.options = resolveCompilerOptions(options);
  }

  get dialect(): Dialect {
    return this.options.dialect;
  }

  /** check a query without compiling it */
  validate(query: Query, view: MetricsView, security: SecurityPolicy = allowAllPolicy): ValidationError | undefined {
    return validateQuery(query, view, security);
  }

  /** compile a query to SQL text and positional arguments */
  compile(query: Query, view: MetricsView, context: CompileContext = {}): Promise<CompileResult> {
    return compileQuery(query, view, this.options, context);
  }

  /**
   * Executor for percent-of-total sub-queries that compiles with this
   * compiler and runs statements through `run`
   */
  executorFor(
    view: MetricsView,
    run: (statement: Statement, signal: AbortSignal) => Promise<Row[]>,
    context: Omit<CompileContext, 'executor' | 'signal'> = {}
  ): QueryExecutor {
    return createStatementScalarExecutor({
      compile: (query, signal, security) =>
        this.compile(query, view, {
          ...context,
          ...(signal ? { signal } : {}),
          ...(security ? { security } : {}),
        }),
      run,
    });
  }
}

export function createCompiler(options: CompilerOptions = {}): MetricsSqlCompiler {
  return new MetricsSqlCompiler(options);
}
