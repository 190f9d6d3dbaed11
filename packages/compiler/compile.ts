/**
 * Compile pipeline
 *
 * validate → query passes → build → tree passes → dialect check → emit.
 * Each compilation works on its own copy of the query and its own plan tree;
 * nothing is shared between concurrent compilations except the read-only
 * metrics view and dialect.
 */

import type { Query } from '../query/ast.js';
import type { MetricsView } from '../query/metrics-view.js';
import { allowAllPolicy } from '../query/security.js';
import { validateQuery } from '../query/validate.js';
import { CompileInvariantError, isCompileError } from './errors.js';
import { renderSql } from './fragment.js';
import type { CompileContext, ResolvedCompilerOptions } from './options.js';
import type { PlanTree } from './plan.js';
import { buildPlan, checkDialectSupport } from './plan-builder.js';
import { QUERY_PASSES, TREE_PASSES, type CompilationState } from './rewrites/index.js';
import { emitPlan } from './sql-emitter.js';

export interface CompileResult {
  sql: string;
  /** positional arguments, in placeholder order */
  args: unknown[];
  /**
   * Row cap in effect when the query had no limit of its own. The statement
   * asks for cap + 1 rows; more than `cap` rows means the result was truncated.
   */
  cap?: number;
  /** the query after the rewrite passes */
  query: Query;
  plan: PlanTree;
}

async function runPipeline(
  input: Query,
  view: MetricsView,
  options: ResolvedCompilerOptions,
  context: CompileContext
): Promise<CompileResult> {
  const { dialect, logger } = options;
  const security = context.security ?? allowAllPolicy;

  let query: Query = structuredClone(input);

  const invalid = validateQuery(query, view, security);
  if (invalid) {
    logger.debug('query rejected', { field: invalid.field, error: invalid.message });
    throw invalid;
  }

  const state: CompilationState = {
    view,
    dialect,
    options,
    context,
    logger,
    calendar: {
      timeZone: query.timeZone ?? options.timeZone,
      firstDayOfWeek: view.firstDayOfWeek ?? options.firstDayOfWeek,
      firstMonthOfYear: view.firstMonthOfYear ?? options.firstMonthOfYear,
    },
    executionTime: context.executionTime ?? new Date(),
  };

  for (const pass of QUERY_PASSES) {
    logger.debug('running rewrite pass', { pass: pass.name });
    query = await pass.run(query, state);
  }

  let plan = buildPlan({ view, query, dialect, security, calendar: state.calendar });

  for (const pass of TREE_PASSES) {
    logger.debug('running rewrite pass', { pass: pass.name });
    plan = pass.run(plan, state);
  }

  checkDialectSupport(plan, dialect);

  const { sql, args } = renderSql(emitPlan(plan, dialect), dialect);
  logger.debug('compiled query', { metricsView: view.name, dialect: dialect.name, args: args.length });

  return {
    sql,
    args,
    ...(state.cap !== undefined ? { cap: state.cap } : {}),
    query,
    plan,
  };
}

/**
 * Compile a query against a metrics view. Rejects with a CompileError;
 * anything else escaping the pipeline is reported as an invariant violation.
 */
export async function compileQuery(
  query: Query,
  view: MetricsView,
  options: ResolvedCompilerOptions,
  context: CompileContext = {}
): Promise<CompileResult> {
  try {
    return await runPipeline(query, view, options, context);
  } catch (error) {
    if (isCompileError(error) && !(error instanceof CompileInvariantError)) {
      throw error;
    }
    const invariant =
      error instanceof CompileInvariantError
        ? error
        : new CompileInvariantError(error instanceof Error ? error.message : String(error), { cause: error });
    options.logger.error(invariant.message, {
      kind: 'invariant',
      metricsView: view.name,
      dialect: options.dialect.name,
    });
    throw invariant;
  }
}
