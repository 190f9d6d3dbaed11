/**
 * Execution collaborator
 *
 * The compiler never talks to a database. The percent-of-total rewrite hands
 * a scalar sub-query to a QueryExecutor supplied by the caller; this module
 * defines that contract and adapts a plain statement runner to it.
 */

import type { Query } from '../query/ast.js';
import type { SecurityPolicy } from '../query/security.js';

// ---
// CONTRACT
// ---

export interface ScalarExecutionOptions {
  /** scheduling hint passed through to the database client */
  priority?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** policy of the compilation asking for the value; its row filter applies here too */
  security?: SecurityPolicy;
}

export interface QueryExecutor {
  /**
   * Run a query expected to return one row with one numeric column.
   * Resolves null when the aggregate is NULL (e.g. no matching rows).
   */
  executeScalar(query: Query, options?: ScalarExecutionOptions): Promise<number | null>;
}

// ---
// STATEMENT ADAPTER
// ---

export interface Statement {
  sql: string;
  args: readonly unknown[];
  priority?: number;
}

export type Row = Record<string, unknown>;

export interface StatementScalarExecutorOptions {
  /** turn the sub-query into SQL, typically a compiler bound to a metrics view */
  compile(
    query: Query,
    signal?: AbortSignal,
    security?: SecurityPolicy
  ): Promise<{ sql: string; args: readonly unknown[] }>;
  /** run a statement and return all rows */
  run(statement: Statement, signal: AbortSignal): Promise<Row[]>;
  defaultTimeoutMs?: number;
}

export class ExecutionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Query timed out after ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

/**
 * Combine a caller's signal with an optional timeout into one signal
 */
export function withTimeout(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(signal?.reason);

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new ExecutionTimeoutError(timeoutMs)), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Read the single value of a one-row, one-column result
 */
export function scalarFromRows(rows: readonly Row[]): number | null {
  if (rows.length === 0) return null;
  if (rows.length > 1) {
    throw new Error(`Expected a single row, got ${rows.length}`);
  }
  const values = Object.values(rows[0] ?? {});
  if (values.length !== 1) {
    throw new Error(`Expected a single column, got ${values.length}`);
  }
  const value = values[0];
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  throw new Error(`Expected a numeric value, got ${typeof value}`);
}

/**
 * QueryExecutor that compiles the sub-query and runs it through a statement
 * runner (a database client wrapper).
 */
export function createStatementScalarExecutor(options: StatementScalarExecutorOptions): QueryExecutor {
  return {
    async executeScalar(query, execOptions = {}) {
      const { signal, dispose } = withTimeout(
        execOptions.signal,
        execOptions.timeoutMs ?? options.defaultTimeoutMs
      );
      try {
        const compiled = await options.compile(query, signal, execOptions.security);
        const rows = await options.run(
          {
            sql: compiled.sql,
            args: compiled.args,
            ...(execOptions.priority !== undefined ? { priority: execOptions.priority } : {}),
          },
          signal
        );
        return scalarFromRows(rows);
      } finally {
        dispose();
      }
    },
  };
}
