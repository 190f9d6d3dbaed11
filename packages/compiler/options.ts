/**
 * Compiler configuration
 *
 * Process-level options are validated once when a compiler is created; the
 * per-compilation context carries what varies between requests.
 */

import { z } from 'zod';
import type { Dialect } from '../dialect/dialect.js';
import { getDialect } from '../dialect/registry.js';
import type { QueryExecutor } from '../executor/index.js';
import type { SecurityPolicy } from '../query/security.js';
import type { TimeAnchors } from '../time/time-expression-parser.js';
import { isValidTimeZone } from '../time/zoned.js';
import { ValidationError } from './errors.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';

function isDialect(value: unknown): value is Dialect {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'escapeIdentifier' in value &&
    typeof value.escapeIdentifier === 'function' &&
    'dateTruncExpr' in value &&
    typeof value.dateTruncExpr === 'function'
  );
}

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    (['debug', 'info', 'warn', 'error'] as const).every(
      level => level in value && typeof Reflect.get(value, level) === 'function'
    )
  );
}

export const compilerOptionsSchema = z
  .object({
    /** registered dialect name or a Dialect instance */
    dialect: z.union([z.string().min(1), z.custom<Dialect>(isDialect, 'expected a dialect')]).default('duckdb'),
    /** 0 = unlimited; defaults to the dialect's row cap */
    rowCap: z.number().int().nonnegative().optional(),
    allowApproximateComparisons: z.boolean().default(false),
    timeZone: z.string().refine(isValidTimeZone, 'unknown time zone').default('UTC'),
    firstDayOfWeek: z.number().int().min(1).max(7).default(1),
    firstMonthOfYear: z.number().int().min(1).max(12).default(1),
    logger: z.custom<Logger>(isLogger, 'expected a logger').optional(),
  })
  .strict();

export type CompilerOptions = z.input<typeof compilerOptionsSchema>;

export interface ResolvedCompilerOptions {
  readonly dialect: Dialect;
  /** configured row cap; undefined means use the dialect default */
  readonly rowCap?: number;
  readonly allowApproximateComparisons: boolean;
  readonly timeZone: string;
  readonly firstDayOfWeek: number;
  readonly firstMonthOfYear: number;
  readonly logger: Logger;
}

export function resolveCompilerOptions(options: CompilerOptions = {}): ResolvedCompilerOptions {
  const result = compilerOptionsSchema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'options';
    throw new ValidationError(field, issue?.message ?? result.error.message);
  }
  const parsed = result.data;
  return {
    dialect: typeof parsed.dialect === 'string' ? getDialect(parsed.dialect) : parsed.dialect,
    rowCap: parsed.rowCap,
    allowApproximateComparisons: parsed.allowApproximateComparisons,
    timeZone: parsed.timeZone,
    firstDayOfWeek: parsed.firstDayOfWeek,
    firstMonthOfYear: parsed.firstMonthOfYear,
    logger: parsed.logger ?? createConsoleLogger({ level: 'warn' }),
  };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  METRICS_SQL_DIALECT: z.string().min(1).optional(),
  METRICS_SQL_ROW_CAP: z.coerce.number().int().nonnegative().optional(),
  METRICS_SQL_APPROXIMATE_COMPARISONS: booleanFlag.optional(),
  METRICS_SQL_TIME_ZONE: z.string().min(1).optional(),
});

/**
 * Compiler options from METRICS_SQL_* environment variables. Only variables
 * that are set appear in the result.
 */
export function compilerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): CompilerOptions {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(String(issue?.path[0] ?? 'env'), issue?.message ?? result.error.message);
  }
  const vars = result.data;
  return {
    ...(vars.METRICS_SQL_DIALECT !== undefined ? { dialect: vars.METRICS_SQL_DIALECT } : {}),
    ...(vars.METRICS_SQL_ROW_CAP !== undefined ? { rowCap: vars.METRICS_SQL_ROW_CAP } : {}),
    ...(vars.METRICS_SQL_APPROXIMATE_COMPARISONS !== undefined
      ? { allowApproximateComparisons: vars.METRICS_SQL_APPROXIMATE_COMPARISONS }
      : {}),
    ...(vars.METRICS_SQL_TIME_ZONE !== undefined ? { timeZone: vars.METRICS_SQL_TIME_ZONE } : {}),
  };
}

/**
 * Everything that varies between compilations
 */
export interface CompileContext {
  /** anchor for relative time ranges; defaults to the current time */
  executionTime?: Date;
  /** cancels the compilation, including the percent-of-total sub-query */
  signal?: AbortSignal;
  /** data bounds for `earliest`, `latest` and `watermark` in time expressions */
  timeAnchors?: Omit<TimeAnchors, 'now'>;
  /** runs the percent-of-total sub-query */
  executor?: QueryExecutor;
  security?: SecurityPolicy;
  /** forwarded to the executor */
  priority?: number;
}
