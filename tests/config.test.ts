/**
 * Compiler options, environment configuration and logging
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { compilerOptionsFromEnv, resolveCompilerOptions } from '../packages/compiler/options.js';
import { createConsoleLogger, silentLogger } from '../packages/compiler/logger.js';
import { ValidationError, isUserError, CompileInvariantError, CapExceededError } from '../packages/compiler/errors.js';
import { PostgresDialect } from '../packages/dialect/postgres.js';

describe('resolveCompilerOptions', () => {
  it('applies defaults', () => {
    const resolved = resolveCompilerOptions({ logger: silentLogger });
    expect(resolved.dialect.name).toBe('duckdb');
    expect(resolved.rowCap).toBeUndefined();
    expect(resolved.allowApproximateComparisons).toBe(false);
    expect(resolved.timeZone).toBe('UTC');
    expect(resolved.firstDayOfWeek).toBe(1);
    expect(resolved.firstMonthOfYear).toBe(1);
    expect(resolved.logger).toBe(silentLogger);
  });

  it('accepts a dialect instance', () => {
    const dialect = new PostgresDialect();
    expect(resolveCompilerOptions({ dialect }).dialect).toBe(dialect);
  });

  it('rejects unknown dialects and zones', () => {
    expect(() => resolveCompilerOptions({ dialect: 'oracle' })).toThrow(ValidationError);
    expect(() => resolveCompilerOptions({ timeZone: 'Mars/Olympus_Mons' })).toThrow('timeZone: unknown time zone');
  });

  it('range-checks numeric options', () => {
    expect(() => resolveCompilerOptions({ rowCap: -1 })).toThrow(ValidationError);
    expect(() => resolveCompilerOptions({ firstDayOfWeek: 8 })).toThrow(ValidationError);
  });
});

describe('compilerOptionsFromEnv', () => {
  it('reads the variables that are set', () => {
    expect(
      compilerOptionsFromEnv({
        METRICS_SQL_DIALECT: 'postgres',
        METRICS_SQL_ROW_CAP: '500',
        METRICS_SQL_APPROXIMATE_COMPARISONS: '1',
        HOME: '/home/test',
      })
    ).toEqual({ dialect: 'postgres', rowCap: 500, allowApproximateComparisons: true });
  });

  it('returns nothing for an empty environment', () => {
    expect(compilerOptionsFromEnv({})).toEqual({});
  });

  it('names the bad variable', () => {
    expect(() => compilerOptionsFromEnv({ METRICS_SQL_ROW_CAP: 'lots' })).toThrow(ValidationError);
    expect(() => compilerOptionsFromEnv({ METRICS_SQL_APPROXIMATE_COMPARISONS: 'yes' })).toThrow(
      /^METRICS_SQL_APPROXIMATE_COMPARISONS: /
    );
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes JSON lines at or above its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createConsoleLogger({ level: 'warn', name: 'test' });

    logger.info('skipped');
    logger.warn('row cap applied', { cap: 10 });

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(warn.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: 'warn', logger: 'test', msg: 'row cap applied', cap: 10 });
  });
});

describe('error taxonomy', () => {
  it('separates user errors from defects', () => {
    expect(isUserError(new ValidationError('limit', 'must be a non-negative integer'))).toBe(true);
    expect(isUserError(new CapExceededError(20, 10))).toBe(true);
    expect(isUserError(new CompileInvariantError('plan tree has no root'))).toBe(false);
    expect(isUserError(new Error('plain'))).toBe(false);
  });

  it('prefixes validation messages with the field', () => {
    const error = new ValidationError('measures[1].name', "unknown measure 'x'");
    expect(error.message).toBe("measures[1].name: unknown measure 'x'");
    expect(error.code).toBe('validation');
  });
});
