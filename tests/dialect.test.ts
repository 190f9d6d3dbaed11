/**
 * Dialect capability tests
 */

import { describe, it, expect } from 'vitest';
import { getDialect, hasDialect, listDialects, registerDialect } from '../packages/dialect/registry.js';
import { DuckDBDialect } from '../packages/dialect/duckdb.js';
import { ClickHouseDialect } from '../packages/dialect/clickhouse.js';
import { DruidDialect } from '../packages/dialect/druid.js';
import { PostgresDialect } from '../packages/dialect/postgres.js';
import type { TruncateOptions } from '../packages/dialect/dialect.js';
import { UnsupportedFeatureError, ValidationError } from '../packages/compiler/errors.js';

const UTC: TruncateOptions = { timeZone: 'UTC', firstDayOfWeek: 1, firstMonthOfYear: 1 };

describe('registry', () => {
  it('lists the shipped dialects', () => {
    expect(listDialects()).toEqual(['clickhouse', 'druid', 'duckdb', 'postgres']);
  });

  it('looks names up case-insensitively', () => {
    expect(getDialect('DuckDB').name).toBe('duckdb');
    expect(hasDialect('Postgres')).toBe(true);
  });

  it('rejects unknown names', () => {
    expect(() => getDialect('oracle')).toThrow(ValidationError);
    expect(() => getDialect('oracle')).toThrow(
      "dialect: unknown dialect 'oracle' (available: clickhouse, druid, duckdb, postgres)"
    );
  });

  it('refuses to register a name twice', () => {
    expect(() => registerDialect(new DuckDBDialect())).toThrow("Dialect 'duckdb' is already registered");
  });
});

describe('escaping', () => {
  it('doubles quote characters in identifiers', () => {
    expect(new DuckDBDialect().escapeIdentifier('a"b')).toBe('"a""b"');
    expect(new ClickHouseDialect().escapeIdentifier('a`b')).toBe('`a``b`');
  });

  it('qualifies tables with database and schema', () => {
    const duckdb = new DuckDBDialect();
    expect(duckdb.escapeTable('events', 'analytics', 'public')).toBe('"analytics"."public"."events"');
    expect(duckdb.escapeTable('events', undefined, 'public')).toBe('"public"."events"');
  });

  it('escapes string values', () => {
    expect(new DuckDBDialect().escapeStringValue("it's")).toBe("'it''s'");
    expect(new ClickHouseDialect().escapeStringValue("it's")).toBe("'it\\'s'");
  });

  it('numbers placeholders only for postgres', () => {
    expect(new PostgresDialect().placeholder(3)).toBe('$3');
    expect(new DuckDBDialect().placeholder(3)).toBe('?');
  });
});

describe('dateTruncExpr', () => {
  describe('duckdb', () => {
    const duckdb = new DuckDBDialect();

    it('truncates directly in UTC with default conventions', () => {
      expect(duckdb.dateTruncExpr('"ts"', 'day', UTC)).toBe(`date_trunc('day', "ts")`);
      expect(duckdb.dateTruncExpr('"ts"', 'week', UTC)).toBe(`date_trunc('week', "ts")`);
    });

    it('shifts for weeks starting on Sunday', () => {
      expect(duckdb.dateTruncExpr('"ts"', 'week', { ...UTC, firstDayOfWeek: 7 })).toBe(
        `(date_trunc('week', ("ts" - INTERVAL '6 day')) + INTERVAL '6 day')`
      );
    });

    it('shifts for fiscal years and quarters', () => {
      expect(duckdb.dateTruncExpr('"ts"', 'year', { ...UTC, firstMonthOfYear: 4 })).toBe(
        `(date_trunc('year', ("ts" - INTERVAL '3 month')) + INTERVAL '3 month')`
      );
      expect(duckdb.dateTruncExpr('"ts"', 'quarter', { ...UTC, firstMonthOfYear: 2 })).toBe(
        `(date_trunc('quarter', ("ts" - INTERVAL '1 month')) + INTERVAL '1 month')`
      );
      // April starts a calendar quarter too
      expect(duckdb.dateTruncExpr('"ts"', 'quarter', { ...UTC, firstMonthOfYear: 4 })).toBe(
        `date_trunc('quarter', "ts")`
      );
    });

    it('converts to local time and back outside UTC', () => {
      expect(duckdb.dateTruncExpr('"ts"', 'day', { ...UTC, timeZone: 'America/New_York' })).toBe(
        `timezone('America/New_York', date_trunc('day', timezone('America/New_York', "ts")))`
      );
    });
  });

  it('uses AT TIME ZONE for postgres', () => {
    expect(new PostgresDialect().dateTruncExpr('"ts"', 'month', { ...UTC, timeZone: 'Europe/Berlin' })).toBe(
      `(date_trunc('month', ("ts" AT TIME ZONE 'Europe/Berlin')) AT TIME ZONE 'Europe/Berlin')`
    );
  });

  describe('druid', () => {
    const druid = new DruidDialect();

    it('floors to an ISO period', () => {
      expect(druid.dateTruncExpr('"ts"', 'day', UTC)).toBe(`TIME_FLOOR("ts", 'P1D', NULL, 'UTC')`);
      expect(druid.dateTruncExpr('"ts"', 'hour', { ...UTC, timeZone: 'Asia/Tokyo' })).toBe(
        `TIME_FLOOR("ts", 'PT1H', NULL, 'Asia/Tokyo')`
      );
    });

    it('shifts around the floor for other week starts', () => {
      expect(druid.dateTruncExpr('"ts"', 'week', { ...UTC, firstDayOfWeek: 7 })).toBe(
        `TIME_SHIFT(TIME_FLOOR(TIME_SHIFT("ts", 'P1D', -6, 'UTC'), 'P1W', NULL, 'UTC'), 'P1D', 6, 'UTC')`
      );
    });
  });

  describe('clickhouse', () => {
    const clickhouse = new ClickHouseDialect();

    it('uses the toStartOf family with the zone', () => {
      expect(clickhouse.dateTruncExpr('ts', 'hour', UTC)).toBe(`toStartOfHour(ts, 'UTC')`);
      expect(clickhouse.dateTruncExpr('ts', 'month', { ...UTC, timeZone: 'Europe/Berlin' })).toBe(
        `toDateTime(toStartOfMonth(ts, 'Europe/Berlin'), 'Europe/Berlin')`
      );
    });

    it('maps Monday and Sunday weeks to modes', () => {
      expect(clickhouse.dateTruncExpr('ts', 'week', UTC)).toBe(`toDateTime(toStartOfWeek(ts, 1, 'UTC'), 'UTC')`);
      expect(clickhouse.dateTruncExpr('ts', 'week', { ...UTC, firstDayOfWeek: 7 })).toBe(
        `toDateTime(toStartOfWeek(ts, 0, 'UTC'), 'UTC')`
      );
    });

    it('rejects weeks starting mid-week', () => {
      expect(() => clickhouse.dateTruncExpr('ts', 'week', { ...UTC, firstDayOfWeek: 3 })).toThrow(
        UnsupportedFeatureError
      );
    });

    it('shifts by months for fiscal years', () => {
      expect(clickhouse.dateTruncExpr('ts', 'year', { ...UTC, firstMonthOfYear: 4 })).toBe(
        `toDateTime(addMonths(toStartOfYear(addMonths(ts, -3), 'UTC'), 3), 'UTC')`
      );
    });
  });
});

describe('capabilities', () => {
  it('describes join support', () => {
    const druid = new DruidDialect();
    expect(druid.supportsJoin('left')).toBe(true);
    expect(druid.supportsJoin('full')).toBe(false);
    expect(druid.requiresAggregateForJoins).toBe(true);
    expect(new DuckDBDialect().supportsJoin('full')).toBe(true);
  });

  it('builds null-safe join conditions', () => {
    expect(new DuckDBDialect().joinOnExpression('a', 'b')).toBe('a IS NOT DISTINCT FROM b');
    expect(new ClickHouseDialect().joinOnExpression('a', 'b')).toBe('isNotDistinctFrom(a, b)');
    expect(new DruidDialect().joinOnExpression('a', 'b')).toBe('(a = b OR (a IS NULL AND b IS NULL))');
  });

  it('prints limit and offset', () => {
    const duckdb = new DuckDBDialect();
    expect(duckdb.limitClause(10, 0)).toBe('LIMIT 10');
    expect(duckdb.limitClause(10, 5)).toBe('LIMIT 10 OFFSET 5');
    expect(duckdb.limitClause(undefined, 5)).toBe('OFFSET 5');
    expect(duckdb.limitClause()).toBe('');
  });

  it('casts and divides per dialect', () => {
    expect(new PostgresDialect().castToDouble('x')).toBe('CAST(x AS DOUBLE PRECISION)');
    expect(new ClickHouseDialect().castToDouble('x')).toBe('CAST(x AS Float64)');
    expect(new DruidDialect().safeDivideExpr('a', 'b')).toBe('SAFE_DIVIDE(a, b)');
    expect(new DuckDBDialect().safeDivideExpr('a', 'b')).toBe('a / NULLIF(b, 0)');
  });

  it('has a default row cap only for druid', () => {
    expect(new DruidDialect().defaultRowCap).toBe(10000);
    expect(new DuckDBDialect().defaultRowCap).toBe(0);
  });
});
