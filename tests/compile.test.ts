/**
 * End-to-end compilation tests: query in, SQL text and arguments out
 */

import { describe, it, expect, vi } from 'vitest';
import { compileQuery } from '../packages/compiler/compile.js';
import {
  CompileInvariantError,
  UnsupportedFeatureError,
  ValidationError,
  RewriteError,
} from '../packages/compiler/errors.js';
import { printPlanTree } from '../packages/compiler/plan.js';
import { DuckDBDialect } from '../packages/dialect/duckdb.js';
import type { TimeGrain } from '../packages/time/grain.js';
import type { TruncateOptions } from '../packages/dialect/dialect.js';
import { restrictToFields } from '../packages/query/security.js';
import { eq, gt, inList, name, subquery, value } from '../packages/query/builders.js';
import { EXECUTION_TIME, WEEK_1, WEEK_2, options, query, websiteAnalytics } from './fixtures/views.js';

const TOP_COUNTRIES = query({
  dimensions: [{ name: 'country' }],
  measures: [{ name: 'total_views' }],
  timeRange: WEEK_1,
  sort: [{ name: 'total_views', desc: true }],
  limit: 10,
});

describe('compileQuery', () => {
  describe('aggregations', () => {
    it('compiles a grouped, filtered, sorted query', async () => {
      const result = await compileQuery(TOP_COUNTRIES, websiteAnalytics, options());
      expect(result.sql).toBe(
        'SELECT "country" AS "country", SUM(views) AS "total_views" FROM "website_analytics" ' +
          'WHERE "timestamp" >= ? AND "timestamp" < ? GROUP BY "country" ORDER BY "total_views" DESC LIMIT 10'
      );
      expect(result.args).toEqual([WEEK_1.start, WEEK_1.end]);
      expect(result.cap).toBeUndefined();
    });

    it('numbers placeholders and groups by ordinal on postgres', async () => {
      const result = await compileQuery(TOP_COUNTRIES, websiteAnalytics, options({ dialect: 'postgres' }));
      expect(result.sql).toBe(
        'SELECT "country" AS "country", SUM(views) AS "total_views" FROM "website_analytics" ' +
          'WHERE "timestamp" >= $1 AND "timestamp" < $2 GROUP BY 1 ORDER BY "total_views" DESC LIMIT 10'
      );
    });

    it('quotes with backticks on clickhouse', async () => {
      const result = await compileQuery(
        query({ dimensions: [{ name: 'country' }], measures: [{ name: 'total_views' }] }),
        websiteAnalytics,
        options({ dialect: 'clickhouse' })
      );
      expect(result.sql).toBe(
        'SELECT `country` AS `country`, SUM(views) AS `total_views` FROM `website_analytics` GROUP BY `country`'
      );
      expect(result.args).toEqual([]);
    });

    it('compiles a totals query without grouping', async () => {
      const result = await compileQuery(query({ measures: [{ name: 'total_views' }] }), websiteAnalytics, options());
      expect(result.sql).toBe('SELECT SUM(views) AS "total_views" FROM "website_analytics"');
    });

    it('uses dimension expressions and counts', async () => {
      const result = await compileQuery(
        query({
          dimensions: [{ name: 'device' }],
          measures: [
            { name: 'events', compute: { type: 'count' } },
            { name: 'cities', compute: { type: 'countDistinct', dimension: 'city' } },
          ],
          where: inList(name('country'), ['UK', 'FR']),
          offset: 20,
          limit: 10,
        }),
        websiteAnalytics,
        options()
      );
      expect(result.sql).toBe(
        'SELECT (lower(device_type)) AS "device", COUNT(*) AS "events", COUNT(DISTINCT "city") AS "cities" ' +
          'FROM "website_analytics" WHERE "country" IN (?, ?) GROUP BY (lower(device_type)) LIMIT 10 OFFSET 20'
      );
      expect(result.args).toEqual(['UK', 'FR']);
    });

    it('applies having to an aggregating block', async () => {
      const result = await compileQuery(
        query({
          dimensions: [{ name: 'country' }],
          measures: [{ name: 'total_views' }],
          having: gt(name('total_views'), value(1000)),
        }),
        websiteAnalytics,
        options()
      );
      expect(result.sql).toBe(
        'SELECT "country" AS "country", SUM(views) AS "total_views" FROM "website_analytics" ' +
          'GROUP BY "country" HAVING SUM(views) > ?'
      );
      expect(result.args).toEqual([1000]);
    });

    it('truncates time dimensions in the query zone', async () => {
      const result = await compileQuery(
        query({
          dimensions: [{ name: 'timestamp', timeGrain: 'day' }],
          measures: [{ name: 'total_views' }],
          timeZone: 'America/New_York',
        }),
        websiteAnalytics,
        options()
      );
      const day = `timezone('America/New_York', date_trunc('day', timezone('America/New_York', "timestamp")))`;
      expect(result.sql).toBe(
        `SELECT ${day} AS "timestamp", SUM(views) AS "total_views" FROM "website_analytics" GROUP BY ${day}`
      );
    });

    it('takes week conventions from the metrics view', async () => {
      const result = await compileQuery(
        query({ dimensions: [{ name: 'timestamp', timeGrain: 'week' }], measures: [{ name: 'total_views' }] }),
        { ...websiteAnalytics, firstDayOfWeek: 7 },
        options()
      );
      expect(result.sql).toContain(`(date_trunc('week', ("timestamp" - INTERVAL '6 day')) + INTERVAL '6 day') AS "timestamp"`);
    });
  });

  describe('derived measures', () => {
    const derived = query({ dimensions: [{ name: 'country' }], measures: [{ name: 'views_per_user' }] });
    const inner =
      'SELECT "country" AS "country", SUM(views) AS "total_views", COUNT(DISTINCT user_id) AS "total_users" ' +
      'FROM "website_analytics" GROUP BY "country"';

    it('computes a derived measure one level above its inputs', async () => {
      const result = await compileQuery(derived, websiteAnalytics, options());
      expect(result.sql).toBe(
        `SELECT "country" AS "country", total_views / total_users AS "views_per_user" FROM (${inner}) AS "base_l0"`
      );
      expect(result.plan.size).toBe(2);
    });

    it('filters derived values in the wrapper', async () => {
      const result = await compileQuery(
        { ...derived, having: gt(name('views_per_user'), value(2)) },
        websiteAnalytics,
        options()
      );
      expect(result.sql).toBe(
        `SELECT "country" AS "country", total_views / total_users AS "views_per_user" FROM (${inner}) AS "base_l0" ` +
          'WHERE total_views / total_users > ?'
      );
      expect(result.args).toEqual([2]);
    });
  });

  describe('comparisons', () => {
    it('joins the current and comparison periods', async () => {
      const result = await compileQuery(
        query({
          dimensions: [{ name: 'country' }],
          measures: [
            { name: 'total_views' },
            { name: 'total_views_prev', compute: { type: 'comparisonValue', measure: 'total_views' } },
            { name: 'total_views_delta', compute: { type: 'comparisonDelta', measure: 'total_views' } },
          ],
          timeRange: WEEK_2,
          comparisonTimeRange: WEEK_1,
        }),
        websiteAnalytics,
        options()
      );
      const side =
        'SELECT "country" AS "country", SUM(views) AS "total_views" FROM "website_analytics" ' +
        'WHERE "timestamp" >= ? AND "timestamp" < ? GROUP BY "country"';
      expect(result.sql).toBe(
        'SELECT COALESCE("current"."country", "comparison"."country") AS "country", ' +
          '"current"."total_views" AS "total_views", ' +
          '"comparison"."total_views" AS "total_views_prev", ' +
          '"current"."total_views" - "comparison"."total_views" AS "total_views_delta" ' +
          `FROM (${side}) AS "current" FULL OUTER JOIN (${side}) AS "comparison" ` +
          'ON "current"."country" IS NOT DISTINCT FROM "comparison"."country"'
      );
      expect(result.args).toEqual([WEEK_2.start, WEEK_2.end, WEEK_1.start, WEEK_1.end]);
    });

    it('cross joins totals and divides safely for ratios', async () => {
      const result = await compileQuery(
        query({
          measures: [{ name: 'growth', compute: { type: 'comparisonRatio', measure: 'total_views' } }],
          timeRange: WEEK_2,
          comparisonTimeRange: WEEK_1,
        }),
        websiteAnalytics,
        options()
      );
      const side = 'SELECT SUM(views) AS "total_views" FROM "website_analytics" WHERE "timestamp" >= ? AND "timestamp" < ?';
      expect(result.sql).toBe(
        'SELECT CAST("current"."total_views" - "comparison"."total_views" AS DOUBLE) / NULLIF("comparison"."total_views", 0) AS "growth" ' +
          `FROM (${side}) AS "current" CROSS JOIN (${side}) AS "comparison"`
      );
    });

    it('refuses a full join on druid unless approximation is allowed', async () => {
      const compiling = compileQuery(
        query({
          dimensions: [{ name: 'country' }],
          measures: [{ name: 'delta', compute: { type: 'comparisonDelta', measure: 'total_views' } }],
          timeRange: WEEK_2,
          comparisonTimeRange: WEEK_1,
        }),
        websiteAnalytics,
        options({ dialect: 'druid' })
      );
      await expect(compiling).rejects.toThrow(UnsupportedFeatureError);
      await expect(compiling).rejects.toThrow(
        'full join is not supported by the druid dialect: comparisons need allowApproximateComparisons on this backend'
      );
    });
  });

  describe('rows mode', () => {
    it('selects every accessible dimension without grouping', async () => {
      const result = await compileQuery(
        query({ rows: true, where: eq(name('country'), value('UK')), limit: 100 }),
        websiteAnalytics,
        options()
      );
      expect(result.sql).toBe(
        'SELECT "country" AS "country", "city" AS "city", (lower(device_type)) AS "device" ' +
          'FROM "website_analytics" WHERE "country" = ? LIMIT 100'
      );
      expect(result.args).toEqual(['UK']);
    });
  });

  describe('subquery filters', () => {
    it('filters by the dimension values passing an aggregate condition', async () => {
      const result = await compileQuery(
        query({
          dimensions: [{ name: 'city' }],
          measures: [{ name: 'total_views' }],
          where: subquery('country', ['total_views'], { having: gt(name('total_views'), value(1000)) }),
        }),
        websiteAnalytics,
        options()
      );
      expect(result.sql).toBe(
        'SELECT "city" AS "city", SUM(views) AS "total_views" FROM "website_analytics" ' +
          'WHERE "country" IN (SELECT "country" AS "country" FROM (' +
          'SELECT "country" AS "country", SUM(views) AS "total_views" FROM "website_analytics" GROUP BY "country"' +
          ') AS "subquery_values" WHERE "total_views" > ?) GROUP BY "city"'
      );
      expect(result.args).toEqual([1000]);
      expect(result.plan.subqueries).toEqual(['subquery']);
    });

    it('restricts the subquery to the enclosing time range', async () => {
      const result = await compileQuery(
        query({
          measures: [{ name: 'total_views' }],
          where: subquery('country', ['total_views'], { having: gt(name('total_views'), value(5)) }),
          timeRange: WEEK_1,
        }),
        websiteAnalytics,
        options()
      );
      expect(result.args).toEqual([WEEK_1.start, WEEK_1.end, WEEK_1.start, WEEK_1.end, 5]);
    });
  });

  describe('security', () => {
    it('ANDs the row filter into the base filter', async () => {
      const security = restrictToFields(['country', 'total_views'], eq(name('country'), value('UK')));
      const result = await compileQuery(
        query({ dimensions: [{ name: 'country' }], measures: [{ name: 'total_views' }], where: eq(name('country'), value('FR')) }),
        websiteAnalytics,
        options(),
        { security }
      );
      expect(result.sql).toBe(
        'SELECT "country" AS "country", SUM(views) AS "total_views" FROM "website_analytics" ' +
          'WHERE ("country" = ? AND "country" = ?) GROUP BY "country"'
      );
      expect(result.args).toEqual(['FR', 'UK']);
    });

    it('rejects hidden fields', async () => {
      const security = restrictToFields(['country', 'total_views']);
      await expect(
        compileQuery(query({ dimensions: [{ name: 'city' }] }), websiteAnalytics, options(), { security })
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('relative time ranges', () => {
    it('resolves against the execution time', async () => {
      const input = query({
        measures: [{ name: 'total_views' }],
        timeRange: { isoDuration: 'P7D', roundToGrain: 'day' },
      });
      const result = await compileQuery(input, websiteAnalytics, options(), { executionTime: EXECUTION_TIME });
      expect(result.args).toEqual([new Date('2024-03-08T00:00:00Z'), new Date('2024-03-15T00:00:00Z')]);
      expect(result.query.timeRange).toEqual({
        start: new Date('2024-03-08T00:00:00Z'),
        end: new Date('2024-03-15T00:00:00Z'),
      });
      // the caller's query is untouched
      expect(input.timeRange).toEqual({ isoDuration: 'P7D', roundToGrain: 'day' });
    });

    it('resolves data anchors from the context', async () => {
      const result = await compileQuery(
        query({ measures: [{ name: 'total_views' }], timeRange: { expression: 'latest-1D to latest' } }),
        websiteAnalytics,
        options(),
        { executionTime: EXECUTION_TIME, timeAnchors: { latest: new Date('2024-03-10T00:00:00Z') } }
      );
      expect(result.args).toEqual([new Date('2024-03-09T00:00:00Z'), new Date('2024-03-10T00:00:00Z')]);
    });

    it('reports unusable expressions as rewrite errors', async () => {
      await expect(
        compileQuery(
          query({ measures: [{ name: 'total_views' }], timeRange: { expression: 'latest-1D to latest' } }),
          websiteAnalytics,
          options(),
          { executionTime: EXECUTION_TIME }
        )
      ).rejects.toThrow("[time-range] Anchor 'latest' is not available for this metrics view");
    });

    it('resolves comparison offsets against the primary range', async () => {
      const result = await compileQuery(
        query({
          measures: [{ name: 'prev', compute: { type: 'comparisonValue', measure: 'total_views' } }],
          timeRange: { isoDuration: 'P1W', roundToGrain: 'day' },
          comparisonTimeRange: { isoOffset: 'P1W' },
        }),
        websiteAnalytics,
        options(),
        { executionTime: EXECUTION_TIME }
      );
      expect(result.query.comparisonTimeRange).toEqual({
        start: new Date('2024-03-01T00:00:00Z'),
        end: new Date('2024-03-08T00:00:00Z'),
      });
    });
  });

  describe('errors', () => {
    it('rejects pivots', async () => {
      await expect(
        compileQuery(
          query({ dimensions: [{ name: 'country' }], measures: [{ name: 'total_views' }], pivotOn: ['country'] }),
          websiteAnalytics,
          options()
        )
      ).rejects.toThrow(UnsupportedFeatureError);
    });

    it('reports invalid queries without logging them as failures', async () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      await expect(
        compileQuery(query({ measures: [{ name: 'nope' }] }), websiteAnalytics, options({ logger }))
      ).rejects.toThrow("measures[0].name: unknown measure 'nope'");
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('wraps unexpected failures as invariant violations', async () => {
      class BrokenDialect extends DuckDBDialect {
        override dateTruncExpr(_expr: string, _grain: TimeGrain, _options: TruncateOptions): string {
          throw new Error('boom');
        }
      }
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const compiling = compileQuery(
        query({ dimensions: [{ name: 'timestamp', timeGrain: 'day' }], measures: [{ name: 'total_views' }] }),
        websiteAnalytics,
        options({ dialect: new BrokenDialect(), logger })
      );
      await expect(compiling).rejects.toThrow(CompileInvariantError);
      await expect(compiling).rejects.toThrow('internal invariant violated: boom');
      expect(logger.error).toHaveBeenCalledWith('internal invariant violated: boom', {
        kind: 'invariant',
        metricsView: 'WebsiteAnalytics',
        dialect: 'duckdb',
      });
    });

    it('keeps rewrite errors distinct', async () => {
      const compiling = compileQuery(
        query({ measures: [{ name: 'total_views' }], timeRange: { expression: '7D tz Mars/Base' } }),
        websiteAnalytics,
        options(),
        { executionTime: EXECUTION_TIME }
      );
      await expect(compiling).rejects.toThrow(RewriteError);
    });
  });

  describe('determinism', () => {
    it('produces identical output for identical input', async () => {
      const [a, b] = await Promise.all([
        compileQuery(TOP_COUNTRIES, websiteAnalytics, options()),
        compileQuery(TOP_COUNTRIES, websiteAnalytics, options()),
      ]);
      expect(a.sql).toBe(b.sql);
      expect(a.args).toEqual(b.args);
    });
  });

  it('prints the plan for debugging', async () => {
    const result = await compileQuery(
      query({
        dimensions: [{ name: 'country' }],
        measures: [{ name: 'total_views' }],
        sort: [{ name: 'total_views', desc: true }],
        limit: 10,
      }),
      websiteAnalytics,
      options()
    );
    expect(printPlanTree(result.plan)).toBe(
      [
        'PlanTree:',
        '  blocks: 1',
        '  base: from "website_analytics" [grouped]',
        '    dimensions: [country]',
        '    measures: [total_views]',
        '    orderBy: [total_views desc]',
        '    limit: 10',
      ].join('\n')
    );
  });
});
