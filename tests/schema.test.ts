/**
 * Wire-format parsing of queries, expressions and metrics views
 */

import { describe, it, expect } from 'vitest';
import {
  formatIssuePath,
  parseExpression,
  parseMetricsView,
  parseQuery,
  toWireExpression,
} from '../packages/query/schema.js';
import { ValidationError } from '../packages/compiler/errors.js';
import { and, eq, name, subquery, value, gt } from '../packages/query/builders.js';

function validationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseQuery', () => {
  it('fills in defaults and converts expressions', () => {
    const query = parseQuery({
      metricsView: 'WebsiteAnalytics',
      measures: [{ name: 'total_views' }],
      where: { cond: { op: 'eq', exprs: [{ name: 'country' }, { val: 'UK' }] } },
      sort: [{ name: 'total_views' }],
    });
    expect(query.dimensions).toEqual([]);
    expect(query.sort).toEqual([{ name: 'total_views', desc: false }]);
    expect(query.where).toEqual(eq(name('country'), value('UK')));
  });

  it('parses dates with offsets', () => {
    const query = parseQuery({
      metricsView: 'WebsiteAnalytics',
      timeRange: { start: '2024-01-01T00:00:00Z', end: '2024-01-08T00:00:00+02:00' },
    });
    expect(query.timeRange?.start).toEqual(new Date('2024-01-01T00:00:00Z'));
    expect(query.timeRange?.end).toEqual(new Date('2024-01-07T22:00:00Z'));
  });

  it('parses computed measures', () => {
    const query = parseQuery({
      metricsView: 'WebsiteAnalytics',
      measures: [{ name: 'share', compute: { type: 'percentOfTotal', measure: 'total_views' } }],
    });
    expect(query.measures[0]?.compute).toEqual({ type: 'percentOfTotal', measure: 'total_views' });
  });

  it('reports the path of the first problem', () => {
    const error = validationError(() => parseQuery({ metricsView: 'WebsiteAnalytics', dimensions: [{}] }));
    expect(error.field).toBe('dimensions[0].name');
  });

  it('rejects unknown keys', () => {
    const error = validationError(() => parseQuery({ metricsView: 'WebsiteAnalytics', grain: 'day' }));
    expect(error.field).toBe('(root)');
  });

  it('rejects unknown compute types', () => {
    const error = validationError(() =>
      parseQuery({ metricsView: 'WebsiteAnalytics', measures: [{ name: 'x', compute: { type: 'median' } }] })
    );
    expect(error.field).toBe('measures[0].compute.type');
  });
});

describe('parseExpression', () => {
  it('parses nested conditions and subqueries', () => {
    expect(
      parseExpression({
        cond: {
          op: 'and',
          exprs: [
            { cond: { op: 'eq', exprs: [{ name: 'country' }, { val: null }] } },
            {
              subquery: {
                dimension: 'city',
                measures: ['total_views'],
                having: { cond: { op: 'gt', exprs: [{ name: 'total_views' }, { val: 10 }] } },
              },
            },
          ],
        },
      })
    ).toEqual(
      and(
        eq(name('country'), value(null)),
        subquery('city', ['total_views'], { having: gt(name('total_views'), value(10)) })
      )
    );
  });

  it('requires exactly one variant', () => {
    expect(validationError(() => parseExpression({})).message).toBe(
      '(root): expression must populate one of name, val, cond, subquery'
    );
    expect(validationError(() => parseExpression({ name: 'a', val: 1 })).message).toBe(
      '(root): expression populates more than one of name, val'
    );
  });

  it('rejects unknown operators', () => {
    const error = validationError(() => parseExpression({ cond: { op: 'between', exprs: [] } }));
    expect(error.field).toBe('cond.op');
  });

  it('round-trips through the wire form', () => {
    const expr = and(eq(name('country'), value('UK')), subquery('city', ['total_views']));
    expect(parseExpression(toWireExpression(expr))).toEqual(expr);
  });
});

describe('parseMetricsView', () => {
  it('applies field type defaults', () => {
    const view = parseMetricsView({
      name: 'Sales',
      table: 'sales',
      dimensions: [{ name: 'region' }],
      measures: [{ name: 'revenue', expression: 'SUM(amount)' }],
    });
    expect(view.dimensions[0]?.type).toBe('string');
    expect(view.measures[0]?.type).toBe('simple');
  });

  it('rejects duplicate field names', () => {
    const error = validationError(() =>
      parseMetricsView({
        name: 'Sales',
        table: 'sales',
        dimensions: [{ name: 'region' }],
        measures: [{ name: 'region', expression: 'COUNT(*)' }],
      })
    );
    expect(error.field).toBe('measures[0].name');
    expect(error.message).toBe("measures[0].name: duplicate field 'region'");
  });

  it('requires references on derived measures', () => {
    const error = validationError(() =>
      parseMetricsView({
        name: 'Sales',
        table: 'sales',
        dimensions: [],
        measures: [{ name: 'ratio', expression: 'a / b', type: 'derived' }],
      })
    );
    expect(error.field).toBe('measures[0].referencedMeasures');
  });
});

describe('formatIssuePath', () => {
  it('renders array indexes in brackets', () => {
    expect(formatIssuePath(['measures', 1, 'compute', 'type'])).toBe('measures[1].compute.type');
    expect(formatIssuePath([])).toBe('(root)');
  });
});
