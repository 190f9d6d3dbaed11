/**
 * Wire-format parsing
 *
 * Queries and metrics views arrive as JSON. In the JSON form an expression is
 * an object populating exactly one of `name`, `val`, `cond` or `subquery`;
 * parsing turns that into the tagged-union Expression.
 */

import { z } from 'zod';
import { ValidationError } from '../compiler/errors.js';
import { TIME_GRAINS } from '../time/grain.js';
import type { Expression, LiteralValue, Query } from './ast.js';
import { OPERATORS } from './ast.js';
import type { MetricsView } from './metrics-view.js';

// ---
// EXPRESSIONS
// ---

export interface WireExpression {
  name?: string | undefined;
  val?: LiteralValue | undefined;
  cond?: { op: (typeof OPERATORS)[number]; exprs: WireExpression[] } | undefined;
  subquery?:
    | {
        dimension: string;
        measures: string[];
        where?: WireExpression | undefined;
        having?: WireExpression | undefined;
      }
    | undefined;
}

const literalSchema: z.ZodType<LiteralValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(literalSchema)])
);

const VARIANT_KEYS = ['name', 'val', 'cond', 'subquery'] as const;

export const wireExpressionSchema: z.ZodType<WireExpression> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1).optional(),
      val: literalSchema.optional(),
      cond: z
        .object({
          op: z.enum(OPERATORS),
          exprs: z.array(wireExpressionSchema),
        })
        .strict()
        .optional(),
      subquery: z
        .object({
          dimension: z.string().min(1),
          measures: z.array(z.string().min(1)),
          where: wireExpressionSchema.optional(),
          having: wireExpressionSchema.optional(),
        })
        .strict()
        .optional(),
    })
    .strict()
    .superRefine((expr, ctx) => {
      const populated = VARIANT_KEYS.filter(key => key in expr && (key === 'val' || expr[key] !== undefined));
      if (populated.length !== 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message:
            populated.length === 0
              ? 'expression must populate one of name, val, cond, subquery'
              : `expression populates more than one of ${populated.join(', ')}`,
        });
      }
    })
);

export function toExpression(wire: WireExpression): Expression {
  if (wire.name !== undefined) {
    return { type: 'name', name: wire.name };
  }
  if (wire.cond !== undefined) {
    return { type: 'condition', op: wire.cond.op, exprs: wire.cond.exprs.map(toExpression) };
  }
  if (wire.subquery !== undefined) {
    const { dimension, measures, where, having } = wire.subquery;
    return {
      type: 'subquery',
      dimension,
      measures,
      ...(where ? { where: toExpression(where) } : {}),
      ...(having ? { having: toExpression(having) } : {}),
    };
  }
  return { type: 'value', value: wire.val ?? null };
}

/**
 * Inverse of toExpression, for logging and the debug script
 */
export function toWireExpression(expr: Expression): WireExpression {
  switch (expr.type) {
    case 'name':
      return { name: expr.name };
    case 'value':
      return { val: expr.value };
    case 'condition':
      return { cond: { op: expr.op, exprs: expr.exprs.map(toWireExpression) } };
    case 'subquery':
      return {
        subquery: {
          dimension: expr.dimension,
          measures: [...expr.measures],
          ...(expr.where ? { where: toWireExpression(expr.where) } : {}),
          ...(expr.having ? { having: toWireExpression(expr.having) } : {}),
        },
      };
  }
}

// ---
// QUERY
// ---

const dateSchema = z
  .union([z.string().datetime({ offset: true }), z.date()])
  .transform(value => new Date(value));

const timeRangeSchema = z
  .object({
    start: dateSchema.optional(),
    end: dateSchema.optional(),
    isoDuration: z.string().min(1).optional(),
    isoOffset: z.string().min(1).optional(),
    roundToGrain: z.enum(TIME_GRAINS).optional(),
    expression: z.string().min(1).optional(),
  })
  .strict();

const computeSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('count') }).strict(),
  z.object({ type: z.literal('countDistinct'), dimension: z.string().min(1) }).strict(),
  z.object({ type: z.literal('comparisonValue'), measure: z.string().min(1) }).strict(),
  z.object({ type: z.literal('comparisonDelta'), measure: z.string().min(1) }).strict(),
  z.object({ type: z.literal('comparisonRatio'), measure: z.string().min(1) }).strict(),
  z
    .object({
      type: z.literal('percentOfTotal'),
      measure: z.string().min(1),
      total: z.number().nullable().optional(),
    })
    .strict(),
]);

// limit and offset are range-checked by validateQuery, not here
const querySchema = z
  .object({
    metricsView: z.string().min(1),
    dimensions: z
      .array(z.object({ name: z.string().min(1), timeGrain: z.enum(TIME_GRAINS).optional() }).strict())
      .default([]),
    measures: z
      .array(z.object({ name: z.string().min(1), compute: computeSchema.optional() }).strict())
      .default([]),
    where: wireExpressionSchema.optional(),
    having: wireExpressionSchema.optional(),
    timeRange: timeRangeSchema.optional(),
    comparisonTimeRange: timeRangeSchema.optional(),
    sort: z
      .array(z.object({ name: z.string().min(1), desc: z.boolean().default(false) }).strict())
      .default([]),
    limit: z.number().optional(),
    offset: z.number().optional(),
    rows: z.boolean().optional(),
    pivotOn: z.array(z.string()).optional(),
    timeZone: z.string().min(1).optional(),
  })
  .strict();

export type WireQuery = z.input<typeof querySchema>;

/**
 * Render a zod issue path as `measures[1].compute.type`
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out || '(root)';
}

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('(root)', error.message);
  }
  return new ValidationError(formatIssuePath(issue.path), issue.message);
}

/**
 * Parse the JSON form of a query. Throws ValidationError on structural
 * problems; semantic checks against the metrics view are validateQuery's job.
 */
export function parseQuery(input: unknown): Query {
  const result = querySchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  const wire = result.data;
  return {
    metricsView: wire.metricsView,
    dimensions: wire.dimensions,
    measures: wire.measures,
    where: wire.where && toExpression(wire.where),
    having: wire.having && toExpression(wire.having),
    timeRange: wire.timeRange,
    comparisonTimeRange: wire.comparisonTimeRange,
    sort: wire.sort,
    limit: wire.limit,
    offset: wire.offset,
    rows: wire.rows,
    pivotOn: wire.pivotOn,
    timeZone: wire.timeZone,
  };
}

/**
 * Parse a single JSON expression
 */
export function parseExpression(input: unknown): Expression {
  const result = wireExpressionSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return toExpression(result.data);
}

// ---
// METRICS VIEW
// ---

const metricsViewSchema = z
  .object({
    name: z.string().min(1),
    table: z.string().min(1),
    database: z.string().min(1).optional(),
    databaseSchema: z.string().min(1).optional(),
    timeDimension: z.string().min(1).optional(),
    firstDayOfWeek: z.number().int().min(1).max(7).optional(),
    firstMonthOfYear: z.number().int().min(1).max(12).optional(),
    dimensions: z.array(
      z
        .object({
          name: z.string().min(1),
          column: z.string().min(1).optional(),
          expression: z.string().min(1).optional(),
          type: z.enum(['string', 'number', 'boolean', 'timestamp', 'date']).default('string'),
          displayName: z.string().optional(),
        })
        .refine(d => d.column === undefined || d.expression === undefined, {
          message: 'a dimension sets column or expression, not both',
        })
    ),
    measures: z.array(
      z.object({
        name: z.string().min(1),
        expression: z.string().min(1),
        type: z.enum(['simple', 'derived']).default('simple'),
        referencedMeasures: z.array(z.string().min(1)).optional(),
        validPercentOfTotal: z.boolean().optional(),
        displayName: z.string().optional(),
      })
    ),
  })
  .superRefine((view, ctx) => {
    const seen = new Set<string>();
    const fields = [
      ...view.dimensions.map((d, i) => ({ name: d.name, path: ['dimensions', i, 'name'] })),
      ...view.measures.map((m, i) => ({ name: m.name, path: ['measures', i, 'name'] })),
    ];
    for (const field of fields) {
      if (seen.has(field.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate field '${field.name}'`, path: field.path });
      }
      seen.add(field.name);
    }
    view.measures.forEach((m, i) => {
      if (m.type === 'derived' && !m.referencedMeasures?.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'derived measures must list referencedMeasures',
          path: ['measures', i, 'referencedMeasures'],
        });
      }
    });
  });

export function parseMetricsView(input: unknown): MetricsView {
  const result = metricsViewSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
