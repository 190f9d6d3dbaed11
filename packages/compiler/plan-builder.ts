/**
 * Plan Tree Builder
 *
 * Builds the SelectBlock arena for a validated, rewritten query.
 *
 * Measures are computed in a "stack" of blocks: level 0 aggregates the base
 * table, and each derived measure is computed one level above the measures it
 * references, in a wrapper selecting from the level below. Comparisons build
 * two stacks (`current` and `comparison`) and join them under the root.
 */

import type { Dialect, JoinKind, TruncateOptions } from '../dialect/dialect.js';
import type {
  Dimension,
  Expression,
  Query,
  SubqueryExpression,
  TimeRange,
} from '../query/ast.js';
import { isRelativeTimeRange } from '../query/ast.js';
import { andAll } from '../query/builders.js';
import type { MetricsView, MetricsViewMeasure } from '../query/metrics-view.js';
import { findMeasure, measureDependencies, resolveDimension } from '../query/metrics-view.js';
import type { SecurityPolicy } from '../query/security.js';
import type { TimeGrain } from '../time/grain.js';
import { CompileInvariantError, UnsupportedFeatureError } from './errors.js';
import { translateExpression, type TranslationScope } from './expression-translator.js';
import { joinSql, raw, sql, wrapSql, type Sql } from './fragment.js';
import type { FieldNode, SelectBlock } from './plan.js';
import { PlanTree } from './plan.js';
import { emitBlock } from './sql-emitter.js';

export const ROOT_ALIAS = 'base';
export const CURRENT_ALIAS = 'current';
export const COMPARISON_ALIAS = 'comparison';

export interface BuildInput {
  view: MetricsView;
  query: Query;
  dialect: Dialect;
  security: SecurityPolicy;
  /** time zone and week/year conventions for grains */
  calendar: TruncateOptions;
}

// ---
// STACK COLUMNS
// ---

/** A column computed somewhere in a measure stack */
type StackColumn =
  | { kind: 'measure'; name: string }
  | { kind: 'count'; name: string }
  | { kind: 'countDistinct'; name: string; dimension: string }
  | { kind: 'percentOfTotal'; name: string; measure: string; total: number | null | undefined };

interface StackSpec {
  alias: string;
  dimensions: readonly Dimension[];
  /** columns exposed by the top block, in output order */
  columns: readonly StackColumn[];
  range: TimeRange | undefined;
  filter: Expression | undefined;
}

interface PlacedColumn {
  column: StackColumn;
  /** level the column is computed at */
  level: number;
  /** highest level the column is still selected at */
  lastUse: number;
}

function hasComparison(query: Query): boolean {
  return query.measures.some(
    m =>
      m.compute?.type === 'comparisonValue' ||
      m.compute?.type === 'comparisonDelta' ||
      m.compute?.type === 'comparisonRatio'
  );
}

/**
 * Root dimension for a comparison join: both sides for a full join, the
 * preserved side otherwise.
 */
export function comparisonDimensionSql(dialect: Dialect, name: string, kind: JoinKind): string {
  const current = `${dialect.escapeIdentifier(CURRENT_ALIAS)}.${dialect.escapeIdentifier(name)}`;
  const comparison = `${dialect.escapeIdentifier(COMPARISON_ALIAS)}.${dialect.escapeIdentifier(name)}`;
  switch (kind) {
    case 'full':
      return `COALESCE(${current}, ${comparison})`;
    case 'right':
      return comparison;
    default:
      return current;
  }
}

// ---
// BUILDER
// ---

class PlanBuilder {
  private readonly tree = new PlanTree();
  private readonly dialect: Dialect;
  private readonly view: MetricsView;
  private readonly query: Query;

  constructor(private readonly input: BuildInput) {
    this.dialect = input.dialect;
    this.view = input.view;
    this.query = input.query;
  }

  build(): PlanTree {
    const { query } = this;
    if (query.pivotOn && query.pivotOn.length > 0) {
      throw new UnsupportedFeatureError('pivot', this.dialect.name, 'pivoting is applied to results outside the compiler');
    }

    let aggregating = false;
    if (query.rows) {
      this.buildRows();
    } else if (hasComparison(query)) {
      this.buildComparison();
    } else {
      const levels = this.buildStack({
        alias: ROOT_ALIAS,
        dimensions: query.dimensions,
        columns: this.primaryColumns(),
        range: query.timeRange,
        filter: query.where,
      });
      aggregating = levels === 1;
    }

    this.tree.setRoot(ROOT_ALIAS);
    const root = this.tree.root;

    if (query.having) {
      const having = this.translateOver(root, query.having);
      if (aggregating) {
        root.having = having;
      } else {
        root.where = root.where ? sql`${root.where} AND ${having}` : having;
      }
    }

    root.orderBy = query.sort.map(s => ({ name: s.name, desc: s.desc }));
    root.limit = query.limit;
    root.offset = query.offset;
    return this.tree;
  }

  // ---
  // SQL FOR NAMES
  // ---

  private ident(name: string): string {
    return this.dialect.escapeIdentifier(name);
  }

  private qualified(alias: string, column: string): string {
    return `${this.ident(alias)}.${this.ident(column)}`;
  }

  private dimensionSql(name: string, grain?: TimeGrain): string {
    const dim = resolveDimension(this.view, name);
    if (!dim) {
      throw new CompileInvariantError(`dimension '${name}' did not resolve against '${this.view.name}'`);
    }
    const base = dim.expression !== undefined ? `(${dim.expression})` : this.ident(dim.column ?? dim.name);
    return grain ? this.dialect.dateTruncExpr(base, grain, this.input.calendar) : base;
  }

  private measure(name: string): MetricsViewMeasure {
    const measure = findMeasure(this.view, name);
    if (!measure) {
      throw new CompileInvariantError(`measure '${name}' did not resolve against '${this.view.name}'`);
    }
    return measure;
  }

  private displayName(name: string): { displayName?: string } {
    const field = resolveDimension(this.view, name) ?? findMeasure(this.view, name);
    return field?.displayName ? { displayName: field.displayName } : {};
  }

  // ---
  // FILTERS
  // ---

  private baseScope(range: TimeRange | undefined): TranslationScope {
    return {
      dialect: this.dialect,
      resolveName: name => raw(this.dimensionSql(name)),
      subquery: expr => this.buildSubquery(expr, range),
    };
  }

  /** WHERE for a block reading the base table */
  private baseFilter(range: TimeRange | undefined, filter: Expression | undefined): Sql | undefined {
    const parts: Sql[] = [];
    if (range) {
      if (isRelativeTimeRange(range)) {
        throw new CompileInvariantError('time range reached the plan builder unresolved');
      }
      const timeDimension = this.view.timeDimension;
      if (!timeDimension) {
        throw new CompileInvariantError(`metrics view '${this.view.name}' has no time dimension`);
      }
      const column = raw(this.dimensionSql(timeDimension));
      if (range.start) parts.push(sql`${column} >= ${range.start}`);
      if (range.end) parts.push(sql`${column} < ${range.end}`);
    }
    const combined = andAll(filter, this.input.security.rowFilter);
    if (combined) {
      parts.push(translateExpression(combined, this.baseScope(range)));
    }
    return parts.length > 0 ? joinSql(parts, ' AND ') : undefined;
  }

  /** Translate an expression whose names refer to a block's own fields */
  private translateOver(block: SelectBlock, expr: Expression): Sql {
    const fields = new Map<string, FieldNode>();
    for (const field of [...block.dimensions, ...block.measures]) {
      fields.set(field.name, field);
    }
    return translateExpression(expr, {
      dialect: this.dialect,
      resolveName: name => {
        const field = fields.get(name);
        if (!field) {
          throw new CompileInvariantError(`'${name}' is not selected by block '${block.alias}'`);
        }
        return field.expr;
      },
    });
  }

  // ---
  // MEASURE STACKS
  // ---

  private primaryColumns(): StackColumn[] {
    return this.query.measures.map((m): StackColumn => {
      const compute = m.compute;
      if (!compute) {
        return { kind: 'measure', name: m.name };
      }
      switch (compute.type) {
        case 'count':
          return { kind: 'count', name: m.name };
        case 'countDistinct':
          return { kind: 'countDistinct', name: m.name, dimension: compute.dimension };
        case 'percentOfTotal':
          return { kind: 'percentOfTotal', name: m.name, measure: compute.measure, total: compute.total };
        default:
          throw new CompileInvariantError(`'${compute.type}' measure outside a comparison`);
      }
    });
  }

  /**
   * Place every column the stack needs at its level. Derived measures sit one
   * level above the highest measure they reference.
   */
  private placeColumns(requested: readonly StackColumn[]): { placed: PlacedColumn[]; top: number } {
    const levels = new Map<string, number>();
    const levelOf = (name: string): number => {
      const known = levels.get(name);
      if (known !== undefined) return known;
      const measure = this.measure(name);
      const refs = measure.type === 'derived' ? (measure.referencedMeasures ?? []) : [];
      const level = refs.length === 0 ? 0 : 1 + Math.max(...refs.map(levelOf));
      levels.set(name, level);
      return level;
    };

    const order: StackColumn[] = [];
    const seen = new Set<string>();
    const add = (column: StackColumn): void => {
      if (seen.has(column.name)) return;
      seen.add(column.name);
      order.push(column);
    };
    const addDependencies = (name: string, includeSelf: boolean): void => {
      let deps: string[];
      try {
        deps = measureDependencies(this.view, name);
      } catch (error) {
        throw new CompileInvariantError(`measure '${name}' failed to resolve`, { cause: error });
      }
      for (const dep of deps) {
        if (dep !== name || includeSelf) add({ kind: 'measure', name: dep });
      }
    };

    for (const column of requested) {
      if (column.kind === 'measure') addDependencies(column.name, true);
      if (column.kind === 'percentOfTotal') addDependencies(column.measure, false);
    }
    requested.forEach(add);

    const columnLevel = (column: StackColumn): number => {
      switch (column.kind) {
        case 'measure':
          return levelOf(column.name);
        case 'percentOfTotal':
          return levelOf(column.measure);
        default:
          return 0;
      }
    };

    const top = Math.max(0, ...requested.map(columnLevel));
    const lastUse = new Map<string, number>();
    const use = (name: string, level: number): void => {
      lastUse.set(name, Math.max(lastUse.get(name) ?? -1, level));
    };
    for (const column of requested) use(column.name, top);
    for (const column of order) {
      const referencing =
        column.kind === 'measure' ? this.measure(column.name) :
        column.kind === 'percentOfTotal' ? this.measure(column.measure) :
        undefined;
      if (referencing?.type !== 'derived') continue;
      const level = columnLevel(column);
      for (const ref of referencing.referencedMeasures ?? []) use(ref, level - 1);
    }

    const placed = order.map(column => {
      const level = columnLevel(column);
      return { column, level, lastUse: Math.max(level, lastUse.get(column.name) ?? level) };
    });
    return { placed, top };
  }

  private computeColumn(column: StackColumn): Sql {
    switch (column.kind) {
      case 'measure':
        return raw(this.measure(column.name).expression);
      case 'count':
        return raw('COUNT(*)');
      case 'countDistinct':
        return raw(`COUNT(DISTINCT ${this.dimensionSql(column.dimension)})`);
      case 'percentOfTotal': {
        const { total } = column;
        if (total === undefined) {
          throw new CompileInvariantError(`percent of total for '${column.name}' has no captured total`);
        }
        if (total === null || total === 0) {
          return raw('NULL');
        }
        const value = wrapSql(raw(this.measure(column.measure).expression), inner => this.dialect.castToDouble(inner));
        return sql`${value} / ${total} * 100`;
      }
    }
  }

  /**
   * Build a measure stack whose top block carries `spec.alias`. Returns the
   * number of levels.
   */
  private buildStack(spec: StackSpec): number {
    const { placed, top } = this.placeColumns(spec.columns);
    let below: string | undefined;

    for (let level = 0; level <= top; level++) {
      const alias = level === top ? spec.alias : this.tree.uniqueAlias(`${spec.alias}_l${level}`);

      const dimensions: FieldNode[] = spec.dimensions.map(dim => ({
        name: dim.name,
        ...this.displayName(dim.name),
        expr: raw(level === 0 ? this.dimensionSql(dim.name, dim.timeGrain) : this.ident(dim.name)),
      }));

      const measures: FieldNode[] = placed
        .filter(p => p.level <= level && level <= p.lastUse)
        .map(p => ({
          name: p.column.name,
          ...(p.column.kind === 'measure' ? this.displayName(p.column.name) : {}),
          expr: p.level === level ? this.computeColumn(p.column) : raw(this.ident(p.column.name)),
        }));

      const block: SelectBlock = {
        alias,
        dimensions,
        measures,
        from: below === undefined ? { kind: 'table', table: this.tableRef() } : { kind: 'block', alias: below },
        joins: [],
        groupBy: level === 0 && dimensions.length > 0,
        orderBy: [],
      };
      if (level === 0) {
        const where = this.baseFilter(spec.range, spec.filter);
        if (where) block.where = where;
      }
      this.tree.add(block);
      below = alias;
    }
    return top + 1;
  }

  private tableRef(): string {
    return this.dialect.escapeTable(this.view.table, this.view.database, this.view.databaseSchema);
  }

  // ---
  // COMPARISONS
  // ---

  private buildComparison(): void {
    const { query, dialect } = this;
    const current: StackColumn[] = [];
    const comparison: StackColumn[] = [];
    const push = (list: StackColumn[], column: StackColumn): void => {
      if (!list.some(c => c.name === column.name)) list.push(column);
    };

    for (const m of query.measures) {
      const compute = m.compute;
      if (!compute) {
        push(current, { kind: 'measure', name: m.name });
        continue;
      }
      switch (compute.type) {
        case 'count':
          push(current, { kind: 'count', name: m.name });
          break;
        case 'countDistinct':
          push(current, { kind: 'countDistinct', name: m.name, dimension: compute.dimension });
          break;
        case 'percentOfTotal':
          push(current, { kind: 'percentOfTotal', name: m.name, measure: compute.measure, total: compute.total });
          break;
        case 'comparisonValue':
          push(comparison, { kind: 'measure', name: compute.measure });
          break;
        case 'comparisonDelta':
        case 'comparisonRatio':
          push(current, { kind: 'measure', name: compute.measure });
          push(comparison, { kind: 'measure', name: compute.measure });
          break;
      }
    }
    // the current side must select something to join against
    const first = comparison[0];
    if (current.length === 0 && query.dimensions.length === 0 && first) {
      current.push(first);
    }

    this.buildStack({
      alias: CURRENT_ALIAS,
      dimensions: query.dimensions,
      columns: current,
      range: query.timeRange,
      filter: query.where,
    });
    this.buildStack({
      alias: COMPARISON_ALIAS,
      dimensions: query.dimensions,
      columns: comparison,
      range: query.comparisonTimeRange,
      filter: query.where,
    });

    const kind: JoinKind = query.dimensions.length > 0 ? 'full' : 'cross';
    const on =
      kind === 'full'
        ? joinSql(
            query.dimensions.map(d =>
              raw(dialect.joinOnExpression(this.qualified(CURRENT_ALIAS, d.name), this.qualified(COMPARISON_ALIAS, d.name)))
            ),
            ' AND '
          )
        : undefined;

    const measures = query.measures.map((m): FieldNode => {
      const compute = m.compute;
      const currentCol = (column: string): FieldNode => ({
        name: m.name,
        expr: raw(this.qualified(CURRENT_ALIAS, column)),
        origin: 'current',
        sourceColumn: column,
      });
      if (!compute) {
        return { ...currentCol(m.name), ...this.displayName(m.name) };
      }
      switch (compute.type) {
        case 'count':
        case 'countDistinct':
        case 'percentOfTotal':
          return currentCol(m.name);
        case 'comparisonValue':
          return {
            name: m.name,
            expr: raw(this.qualified(COMPARISON_ALIAS, compute.measure)),
            origin: 'comparison',
            sourceColumn: compute.measure,
          };
        case 'comparisonDelta':
        case 'comparisonRatio': {
          const cur = this.qualified(CURRENT_ALIAS, compute.measure);
          const cmp = this.qualified(COMPARISON_ALIAS, compute.measure);
          const delta = `${cur} - ${cmp}`;
          const expr =
            compute.type === 'comparisonDelta'
              ? delta
              : dialect.safeDivideExpr(dialect.castToDouble(delta), cmp);
          return { name: m.name, expr: raw(expr), origin: 'both' };
        }
      }
    });

    this.tree.add({
      alias: ROOT_ALIAS,
      dimensions: query.dimensions.map(d => ({
        name: d.name,
        ...this.displayName(d.name),
        expr: raw(comparisonDimensionSql(dialect, d.name, kind)),
      })),
      measures,
      from: { kind: 'block', alias: CURRENT_ALIAS },
      joins: [{ alias: COMPARISON_ALIAS, kind, ...(on ? { on } : {}) }],
      groupBy: false,
      orderBy: [],
    });
  }

  // ---
  // ROWS
  // ---

  private buildRows(): void {
    const { query, view } = this;
    const security = this.input.security;
    const dimensions = view.dimensions
      .filter(d => security.canAccessField(d.name))
      .map(d => ({ name: d.name, ...this.displayName(d.name), expr: raw(this.dimensionSql(d.name)) }));
    if (dimensions.length === 0) {
      throw new CompileInvariantError(`no accessible dimensions in '${view.name}' for rows mode`);
    }
    const block: SelectBlock = {
      alias: ROOT_ALIAS,
      dimensions,
      measures: [],
      from: { kind: 'table', table: this.tableRef() },
      joins: [],
      groupBy: false,
      orderBy: [],
    };
    const where = this.baseFilter(query.timeRange, query.where);
    if (where) block.where = where;
    this.tree.add(block);
  }

  // ---
  // SUBQUERY FILTERS
  // ---

  /**
   * `dim IN (SELECT dim FROM (<stack>) WHERE having)`. The subquery filters on
   * its own `where` plus the security filter and the enclosing time range.
   */
  private buildSubquery(expr: SubqueryExpression, range: TimeRange | undefined): Sql {
    const alias = this.tree.uniqueAlias('subquery');
    const inner = this.tree.uniqueAlias(`${alias}_values`);
    this.buildStack({
      alias: inner,
      dimensions: [{ name: expr.dimension }],
      columns: expr.measures.map((name): StackColumn => ({ kind: 'measure', name })),
      range,
      filter: expr.where,
    });

    const block: SelectBlock = {
      alias,
      dimensions: [{ name: expr.dimension, expr: raw(this.ident(expr.dimension)) }],
      measures: [],
      from: { kind: 'block', alias: inner },
      joins: [],
      groupBy: false,
      orderBy: [],
    };
    if (expr.having) {
      const columns = new Set([expr.dimension, ...expr.measures]);
      block.where = translateExpression(expr.having, {
        dialect: this.dialect,
        resolveName: name => {
          if (!columns.has(name)) {
            throw new CompileInvariantError(`'${name}' is not selected by subquery '${alias}'`);
          }
          return raw(this.ident(name));
        },
      });
    }
    this.tree.add(block);
    this.tree.subqueries.push(alias);

    return sql`${raw(this.dimensionSql(expr.dimension))} IN (${emitBlock(this.tree, alias, this.dialect)})`;
  }
}

export function buildPlan(input: BuildInput): PlanTree {
  return new PlanBuilder(input).build();
}

/**
 * Reject join kinds the dialect cannot execute. Runs after the tree-level
 * rewrites, which may have replaced a full join.
 */
export function checkDialectSupport(tree: PlanTree, dialect: Dialect): void {
  for (const block of tree.all()) {
    for (const join of block.joins) {
      if (!dialect.supportsJoin(join.kind)) {
        throw new UnsupportedFeatureError(
          `${join.kind} join`,
          dialect.name,
          join.kind === 'full' ? 'comparisons need allowApproximateComparisons on this backend' : undefined
        );
      }
    }
  }
}
