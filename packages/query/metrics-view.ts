/**
 * Metrics View Schema
 *
 * The schema binding dimension and measure names to SQL over a base table.
 * Loading it is outside the compiler; it is read-only during a compilation
 * and may be shared across concurrent compilations.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'timestamp' | 'date';

export interface MetricsViewDimension {
  readonly name: string;
  /** physical column; defaults to `name` when neither column nor expression is set */
  readonly column?: string;
  /** SQL expression over the base table */
  readonly expression?: string;
  readonly type: FieldType;
  readonly displayName?: string;
}

export interface MetricsViewMeasure {
  readonly name: string;
  /**
   * Aggregate SQL for simple measures (`SUM(views)`); for derived measures an
   * expression over other measures by name (`total_views / total_users`)
   */
  readonly expression: string;
  readonly type: 'simple' | 'derived';
  readonly referencedMeasures?: readonly string[];
  /** whether percent-of-total is meaningful (e.g. not for averages) */
  readonly validPercentOfTotal?: boolean;
  readonly displayName?: string;
}

export interface MetricsView {
  readonly name: string;
  readonly table: string;
  readonly database?: string;
  readonly databaseSchema?: string;
  /** column bounded by time ranges */
  readonly timeDimension?: string;
  /** 1 = Monday ... 7 = Sunday */
  readonly firstDayOfWeek?: number;
  /** 1 = January ... 12 = December */
  readonly firstMonthOfYear?: number;
  readonly dimensions: readonly MetricsViewDimension[];
  readonly measures: readonly MetricsViewMeasure[];
}

export function findDimension(view: MetricsView, name: string): MetricsViewDimension | undefined {
  return view.dimensions.find(d => d.name === name);
}

export function findMeasure(view: MetricsView, name: string): MetricsViewMeasure | undefined {
  return view.measures.find(m => m.name === name);
}

/**
 * Like findDimension, but the view's time dimension resolves even when it is
 * not listed among the dimensions.
 */
export function resolveDimension(view: MetricsView, name: string): MetricsViewDimension | undefined {
  const dim = findDimension(view, name);
  if (dim) return dim;
  if (name === view.timeDimension) {
    return { name, column: name, type: 'timestamp' };
  }
  return undefined;
}

/**
 * Whether a dimension holds time values (and so accepts a time grain)
 */
export function isTimeDimension(view: MetricsView, name: string): boolean {
  if (name === view.timeDimension) return true;
  const dim = findDimension(view, name);
  return dim !== undefined && (dim.type === 'timestamp' || dim.type === 'date');
}

/**
 * Every simple measure a measure depends on, including itself when simple.
 * Returns the names in dependency order. Throws on unknown names and cycles.
 */
export function measureDependencies(view: MetricsView, name: string): string[] {
  const ordered: string[] = [];
  const visiting = new Set<string>();
  const done = new Set<string>();

  const visit = (current: string, path: string[]): void => {
    if (done.has(current)) return;
    if (visiting.has(current)) {
      throw new Error(`Measure cycle: ${[...path, current].join(' -> ')}`);
    }
    const measure = findMeasure(view, current);
    if (!measure) {
      throw new Error(`Unknown measure '${current}' referenced by '${path[path.length - 1] ?? current}'`);
    }
    visiting.add(current);
    for (const dep of measure.referencedMeasures ?? []) {
      visit(dep, [...path, current]);
    }
    visiting.delete(current);
    done.add(current);
    ordered.push(current);
  };

  visit(name, []);
  return ordered;
}
