/**
 * Plan tree
 *
 * The intermediate representation of one SQL statement: an arena of
 * SelectBlocks keyed by alias. Blocks reference their data source and join
 * children by alias, so tree-level rewrites can mutate any block in place.
 */

import type { JoinKind } from '../dialect/dialect.js';
import { CompileInvariantError } from './errors.js';
import type { Sql } from './fragment.js';

// ---
// TYPES
// ---

/** Which side of a comparison join a root measure reads */
export type FieldOrigin = 'current' | 'comparison' | 'both';

export interface FieldNode {
  readonly name: string;
  readonly displayName?: string;
  expr: Sql;
  /** set on measures of a comparison root */
  origin?: FieldOrigin;
  /** column of the origin side holding the value, for current/comparison origins */
  sourceColumn?: string;
}

export type DataSource =
  | { readonly kind: 'table'; readonly table: string }
  | { readonly kind: 'block'; readonly alias: string };

export interface JoinNode {
  readonly alias: string;
  kind: JoinKind;
  /** absent for cross joins */
  on?: Sql;
}

export interface OrderField {
  /** output name in the block's select list */
  readonly name: string;
  readonly desc: boolean;
}

export interface SelectBlock {
  readonly alias: string;
  dimensions: FieldNode[];
  measures: FieldNode[];
  readonly from: DataSource;
  joins: JoinNode[];
  where?: Sql;
  groupBy: boolean;
  having?: Sql;
  orderBy: OrderField[];
  limit?: number;
  offset?: number;
}

// ---
// ARENA
// ---

export class PlanTree {
  private readonly blocks = new Map<string, SelectBlock>();
  private readonly counters = new Map<string, number>();
  /** blocks emitted inline as filter subqueries */
  readonly subqueries: string[] = [];
  private rootAlias: string | undefined;

  add(block: SelectBlock): SelectBlock {
    if (this.blocks.has(block.alias)) {
      throw new CompileInvariantError(`duplicate block alias '${block.alias}'`);
    }
    const names = new Set<string>();
    for (const field of [...block.dimensions, ...block.measures]) {
      if (names.has(field.name)) {
        throw new CompileInvariantError(`duplicate field '${field.name}' in block '${block.alias}'`);
      }
      names.add(field.name);
    }
    this.blocks.set(block.alias, block);
    return block;
  }

  get(alias: string): SelectBlock {
    const block = this.blocks.get(alias);
    if (!block) {
      throw new CompileInvariantError(`unknown block alias '${alias}'`);
    }
    return block;
  }

  has(alias: string): boolean {
    return this.blocks.has(alias);
  }

  /** Alias not yet used in this tree, derived from `prefix` */
  uniqueAlias(prefix: string): string {
    if (!this.blocks.has(prefix) && !this.counters.has(prefix)) {
      this.counters.set(prefix, 0);
      return prefix;
    }
    let n = this.counters.get(prefix) ?? 0;
    let alias: string;
    do {
      n += 1;
      alias = `${prefix}_${n}`;
    } while (this.blocks.has(alias));
    this.counters.set(prefix, n);
    return alias;
  }

  setRoot(alias: string): void {
    this.get(alias);
    this.rootAlias = alias;
  }

  get root(): SelectBlock {
    if (this.rootAlias === undefined) {
      throw new CompileInvariantError('plan tree has no root');
    }
    return this.get(this.rootAlias);
  }

  get size(): number {
    return this.blocks.size;
  }

  all(): SelectBlock[] {
    return [...this.blocks.values()];
  }

  /** Child aliases of a block: its source block, then its joins */
  children(block: SelectBlock): string[] {
    const aliases = block.from.kind === 'block' ? [block.from.alias] : [];
    return [...aliases, ...block.joins.map(j => j.alias)];
  }
}

// ---
// DEBUG OUTPUT
// ---

function describeBlock(tree: PlanTree, block: SelectBlock, depth: number, lines: string[]): void {
  const pad = '  '.repeat(depth);
  const source = block.from.kind === 'table' ? block.from.table : `(${block.from.alias})`;
  lines.push(`${pad}${block.alias}: from ${source}${block.groupBy ? ' [grouped]' : ''}`);
  if (block.dimensions.length) {
    lines.push(`${pad}  dimensions: [${block.dimensions.map(f => f.name).join(', ')}]`);
  }
  if (block.measures.length) {
    const measures = block.measures.map(f => (f.origin ? `${f.name}<${f.origin}>` : f.name));
    lines.push(`${pad}  measures: [${measures.join(', ')}]`);
  }
  if (block.where) lines.push(`${pad}  where: ${block.where.text}`);
  if (block.having) lines.push(`${pad}  having: ${block.having.text}`);
  if (block.orderBy.length) {
    lines.push(`${pad}  orderBy: [${block.orderBy.map(o => `${o.name}${o.desc ? ' desc' : ''}`).join(', ')}]`);
  }
  if (block.limit !== undefined) lines.push(`${pad}  limit: ${block.limit}`);
  if (block.offset !== undefined) lines.push(`${pad}  offset: ${block.offset}`);
  for (const join of block.joins) {
    lines.push(`${pad}  ${join.kind} join ${join.alias}${join.on ? ` on ${join.on.text}` : ''}`);
  }
  for (const child of tree.children(block)) {
    describeBlock(tree, tree.get(child), depth + 1, lines);
  }
}

/**
 * Human-readable dump of a plan tree for debugging
 */
export function printPlanTree(tree: PlanTree): string {
  const lines: string[] = ['PlanTree:', `  blocks: ${tree.size}`];
  describeBlock(tree, tree.root, 1, lines);
  for (const alias of tree.subqueries) {
    lines.push('  subquery:');
    describeBlock(tree, tree.get(alias), 2, lines);
  }
  return lines.join('\n');
}
