/**
 * Process-wide dialect registry
 *
 * Populated at module load with the shipped backends. Lookups are read-only
 * afterwards; registerDialect is meant for startup code adding a backend.
 */

import { ValidationError } from '../compiler/errors.js';
import { ClickHouseDialect } from './clickhouse.js';
import type { Dialect } from './dialect.js';
import { DruidDialect } from './druid.js';
import { DuckDBDialect } from './duckdb.js';
import { PostgresDialect } from './postgres.js';

const registry = new Map<string, Dialect>();

export function registerDialect(dialect: Dialect): void {
  const key = dialect.name.toLowerCase();
  if (registry.has(key)) {
    throw new Error(`Dialect '${dialect.name}' is already registered`);
  }
  registry.set(key, dialect);
}

export function getDialect(name: string): Dialect {
  const dialect = registry.get(name.toLowerCase());
  if (!dialect) {
    throw new ValidationError('dialect', `unknown dialect '${name}' (available: ${listDialects().join(', ')})`);
  }
  return dialect;
}

export function hasDialect(name: string): boolean {
  return registry.has(name.toLowerCase());
}

export function listDialects(): string[] {
  return [...registry.keys()].sort();
}

for (const dialect of [new DuckDBDialect(), new ClickHouseDialect(), new DruidDialect(), new PostgresDialect()]) {
  registerDialect(dialect);
}
