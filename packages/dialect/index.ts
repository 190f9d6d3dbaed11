export type { Dialect, JoinKind, TruncateOptions } from './dialect.js';
export { AnsiDialect, type IntervalUnit } from './base.js';
export { DuckDBDialect } from './duckdb.js';
export { ClickHouseDialect } from './clickhouse.js';
export { DruidDialect } from './druid.js';
export { PostgresDialect } from './postgres.js';
export { registerDialect, getDialect, hasDialect, listDialects } from './registry.js';
