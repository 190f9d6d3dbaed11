import { AnsiDialect } from './base.js';

export class DuckDBDialect extends AnsiDialect {
  readonly name = 'duckdb';

  protected override toLocalTime(expr: string, timeZone: string): string {
    return `timezone(${this.escapeStringValue(timeZone)}, ${expr})`;
  }

  protected override fromLocalTime(expr: string, timeZone: string): string {
    return `timezone(${this.escapeStringValue(timeZone)}, ${expr})`;
  }
}
