/**
 * PostgreSQL: numbered placeholders, ordinal GROUP BY, and no approximate
 * comparisons since a full join costs the same as a one-sided one.
 */

import { AnsiDialect } from './base.js';

export class PostgresDialect extends AnsiDialect {
  readonly name = 'postgres';

  override readonly supportsApproximateComparisons = false;
  override readonly groupByOrdinals = true;
  protected override readonly doubleType = 'DOUBLE PRECISION';

  override placeholder(position: number): string {
    return `$${position}`;
  }
}
