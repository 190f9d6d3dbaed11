/**
 * Security policy as seen by the compiler: a yes/no visibility check per
 * field and an optional row filter ANDed into every base filter.
 */

import type { Expression } from './ast.js';

export interface SecurityPolicy {
  /** row-level restriction, ANDed into every WHERE built from the base table */
  readonly rowFilter?: Expression;
  canAccessField(name: string): boolean;
}

export const allowAllPolicy: SecurityPolicy = {
  canAccessField: () => true,
};

/**
 * Policy exposing only the listed fields, with an optional row filter
 */
export function restrictToFields(fields: Iterable<string>, rowFilter?: Expression): SecurityPolicy {
  const allowed = new Set(fields);
  return {
    ...(rowFilter ? { rowFilter } : {}),
    canAccessField: (name: string) => allowed.has(name),
  };
}
