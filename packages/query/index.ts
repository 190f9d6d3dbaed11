/**
 * query package
 *
 * Query model, wire format, metrics-view schema, security policy and validation
 */

export * from './ast.js';
export * as q from './builders.js';
export {
  parseQuery,
  parseExpression,
  parseMetricsView,
  toExpression,
  toWireExpression,
  formatIssuePath,
  type WireExpression,
  type WireQuery,
} from './schema.js';
export {
  findDimension,
  findMeasure,
  resolveDimension,
  isTimeDimension,
  measureDependencies,
  type FieldType,
  type MetricsView,
  type MetricsViewDimension,
  type MetricsViewMeasure,
} from './metrics-view.js';
export { allowAllPolicy, restrictToFields, type SecurityPolicy } from './security.js';
export { validateQuery } from './validate.js';
