/**
 * Compiler error taxonomy
 *
 * Every failure surfaced by a compilation is a CompileError. User errors
 * (a malformed query, a cap exceeded, a construct the dialect cannot express)
 * are kept apart from CompileInvariantError, which signals a defect.
 */

export type CompileErrorCode =
  | 'validation'
  | 'rewrite'
  | 'cap_exceeded'
  | 'cancelled'
  | 'unsupported_feature'
  | 'invariant';

export class CompileError extends Error {
  readonly code: CompileErrorCode;

  constructor(code: CompileErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CompileError';
    this.code = code;
  }
}

/**
 * Malformed query. `field` is a path such as `measures[1].name` or `where`.
 */
export class ValidationError extends CompileError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('validation', `${field}: ${message}`);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export type RewritePassName =
  | 'time-range'
  | 'row-cap'
  | 'percent-of-total'
  | 'approximate-comparison'
  | 'dialect-normalization';

export class RewriteError extends CompileError {
  readonly pass: RewritePassName;

  constructor(
    pass: RewritePassName,
    message: string,
    options?: { cause?: unknown; code?: CompileErrorCode }
  ) {
    super(options?.code ?? 'rewrite', `[${pass}] ${message}`, options);
    this.name = 'RewriteError';
    this.pass = pass;
  }
}

export class CapExceededError extends RewriteError {
  readonly cap: number;
  readonly limit: number;

  constructor(limit: number, cap: number) {
    super('row-cap', `limit ${limit} exceeds the row cap of ${cap}`, { code: 'cap_exceeded' });
    this.name = 'CapExceededError';
    this.cap = cap;
    this.limit = limit;
  }
}

export class CompileCancelledError extends RewriteError {
  constructor(pass: RewritePassName, cause?: unknown) {
    super(pass, 'compilation cancelled', { cause, code: 'cancelled' });
    this.name = 'CompileCancelledError';
  }
}

export class UnsupportedFeatureError extends CompileError {
  readonly feature: string;
  readonly dialect: string;

  constructor(feature: string, dialect: string, detail?: string) {
    super(
      'unsupported_feature',
      `${feature} is not supported by the ${dialect} dialect${detail ? `: ${detail}` : ''}`
    );
    this.name = 'UnsupportedFeatureError';
    this.feature = feature;
    this.dialect = dialect;
  }
}

export class CompileInvariantError extends CompileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('invariant', `internal invariant violated: ${message}`, options);
    this.name = 'CompileInvariantError';
  }
}

export function isCompileError(error: unknown): error is CompileError {
  return error instanceof CompileError;
}

/**
 * Whether an error is caused by the request rather than by the compiler
 */
export function isUserError(error: unknown): error is CompileError {
  return isCompileError(error) && error.code !== 'invariant';
}
