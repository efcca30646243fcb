/**
 * Base error class for lindsl.
 */
export class ModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelError';
  }
}

/**
 * Compilation error kinds. All of them are raised before anything reaches
 * the solver.
 */
export type DslErrorKind =
  | 'UndefinedSymbol'
  | 'UndefinedVariable'
  | 'UndefinedConstant'
  | 'AmbiguousSymbol'
  | 'DuplicateFamily'
  | 'InvalidBounds'
  | 'InvalidName'
  | 'ArityMismatch'
  | 'IndexOutOfBounds'
  | 'MissingKey'
  | 'NonlinearExpression'
  | 'UnsupportedOperation'
  | 'WildcardOutsideAggregation'
  | 'UnresolvedWildcardDomain'
  | 'InvalidDirection';

/** Scalar value a generator symbol can be bound to. */
export type BindingValue = number | string | boolean;

/**
 * Where a compilation error happened: the declaration being compiled, the
 * generator values active at the time and the offending expression.
 */
export interface ErrorContext {
  readonly declaration?: string;
  readonly bindings?: Readonly<Record<string, BindingValue>>;
  readonly expression?: string;
}

function formatBindings(bindings: Readonly<Record<string, BindingValue>>): string {
  return Object.entries(bindings)
    .map(([name, value]) => `${name}=${JSON.stringify(value)}`)
    .join(', ');
}

/**
 * Error thrown when a declaration cannot be compiled.
 */
export class DslError extends ModelError {
  readonly kind: DslErrorKind;
  readonly detail: string;
  readonly symbol?: string;
  readonly context: ErrorContext;

  constructor(kind: DslErrorKind, detail: string, options: { symbol?: string; context?: ErrorContext } = {}) {
    const context = options.context ?? {};
    const parts = [`${kind}: ${detail}`];
    if (context.expression !== undefined) {
      parts.push(`in expression: ${context.expression}`);
    }
    if (context.declaration !== undefined) {
      parts.push(`in declaration: ${context.declaration}`);
    }
    if (context.bindings !== undefined && Object.keys(context.bindings).length > 0) {
      parts.push(`with bindings: ${formatBindings(context.bindings)}`);
    }
    super(parts.join('\n  '));
    this.name = 'DslError';
    this.kind = kind;
    this.detail = detail;
    this.symbol = options.symbol;
    this.context = context;
  }

  /**
   * Return a copy of this error with missing context fields filled in.
   * Fields already set (closest to the failure) win.
   */
  withContext(context: ErrorContext): DslError {
    return new DslError(this.kind, this.detail, {
      symbol: this.symbol,
      context: {
        declaration: this.context.declaration ?? context.declaration,
        bindings: this.context.bindings ?? context.bindings,
        expression: this.context.expression ?? context.expression,
      },
    });
  }
}

/**
 * Error thrown when configuration values are invalid.
 */
export class ConfigError extends ModelError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when solver encounters an issue.
 */
export class SolverError extends ModelError {
  constructor(message: string) {
    super(message);
    this.name = 'SolverError';
  }
}

/**
 * Error thrown when problem is infeasible.
 */
export class InfeasibleError extends SolverError {
  constructor(message = 'Problem is infeasible') {
    super(message);
    this.name = 'InfeasibleError';
  }
}

/**
 * Error thrown when problem is unbounded.
 */
export class UnboundedError extends SolverError {
  constructor(message = 'Problem is unbounded') {
    super(message);
    this.name = 'UnboundedError';
  }
}

/**
 * Error thrown when the solver cannot be loaded.
 */
export class SolverUnavailableError extends SolverError {
  constructor(message = 'Solver is unavailable') {
    super(message);
    this.name = 'SolverUnavailableError';
  }
}
