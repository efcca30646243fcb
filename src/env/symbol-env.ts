import { DslError, type BindingValue, type ErrorContext } from '../error.js';
import type { ParamMap, ParamValue } from '../params/index.js';
import type { VariableFamily, VariableRegistry } from '../registry/index.js';

/**
 * What a bare identifier refers to.
 */
export type Resolution =
  | { readonly kind: 'binding'; readonly value: BindingValue }
  | { readonly kind: 'parameter'; readonly value: ParamValue }
  | { readonly kind: 'family'; readonly family: VariableFamily }
  | { readonly kind: 'undefined' };

type Scope = ReadonlyMap<string, BindingValue>;

/**
 * Read-only symbol scope for one compilation entry point.
 *
 * Lookup order is generator bindings (innermost scope first), then model
 * parameters, then variable families. `child` returns a new environment
 * with one more binding scope; environments are never mutated.
 */
export class SymbolEnvironment {
  private readonly _scopes: readonly Scope[];
  readonly params: ParamMap;
  readonly registry: VariableRegistry;
  /** Declaration being compiled, for error context */
  readonly declaration?: string;

  private constructor(
    scopes: readonly Scope[],
    params: ParamMap,
    registry: VariableRegistry,
    declaration: string | undefined
  ) {
    this._scopes = scopes;
    this.params = params;
    this.registry = registry;
    this.declaration = declaration;
  }

  /**
   * Environment with no generator bindings.
   */
  static root(params: ParamMap, registry: VariableRegistry, declaration?: string): SymbolEnvironment {
    return new SymbolEnvironment([], params, registry, declaration);
  }

  /**
   * Environment with `bindings` as a new innermost scope.
   */
  child(bindings: ReadonlyMap<string, BindingValue> | Readonly<Record<string, BindingValue>>): SymbolEnvironment {
    const scope: Scope = bindings instanceof Map ? bindings : new Map(Object.entries(bindings));
    return new SymbolEnvironment([...this._scopes, scope], this.params, this.registry, this.declaration);
  }

  /** Same scopes, different declaration label */
  forDeclaration(declaration: string): SymbolEnvironment {
    return new SymbolEnvironment(this._scopes, this.params, this.registry, declaration);
  }

  /**
   * Resolve a bare identifier.
   *
   * @throws DslError `AmbiguousSymbol` when the name is both a model
   * parameter and a variable family and no binding shadows it.
   */
  resolve(name: string): Resolution {
    for (let i = this._scopes.length - 1; i >= 0; i--) {
      const value = this._scopes[i]?.get(name);
      if (value !== undefined) {
        return { kind: 'binding', value };
      }
    }

    const isParam = Object.prototype.hasOwnProperty.call(this.params, name);
    const family = this.registry.getFamily(name);
    if (isParam && family) {
      throw new DslError('AmbiguousSymbol', `${name} is both a model parameter and a variable family`, {
        symbol: name,
        context: this.context(),
      });
    }
    if (isParam) {
      return { kind: 'parameter', value: this.params[name] ?? null };
    }
    if (family) {
      return { kind: 'family', family };
    }
    return { kind: 'undefined' };
  }

  /**
   * Resolve a bare identifier, failing when it is undefined.
   *
   * @throws DslError `UndefinedSymbol`
   */
  require(name: string): Exclude<Resolution, { kind: 'undefined' }> {
    const resolution = this.resolve(name);
    if (resolution.kind === 'undefined') {
      throw new DslError(
        'UndefinedSymbol',
        `${name} is not a generator binding, model parameter or variable family`,
        { symbol: name, context: this.context() }
      );
    }
    return resolution;
  }

  /** Flattened view of the active bindings, innermost winning */
  bindings(): Record<string, BindingValue> {
    const flat: Record<string, BindingValue> = {};
    for (const scope of this._scopes) {
      for (const [name, value] of scope) {
        flat[name] = value;
      }
    }
    return flat;
  }

  /** Error context for this environment */
  context(expression?: string): ErrorContext {
    return { declaration: this.declaration, bindings: this.bindings(), expression };
  }
}
