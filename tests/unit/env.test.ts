import { describe, it, expect } from 'vitest';
import { SymbolEnvironment } from '../../src/env/index.js';
import { VariableRegistry } from '../../src/registry/index.js';
import { DslError } from '../../src/error.js';

function setup(): SymbolEnvironment {
  const registry = new VariableRegistry();
  registry.declareFamily('x', 'continuous');
  registry.declareFamily('both', 'continuous');
  return SymbolEnvironment.root({ cap: [10, 20], n: 3, both: 1 }, registry, 'constraints test');
}

describe('SymbolEnvironment', () => {
  it('resolves parameters and families', () => {
    const env = setup();
    expect(env.resolve('n')).toEqual({ kind: 'parameter', value: 3 });
    expect(env.resolve('x').kind).toBe('family');
    expect(env.resolve('nothing')).toEqual({ kind: 'undefined' });
  });

  it('lets bindings shadow parameters and families', () => {
    const env = setup().child({ n: 7, x: 'a' });
    expect(env.resolve('n')).toEqual({ kind: 'binding', value: 7 });
    expect(env.resolve('x')).toEqual({ kind: 'binding', value: 'a' });
  });

  it('prefers the innermost binding', () => {
    const env = setup().child({ i: 1 }).child({ i: 2, j: 3 });
    expect(env.resolve('i')).toEqual({ kind: 'binding', value: 2 });
    expect(env.bindings()).toEqual({ i: 2, j: 3 });
  });

  it('never mutates the parent', () => {
    const parent = setup().child({ i: 1 });
    parent.child({ i: 2 });
    expect(parent.resolve('i')).toEqual({ kind: 'binding', value: 1 });
  });

  it('reports names that are both parameter and family', () => {
    const env = setup();
    expect(() => env.resolve('both')).toThrow(DslError);
    try {
      env.resolve('both');
    } catch (e) {
      expect(e instanceof DslError && e.kind).toBe('AmbiguousSymbol');
    }
    expect(env.child({ both: 5 }).resolve('both')).toEqual({ kind: 'binding', value: 5 });
  });

  it('fails on undefined names with the declaration in context', () => {
    const env = setup().child({ i: 2 });
    let error: unknown;
    try {
      env.require('missing');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(DslError);
    if (error instanceof DslError) {
      expect(error.kind).toBe('UndefinedSymbol');
      expect(error.symbol).toBe('missing');
      expect(error.context.declaration).toBe('constraints test');
      expect(error.message).toBe(
        'UndefinedSymbol: missing is not a generator binding, model parameter or variable family' +
          '\n  in declaration: constraints test' +
          '\n  with bindings: i=2'
      );
    }
  });
});
