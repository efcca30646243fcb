import { describe, it, expect } from 'vitest';
import { enumerate, expand, evaluateDomain } from '../../src/compiler/index.js';
import { SymbolEnvironment } from '../../src/env/index.js';
import { VariableRegistry } from '../../src/registry/index.js';
import { gen, range, list, sym, add } from '../../src/ast/index.js';
import { DslError } from '../../src/error.js';

const params = {
  suppliers: ['S1', 'S2'],
  supply: { S1: 20, S2: 25 },
  n: 2,
  nested: [[1, 2]],
};

function root(): SymbolEnvironment {
  return SymbolEnvironment.root(params, new VariableRegistry(), 'test');
}

describe('evaluateDomain', () => {
  it('evaluates inclusive ranges', () => {
    expect(evaluateDomain(range(1, 3), root())).toEqual([1, 2, 3]);
    expect(evaluateDomain(range(3, 1), root())).toEqual([]);
    expect(evaluateDomain(range(1, sym('n')), root())).toEqual([1, 2]);
  });

  it('evaluates lists, list parameters and map keys', () => {
    expect(evaluateDomain(list('a', add(1, 1)), root())).toEqual(['a', 2]);
    expect(evaluateDomain(sym('suppliers'), root())).toEqual(['S1', 'S2']);
    expect(evaluateDomain(sym('supply'), root())).toEqual(['S1', 'S2']);
  });

  it('rejects scalars and lists of lists', () => {
    expect(() => evaluateDomain(sym('n'), root())).toThrow(DslError);
    expect(() => evaluateDomain(sym('nested'), root())).toThrow(/domain item 0 is list of 2/);
  });

  it('rejects fractional range bounds', () => {
    expect(() => evaluateDomain(range(1, 2.5), root())).toThrow(/range bounds must be integers/);
  });
});

describe('enumerate', () => {
  it('varies the first clause slowest', () => {
    const points = enumerate([gen('i', range(1, 2)), gen('c', ['a', 'b'])], root(), evaluateDomain);
    expect(points.map((p) => [...p.bindings.values()])).toEqual([
      [1, 'a'],
      [1, 'b'],
      [2, 'a'],
      [2, 'b'],
    ]);
  });

  it('binds each point in its environment', () => {
    const [point] = enumerate([gen('s', 'suppliers')], root(), evaluateDomain);
    expect(point?.env.resolve('s')).toEqual({ kind: 'binding', value: 'S1' });
  });

  it('yields nothing when any domain is empty', () => {
    expect(enumerate([gen('i', range(1, 2)), gen('j', [])], root(), evaluateDomain)).toEqual([]);
  });

  it('yields one empty point without clauses', () => {
    const points = enumerate([], root(), evaluateDomain);
    expect(points).toHaveLength(1);
    expect(points[0]?.bindings.size).toBe(0);
  });

  it('evaluates later domains under earlier bindings', () => {
    const pairs = expand([gen('i', range(1, 3)), gen('j', range(sym('i'), 3))], root(), evaluateDomain, (p) =>
      [...p.bindings.values()].join('-')
    );
    expect(pairs).toEqual(['1-1', '1-2', '1-3', '2-2', '2-3', '3-3']);
  });
});
