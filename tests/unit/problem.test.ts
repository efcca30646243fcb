import { describe, it, expect } from 'vitest';
import {
  Problem,
  DslError,
  gen,
  v,
  sym,
  at,
  sum,
  add,
  mul,
  le,
  ge,
  eq,
  range,
  forEach,
  interpolate,
  formatPolynomial,
  polyEquals,
  _,
  type DslErrorKind,
} from '../../src/index.js';

function failure(fn: () => unknown): DslError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DslError) return e;
    throw e;
  }
  throw new Error('expected a DslError');
}

function kind(fn: () => unknown): DslErrorKind {
  return failure(fn).kind;
}

function transport(): Problem {
  return Problem.create({
    name: 'transport',
    direction: 'minimize',
    params: {
      suppliers: ['S1', 'S2'],
      customers: ['C1', 'C2'],
      supply: { S1: 20, S2: 25 },
    },
  }).variables('ship', [gen('s', 'suppliers'), gen('c', 'customers')], 'continuous', { min: 0 });
}

describe('Problem.create', () => {
  it('starts empty', () => {
    const problem = Problem.create({ name: 'empty', description: 'nothing yet' });
    expect(problem.name).toBe('empty');
    expect(problem.description).toBe('nothing yet');
    expect(problem.direction).toBeUndefined();
    expect(problem.families).toEqual([]);
    expect(problem.getConstraints()).toEqual([]);
    expect(problem.getObjective()).toBeNull();
  });

  it('freezes parameters', () => {
    const problem = Problem.create({ name: 'p', params: { cap: [1, 2] } });
    expect(Object.isFrozen(problem.params)).toBe(true);
    expect(Object.isFrozen(problem.params.cap)).toBe(true);
  });
});

describe('variables', () => {
  it('declares one instance per binding', () => {
    const problem = transport();
    expect(problem.instances.map((i) => i.id)).toEqual([
      'ship(S1,C1)',
      'ship(S1,C2)',
      'ship(S2,C1)',
      'ship(S2,C2)',
    ]);
    expect(problem.getFamily('ship')).toMatchObject({ type: 'continuous', arity: 2, size: 4 });
    expect(problem.getVariable('ship', 'S2', 'C1')).toMatchObject({ min: 0, max: Infinity });
  });

  it('escapes index components that read as numbers', () => {
    const problem = Problem.create({ name: 'p' }).variables('cost', [gen('i', ['e5', 'normal'])], 'continuous');
    expect(problem.instances.map((i) => i.id)).toEqual(['cost(var_e5)', 'cost(normal)']);
    expect(problem.getVariable('cost', 'e5').id).toBe('cost(var_e5)');
    expect(problem.getVariable('cost', 'normal').id).toBe('cost(normal)');
  });

  it('evaluates bounds per binding', () => {
    const problem = Problem.create({ name: 'p', params: { caps: [4, 7] } }).variables(
      'y',
      [gen('i', range(0, 1))],
      'integer',
      { min: 0, max: at('caps', sym('i')) }
    );
    expect(problem.getVariable('y', 0).max).toBe(4);
    expect(problem.getVariable('y', 1).max).toBe(7);
  });

  it('treats Infinity as unbounded', () => {
    const problem = Problem.create({ name: 'p' }).variable('x', 'continuous', { min: -Infinity, max: Infinity });
    expect(problem.getVariable('x')).toMatchObject({ min: -Infinity, max: Infinity });
  });

  it('interpolates instance descriptions', () => {
    const problem = Problem.create({ name: 'p' }).variables('x', [gen('i', [1, 2])], 'binary', {
      description: 'pick item {i}',
    });
    expect(problem.getVariable('x', 2).description).toBe('pick item 2');
    expect(problem.getVariable('x', 2)).toMatchObject({ min: 0, max: 1 });
  });

  it('rejects bounds on binary variables', () => {
    expect(kind(() => Problem.create({ name: 'p' }).variable('b', 'binary', { max: 1 }))).toBe('InvalidBounds');
  });

  it('rejects non-integral bounds on integer variables', () => {
    const error = failure(() =>
      Problem.create({ name: 'p' }).variables('n', [gen('i', [1])], 'integer', { max: 2.5 })
    );
    expect(error.kind).toBe('InvalidBounds');
    expect(error.context.declaration).toBe('variables n [i <- [1]]');
    expect(error.context.bindings).toEqual({ i: 1 });
  });

  it('rejects a redeclaration with another type', () => {
    const problem = Problem.create({ name: 'p' }).variable('x', 'continuous');
    expect(kind(() => problem.variable('x', 'integer'))).toBe('DuplicateFamily');
  });

  it('adds instances when redeclared with the same type', () => {
    const problem = Problem.create({ name: 'p' })
      .variables('x', [gen('i', [1, 2])], 'continuous')
      .variables('x', [gen('i', [3])], 'continuous');
    expect(problem.getFamily('x')).toMatchObject({ declarations: 2, size: 3 });
    // The two declarations cover different values, so a wildcard is ambiguous
    expect(kind(() => problem.constraint(le(sum(v('x', _)), 1)))).toBe('UnresolvedWildcardDomain');
  });

  it('leaves the problem unchanged when a declaration fails', () => {
    const problem = Problem.create({ name: 'p', params: { caps: [4, 7] } });
    expect(kind(() => problem.variables('y', [gen('i', range(1, 2))], 'integer', { max: at('caps', sym('i')) }))).toBe(
      'IndexOutOfBounds'
    );
    expect(problem.getFamily('y')).toBeUndefined();
    expect(problem.instances).toEqual([]);
  });

  it('rejects invalid family names', () => {
    expect(kind(() => Problem.create({ name: 'p' }).variable('not valid', 'continuous'))).toBe('InvalidName');
  });
});

describe('constraints', () => {
  it('compiles the transportation balance', () => {
    const problem = transport().constraints(
      [gen('s', 'suppliers')],
      le(sum(v('ship', sym('s'), _)), at('supply', sym('s')))
    );
    const constraints = problem.getConstraints();
    expect(constraints).toHaveLength(2);

    const [first, second] = constraints;
    expect(first?.id).toBe('c00000000');
    expect(first?.name).toBe('constraint_S1');
    expect(first && formatPolynomial(first.lhs)).toBe('ship(S1,C1) + ship(S1,C2)');
    expect(first?.op).toBe('<=');
    expect(first?.rhs).toBe(20);
    expect(first?.bindings).toEqual({ s: 'S1' });

    expect(second?.id).toBe('c00000001');
    expect(second && formatPolynomial(second.lhs)).toBe('ship(S2,C1) + ship(S2,C2)');
    expect(second?.rhs).toBe(25);
  });

  it('names constraints from descriptions', () => {
    const problem = transport()
      .constraints([gen('s', 'suppliers')], le(sum(v('ship', sym('s'), _)), at('supply', sym('s'))), 'supply_{s}')
      .constraints([gen('c', 'customers')], ge(sum(v('ship', _, sym('c'))), 1), (b) => `demand of ${String(b.c)}`);
    expect(problem.getConstraints().map((c) => c.name)).toEqual([
      'supply_S1',
      'supply_S2',
      'demand of C1',
      'demand of C2',
    ]);
    expect(problem.getConstraints().map((c) => c.id)).toEqual([
      'c00000000',
      'c00000001',
      'c00000002',
      'c00000003',
    ]);
    expect(problem.getConstraint('c00000002')?.description).toBe('demand of C1');
  });

  it('names a scalar constraint without description "constraint"', () => {
    const problem = transport().constraint(le(v('ship', 'S1', 'C1'), 5));
    expect(problem.getConstraint('c00000000')?.name).toBe('constraint');
  });

  it('keeps constant-only constraints', () => {
    const problem = transport().constraint(eq(mul(0, v('ship', 'S1', 'C1')), 0));
    const [constraint] = problem.getConstraints();
    expect(constraint?.lhs.terms.size).toBe(0);
    expect(constraint?.rhs).toBe(0);
  });

  it('fails on undefined symbols with the symbol name', () => {
    const problem = transport();
    const error = failure(() => problem.constraint(le(add(v('ship', 'S1', 'C1'), sym('ghost')), 1)));
    expect(error.kind).toBe('UndefinedSymbol');
    expect(error.symbol).toBe('ghost');
    expect(error.context.declaration).toBe('constraints ship("S1", "C1") + ghost <= 1');
    expect(error.context.expression).toBe('ghost');
  });

  it('adds nothing when one binding fails', () => {
    const problem = transport();
    const error = failure(() =>
      problem.constraints([gen('c', ['C1', 'C2', 'C3'])], le(v('ship', 'S1', sym('c')), 3))
    );
    expect(error.kind).toBe('UndefinedVariable');
    expect(error.context.bindings).toEqual({ c: 'C3' });
    expect(problem.getConstraints()).toEqual([]);
  });

  it('steps numeric map keys with index arithmetic', () => {
    const problem = Problem.create({ name: 'plan', params: { demand: { 1: 5, 2: 6 } } })
      .variables('x', [gen('t', range(1, 3))], 'continuous', { min: 0 })
      .constraints([gen('t', 'demand')], le(v('x', add(sym('t'), 1)), at('demand', sym('t'))));
    const constraints = problem.getConstraints();
    expect(constraints.map((c) => formatPolynomial(c.lhs))).toEqual(['x(2)', 'x(3)']);
    expect(constraints.map((c) => c.rhs)).toEqual([5, 6]);
    expect(constraints.map((c) => c.bindings)).toEqual([{ t: '1' }, { t: '2' }]);
  });

  it('compiles wildcards and explicit comprehensions alike', () => {
    const problem = transport()
      .constraint(le(sum(v('ship', 'S1', _)), 1))
      .constraint(le(sum(forEach([gen('c', 'customers')], v('ship', 'S1', sym('c')))), 1));
    const [a, b] = problem.getConstraints();
    expect(a && b && polyEquals(a.lhs, b.lhs)).toBe(true);
  });
});

describe('objective', () => {
  it('keeps only the last objective', () => {
    const problem = transport()
      .objective(sum(v('ship', _, _)))
      .objective(mul(2, v('ship', 'S1', 'C1')), 'maximize');
    const objective = problem.getObjective();
    expect(objective?.direction).toBe('maximize');
    expect(objective && formatPolynomial(objective.polynomial)).toBe('2 ship(S1,C1)');
    expect(problem.direction).toBe('maximize');
  });

  it('uses the default direction', () => {
    expect(transport().objective(v('ship', 'S1', 'C1')).getObjective()?.direction).toBe('minimize');
  });

  it('rejects unknown directions', () => {
    expect(kind(() => transport().objective(v('ship', 'S1', 'C1'), 'sideways'))).toBe('InvalidDirection');
    const undirected = Problem.create({ name: 'p' }).variable('x', 'continuous');
    expect(kind(() => undirected.objective(sym('x')))).toBe('InvalidDirection');
  });
});

describe('modify', () => {
  it('applies further declarations', () => {
    const problem = transport().modify((p) => p.variable('slack', 'continuous', { min: 0 }));
    expect(problem.getFamily('slack')?.size).toBe(1);
  });
});

describe('snapshot', () => {
  it('exposes linear rows over variable ids', () => {
    const problem = Problem.create({ name: 'small', direction: 'maximize' })
      .variable('x', 'continuous', { min: 0 })
      .variable('y', 'binary')
      .constraint(le(add(sym('x'), sym('y')), 3))
      .objective(add(sym('x'), mul(2, sym('y')), 1));

    expect(problem.snapshot()).toEqual({
      name: 'small',
      variables: [
        { id: 'x', type: 'continuous', min: 0, max: Infinity },
        { id: 'y', type: 'binary', min: 0, max: 1 },
      ],
      constraints: [
        {
          id: 'c00000000',
          name: 'constraint',
          coefficients: new Map([
            ['x', 1],
            ['y', 1],
          ]),
          constant: 0,
          op: '<=',
          rhs: 3,
        },
      ],
      objective: {
        coefficients: new Map([
          ['x', 1],
          ['y', 2],
        ]),
        constant: 1,
        direction: 'maximize',
      },
    });
  });
});

describe('interpolate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(interpolate('cap_{s}_{c}', { s: 'S1', c: 2 })).toBe('cap_S1_2');
    expect(interpolate('cap_{t}', { s: 'S1' })).toBe('cap_{t}');
  });
});
