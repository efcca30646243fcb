import { describe, it, expect } from 'vitest';
import { parseHighsStatus, buildHighsOptions, solve } from '../../src/solver/index.js';
import { InfeasibleError, Problem, le, mul, sym } from '../../src/index.js';

describe('parseHighsStatus', () => {
  it('maps HiGHS model statuses', () => {
    expect(parseHighsStatus('Optimal')).toBe('optimal');
    expect(parseHighsStatus('Infeasible')).toBe('infeasible');
    expect(parseHighsStatus('Primal infeasible or unbounded')).toBe('infeasible_or_unbounded');
    expect(parseHighsStatus('Primal infeasible')).toBe('infeasible');
    expect(parseHighsStatus('Unbounded')).toBe('unbounded');
    expect(parseHighsStatus('Time limit reached')).toBe('time_limit');
    expect(parseHighsStatus('Iteration limit reached')).toBe('max_iterations');
    expect(parseHighsStatus('Solve error')).toBe('numerical_error');
    expect(parseHighsStatus('Not Set')).toBe('unknown');
  });
});

describe('buildHighsOptions', () => {
  it('translates settings to HiGHS option names', () => {
    expect(buildHighsOptions({ verbose: false, maxIter: 100, timeLimit: 5, tolGapAbs: 0, tolGapRel: 0.01 })).toEqual({
      output_flag: false,
      simplex_iteration_limit: 100,
      mip_max_nodes: 100,
      time_limit: 5,
      mip_abs_gap: 0,
      mip_rel_gap: 0.01,
    });
    expect(buildHighsOptions({})).toEqual({});
  });
});

describe('solve', () => {
  it('reports a violated constant-only constraint as infeasible', async () => {
    const problem = Problem.create({ name: 'p' })
      .variable('x', 'continuous', { min: 0 })
      .constraint(le(mul(0, sym('x')), -1), 'impossible');
    await expect(solve(problem.snapshot())).rejects.toThrow(InfeasibleError);
    await expect(problem.solve()).rejects.toThrow('Problem is infeasible: constraint impossible (c00000000) cannot hold');
  });
});
