import type { BindingValue } from '../error.js';
import { InfeasibleError, SolverError, UnboundedError } from '../error.js';
import { getLogger } from '../logger.js';
import type { VariableId } from '../poly/index.js';
import type { ProblemSnapshot, SnapshotVariable } from '../problem.js';
import { canonicalName } from '../registry/index.js';
import { solveLP } from './highs.js';
import { generateLP, rowKind } from './lp-format.js';
import { resolveSettings, type SolverSettings, type SolveStatus } from './settings.js';

/**
 * Solution from solving a problem.
 */
export interface Solution {
  /** Solve status */
  readonly status: SolveStatus;
  /** Objective value, including the objective's constant term */
  readonly objectiveValue: number;
  /** Value per canonical variable id */
  readonly values: ReadonlyMap<VariableId, number>;
  /** Solve time in seconds */
  readonly solveTime: number;

  /**
   * Get the value of a variable instance.
   *
   * @example
   * ```ts
   * const solution = await problem.solve();
   * solution.valueOf('ship', 'S1', 'C2');   // 12
   * ```
   */
  valueOf(family: string, ...index: BindingValue[]): number | undefined;
}

// Value for a variable the solver dropped because nothing references it
function restingValue(variable: SnapshotVariable): number {
  return Math.min(Math.max(0, variable.min), variable.max);
}

/**
 * Solve a problem snapshot with HiGHS.
 *
 * Constraints without variable terms never reach the solver: a violated
 * one makes the problem infeasible up front.
 *
 * @throws InfeasibleError if the problem is infeasible
 * @throws UnboundedError if the problem is unbounded
 * @throws SolverUnavailableError if HiGHS cannot be loaded
 * @throws SolverError if the solver fails or stops without an optimum
 */
export async function solve(snapshot: ProblemSnapshot, settings: SolverSettings = {}): Promise<Solution> {
  const log = getLogger();
  const resolved = resolveSettings(settings);

  const violated = snapshot.constraints.find((c) => rowKind(c) === 'violated');
  if (violated) {
    throw new InfeasibleError(`Problem is infeasible: constraint ${violated.name} (${violated.id}) cannot hold`);
  }

  const { lpString, objectiveOffset, rows, columns } = generateLP(snapshot);
  log.debug({ problem: snapshot.name, variables: snapshot.variables.length, rows: rows.size }, 'generated LP');

  const result = await solveLP(lpString, resolved);
  log.info({ problem: snapshot.name, status: result.status, solveTime: result.solveTime }, 'solve finished');

  // Handle error statuses
  if (result.status === 'infeasible') {
    throw new InfeasibleError('Problem is infeasible');
  }
  if (result.status === 'unbounded') {
    throw new UnboundedError('Problem is unbounded');
  }
  if (result.status === 'infeasible_or_unbounded') {
    throw new SolverError('Problem is infeasible or unbounded');
  }
  if (result.status !== 'optimal' || !result.primalMap) {
    throw new SolverError(`Solver stopped without an optimal solution (status: ${result.status})`);
  }

  const primalMap = result.primalMap;
  const values = new Map<VariableId, number>();
  for (const variable of snapshot.variables) {
    const column = columns.get(variable.id);
    const primal = column === undefined ? undefined : primalMap.get(column);
    values.set(variable.id, primal ?? restingValue(variable));
  }

  return {
    status: result.status,
    objectiveValue: (result.objVal ?? 0) + objectiveOffset,
    values,
    solveTime: result.solveTime,
    valueOf: (family, ...index) => values.get(canonicalName(family, index)),
  };
}
