/**
 * HiGHS WASM solver interface.
 *
 * HiGHS is a high-performance solver for linear programming (LP) and
 * mixed-integer programming (MIP).
 */

import { SolverError, SolverUnavailableError } from '../error.js';
import { getLogger } from '../logger.js';
import type { SolverSettings, SolveStatus } from './settings.js';

/**
 * HiGHS solution column (variable info).
 * Using loose typing to match the library's various solution types.
 */
interface HighsSolutionColumn {
  Index?: number;
  Name?: string;
  Status?: string;
  Lower?: number;
  Upper?: number;
  Type?: string;
  Primal?: number;
  Dual?: number;
}

/**
 * HiGHS solution result.
 * Uses loose typing to handle different solution statuses.
 */
interface HighsSolution {
  Status: string;
  ObjectiveValue?: number;
  Columns?: Record<string, HighsSolutionColumn>;
  Rows?: Record<string, unknown>;
}

/**
 * HiGHS WASM module interface.
 */
export interface HighsWasm {
  solve(problem: string, options?: Record<string, unknown>): HighsSolution;
}

// Singleton HiGHS instance
let highsInstance: HighsWasm | null = null;
let highsLoading: Promise<HighsWasm> | null = null;

/**
 * Load HiGHS WASM module.
 *
 * @throws SolverUnavailableError when the module cannot be loaded
 */
export async function loadHiGHS(): Promise<HighsWasm> {
  if (highsInstance) {
    return highsInstance;
  }

  if (highsLoading) {
    return highsLoading;
  }

  highsLoading = (async () => {
    try {
      const highsModule = await import('highs');
      const highsLoader = highsModule.default;
      highsInstance = (await highsLoader()) as unknown as HighsWasm;
      getLogger().debug('loaded HiGHS');
      return highsInstance;
    } catch (e) {
      highsLoading = null;
      throw new SolverUnavailableError(
        `Failed to load HiGHS WASM: ${e instanceof Error ? e.message : String(e)}`
      );
    }
  })();

  return highsLoading;
}

/**
 * Reset the HiGHS singleton instance.
 * Useful for testing or recovering from WASM errors.
 */
export function resetHiGHS(): void {
  highsInstance = null;
  highsLoading = null;
}

/**
 * Result from solving an LP/MIP problem.
 */
export interface LPSolveResult {
  status: SolveStatus;
  objVal: number | null;
  /** Map from column name to primal value */
  primalMap: Map<string, number> | null;
  solveTime: number;
}

// Matched in order against the lower-cased HiGHS model status
const STATUS_PATTERNS: ReadonlyArray<readonly [RegExp, SolveStatus]> = [
  [/^optimal$/, 'optimal'],
  [/infeasible or unbounded/, 'infeasible_or_unbounded'],
  [/infeasible/, 'infeasible'],
  [/unbounded/, 'unbounded'],
  [/time limit/, 'time_limit'],
  [/iteration|limit/, 'max_iterations'],
  [/error/, 'numerical_error'],
];

/**
 * Convert a HiGHS model status to SolveStatus.
 */
export function parseHighsStatus(status: string): SolveStatus {
  const s = status.toLowerCase();
  const match = STATUS_PATTERNS.find(([pattern]) => pattern.test(s));
  return match ? match[1] : 'unknown';
}

/**
 * Build HiGHS options from solver settings.
 */
export function buildHighsOptions(settings: SolverSettings): Record<string, unknown> {
  const options: Record<string, unknown> = {};

  if (settings.verbose !== undefined) {
    options.output_flag = settings.verbose;
  }
  if (settings.maxIter !== undefined) {
    options.simplex_iteration_limit = settings.maxIter;
    options.mip_max_nodes = settings.maxIter;
  }
  if (settings.timeLimit !== undefined) {
    options.time_limit = settings.timeLimit;
  }
  if (settings.tolGapAbs !== undefined) {
    options.mip_abs_gap = settings.tolGapAbs;
  }
  if (settings.tolGapRel !== undefined) {
    options.mip_rel_gap = settings.tolGapRel;
  }

  return options;
}

function run(highs: HighsWasm, lpString: string, options: Record<string, unknown>): HighsSolution {
  try {
    return highs.solve(lpString, options);
  } catch (e) {
    // The WASM instance is unusable after an abort; load a fresh one next time
    resetHiGHS();
    throw new SolverError(`HiGHS solver error: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/**
 * Solve a linear/mixed-integer programming problem.
 *
 * When presolve only finds that the problem is infeasible or unbounded,
 * the model is solved again without presolve to learn which.
 *
 * @param lpString - Problem in CPLEX LP format
 * @param settings - Solver settings
 */
export async function solveLP(lpString: string, settings: SolverSettings = {}): Promise<LPSolveResult> {
  const startTime = performance.now();

  const highs = await loadHiGHS();
  const options = buildHighsOptions(settings);

  let result = run(highs, lpString, options);
  let status = parseHighsStatus(result.Status);
  if (status === 'infeasible_or_unbounded') {
    getLogger().debug({ status: result.Status }, 'solving again without presolve');
    result = run(highs, lpString, { ...options, presolve: 'off' });
    status = parseHighsStatus(result.Status);
  }

  const solveTime = (performance.now() - startTime) / 1000;
  const objVal = result.ObjectiveValue ?? null;

  if (status !== 'optimal' || !result.Columns) {
    return { status, objVal, primalMap: null, solveTime };
  }

  const primalMap = new Map<string, number>();
  for (const [name, col] of Object.entries(result.Columns)) {
    primalMap.set(name, col.Primal ?? 0);
  }
  return { status, objVal, primalMap, solveTime };
}
