/**
 * lindsl - indexed linear and mixed-integer models in TypeScript
 *
 * @example
 * ```ts
 * import { Problem, gen, v, sym, at, sum, forEach, mul, le, _ } from 'lindsl';
 *
 * const problem = Problem.create({
 *   name: 'transport',
 *   direction: 'minimize',
 *   params: {
 *     supply: { S1: 20, S2: 25 },
 *     customers: ['C1', 'C2'],
 *     cost: { S1: { C1: 2, C2: 4 }, S2: { C1: 3, C2: 1 } },
 *   },
 * })
 *   // ship(s, c) >= 0 for every supplier and customer
 *   .variables('ship', [gen('s', 'supply'), gen('c', 'customers')], 'continuous', { min: 0 })
 *   // sum(ship(s, _)) <= supply[s]
 *   .constraints([gen('s', 'supply')], le(sum(v('ship', sym('s'), _)), at('supply', sym('s'))), 'supply_{s}')
 *   .objective(sum(forEach([gen('s', 'supply'), gen('c', 'customers')],
 *     mul(at('cost', sym('s'), sym('c')), v('ship', sym('s'), sym('c'))))));
 *
 * const solution = await problem.solve();
 * console.log(solution.valueOf('ship', 'S1', 'C1'));
 * ```
 *
 * @packageDocumentation
 */

// === Expression nodes ===
export type {
  ArithmeticOp,
  ComparisonOp,
  Node,
  NodeKind,
  NodeInput,
  Domain,
  GeneratorClause,
  Comparison,
} from './ast/index.js';
export {
  toNode,
  lit,
  sym,
  wildcard,
  _,
  v,
  at,
  field,
  add,
  sub,
  mul,
  div,
  neg,
  sum,
  forEach,
  range,
  list,
  gen,
  le,
  ge,
  eq,
  isNode,
  containsWildcard,
  substituteWildcard,
  formatNode,
  formatClause,
  formatComparison,
} from './ast/index.js';

// === Model parameters ===
export type { ParamScalar, ParamMap, ParamValue } from './params/index.js';
export { lookupKey, domainValues, renderIndex } from './params/index.js';

// === Polynomials ===
export type { VariableId, Term, Polynomial } from './poly/index.js';
export {
  polyZero,
  polyConst,
  polyVariable,
  polyAdd,
  polySum,
  polyNeg,
  polySub,
  polyScale,
  polyMul,
  polyIsConstant,
  polyConstantTerm,
  polyWithoutConstant,
  polyDegree,
  polyVariables,
  polyLinearCoefficients,
  polyPrune,
  polyEquals,
  formatPolynomial,
} from './poly/index.js';

// === Variables ===
export type { VariableType, Bounds, VariableFamily, VariableInstance, IndexPattern } from './registry/index.js';
export { VariableRegistry, validateBounds, canonicalName, sanitizeComponent, ESCAPE_PREFIX } from './registry/index.js';

// === Compilation ===
export type { Resolution } from './env/index.js';
export { SymbolEnvironment } from './env/index.js';
export type { Value, NormalizedComparison, BindingPoint } from './compiler/index.js';
export {
  compileNode,
  compileConstant,
  compilePolynomial,
  compileComparison,
  compileObjective,
  evaluateDomain,
  enumerate,
  expand,
} from './compiler/index.js';

// === Problem ===
export type {
  Direction,
  Description,
  Constraint,
  Objective,
  ProblemOptions,
  VariableOptions,
  ProblemSnapshot,
  SnapshotVariable,
  SnapshotConstraint,
  SnapshotObjective,
} from './problem.js';
export { Problem, interpolate } from './problem.js';

// === Solver ===
export type { Solution, SolverSettings, SolveStatus, LPFormatResult } from './solver/index.js';
export { solve, generateLP, loadHiGHS, resetHiGHS } from './solver/index.js';

// === Errors ===
export type { DslErrorKind, BindingValue, ErrorContext } from './error.js';
export {
  ModelError,
  DslError,
  ConfigError,
  SolverError,
  InfeasibleError,
  UnboundedError,
  SolverUnavailableError,
} from './error.js';

// === Configuration and logging ===
export type { Config, LogLevel } from './config.js';
export { loadConfig } from './config.js';
export type { Logger, LoggerOptions } from './logger.js';
export { createLogger, getLogger, setLogger } from './logger.js';
