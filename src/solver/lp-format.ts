/**
 * CPLEX LP format generator.
 *
 * Converts a problem snapshot to an LP format string that HiGHS reads.
 * Columns are named `v0`, `v1`, ... in variable order: canonical ids such
 * as a scalar `max` or `end` would collide with LP keywords.
 */

import type { ComparisonOp } from '../ast/index.js';
import type { VariableId } from '../poly/index.js';
import { SolverError } from '../error.js';
import type { ProblemSnapshot, SnapshotConstraint, SnapshotVariable } from '../problem.js';

/**
 * Result of LP format generation.
 */
export interface LPFormatResult {
  /** LP format string */
  readonly lpString: string;
  /** Ordered variable ids (for solution extraction) */
  readonly varNames: string[];
  /** LP column name per variable id */
  readonly columns: ReadonlyMap<VariableId, string>;
  /** Constant added to the objective value the solver reports */
  readonly objectiveOffset: number;
  /** Constraint ids written as rows, keyed by row name */
  readonly rows: ReadonlyMap<string, string>;
}

/**
 * How a constraint reaches the solver: as a row, or not at all because it
 * has no variable terms or an infinite right-hand side.
 */
export type RowKind = 'row' | 'satisfied' | 'violated';

const FEASIBILITY_TOLERANCE = 1e-9;

function holds(left: number, op: ComparisonOp, right: number): boolean {
  switch (op) {
    case '<=':
      return left <= right + FEASIBILITY_TOLERANCE;
    case '>=':
      return left >= right - FEASIBILITY_TOLERANCE;
    case '==':
      return Math.abs(left - right) <= FEASIBILITY_TOLERANCE;
  }
}

/**
 * Classify a constraint.
 *
 * @example
 * ```ts
 * rowKind({ ..., coefficients: new Map(), constant: 0, op: '<=', rhs: 3 })   // 'satisfied'
 * rowKind({ ..., coefficients: new Map([['x', 1]]), op: '<=', rhs: Infinity })   // 'satisfied'
 * ```
 */
export function rowKind(constraint: SnapshotConstraint): RowKind {
  const hasTerms = [...constraint.coefficients.values()].some((c) => c !== 0);
  if (!hasTerms) {
    return holds(constraint.constant, constraint.op, constraint.rhs) ? 'satisfied' : 'violated';
  }
  if (!Number.isFinite(constraint.rhs)) {
    const trivial =
      (constraint.op === '<=' && constraint.rhs === Infinity) ||
      (constraint.op === '>=' && constraint.rhs === -Infinity);
    return trivial ? 'satisfied' : 'violated';
  }
  return 'row';
}

/**
 * Format a coefficient for LP format.
 * Returns string like "+ 3.5 x_0" or "- 2 x_1"
 */
function formatCoeff(coeff: number, varName: string, isFirst: boolean): string {
  if (coeff === 0) return '';

  const sign = coeff >= 0 ? '+' : '-';
  const absCoeff = Math.abs(coeff);

  // For first term, don't include leading +
  const signStr = isFirst ? (coeff < 0 ? '- ' : '') : ` ${sign} `;

  if (absCoeff === 1) {
    return `${signStr}${varName}`;
  }
  return `${signStr}${absCoeff} ${varName}`;
}

/**
 * Convert linear coefficients to LP format terms.
 */
function linearTerms(coefficients: ReadonlyMap<VariableId, number>, columns: ReadonlyMap<VariableId, string>): string {
  const terms: string[] = [];
  let isFirst = true;
  for (const [id, coeff] of coefficients) {
    const term = formatCoeff(coeff, column(columns, id), isFirst);
    if (term) {
      terms.push(term);
      isFirst = false;
    }
  }
  return terms.join('') || '0';
}

/** Format a bound or right-hand side */
export function formatValue(value: number): string {
  if (value === Infinity) return '+inf';
  if (value === -Infinity) return '-inf';
  return String(value);
}

function formatOp(op: ComparisonOp): string {
  return op === '==' ? '=' : op;
}

function column(columns: ReadonlyMap<VariableId, string>, id: VariableId): string {
  const name = columns.get(id);
  if (name === undefined) {
    throw new SolverError(`variable ${id} is not part of the problem`);
  }
  return name;
}

// Words the LP reader takes as section keywords wherever they appear
const LP_KEYWORDS = new Set([
  'min', 'minimize', 'minimise', 'minimum',
  'max', 'maximize', 'maximise', 'maximum',
  'st', 's.t.', 'st.', 'subject', 'such',
  'bound', 'bounds',
  'gen', 'general', 'generals', 'integer', 'integers',
  'bin', 'binary', 'binaries',
  'semi', 'semis', 'sos',
  'free', 'inf', 'infinity', 'end',
]);

const ROW_NAME_UNSAFE = /[^A-Za-z0-9_!"#$%&(),.;?@'~]/g;
const MAX_NAME_LENGTH = 255;

/**
 * LP-safe row name for a constraint. Names that would read as numbers or
 * as keywords get a prefix, and a name already taken gets the constraint
 * id appended.
 */
export function rowName(constraint: SnapshotConstraint, taken: ReadonlySet<string>): string {
  let name = constraint.name.replace(ROW_NAME_UNSAFE, '_').slice(0, MAX_NAME_LENGTH);
  if (name === '') {
    name = constraint.id;
  }
  if (/^[0-9.eE]/.test(name) || LP_KEYWORDS.has(name.toLowerCase())) {
    name = `r_${name}`;
  }
  return taken.has(name) ? `${name}_${constraint.id}` : name;
}

function boundsLine(variable: SnapshotVariable, name: string): string {
  if (variable.type === 'binary') {
    return `  0 <= ${name} <= 1`;
  }
  if (variable.min === -Infinity && variable.max === Infinity) {
    return `  ${name} free`;
  }
  return `  ${formatValue(variable.min)} <= ${name} <= ${formatValue(variable.max)}`;
}

/**
 * Generate LP format string from a problem snapshot.
 *
 * The objective's constant term cannot be written in LP format; it is
 * returned as `objectiveOffset` for the caller to add back. Constraints
 * that `rowKind` does not classify as rows are left out.
 */
export function generateLP(snapshot: ProblemSnapshot): LPFormatResult {
  const lines: string[] = [];
  const objective = snapshot.objective;
  const columns = new Map<VariableId, string>(
    snapshot.variables.map((v, i): [VariableId, string] => [v.id, `v${i}`])
  );

  lines.push(objective?.direction === 'maximize' ? 'Maximize' : 'Minimize');
  lines.push(`  obj: ${objective ? linearTerms(objective.coefficients, columns) : '0'}`);

  // Constraints
  lines.push('Subject To');

  const rows = new Map<string, string>();
  for (const constraint of snapshot.constraints) {
    if (rowKind(constraint) !== 'row') continue;
    const name = rowName(constraint, new Set(rows.keys()));
    rows.set(name, constraint.id);
    const lhs = linearTerms(constraint.coefficients, columns);
    const rhs = constraint.rhs - constraint.constant;
    lines.push(`  ${name}: ${lhs} ${formatOp(constraint.op)} ${formatValue(rhs)}`);
  }

  // Bounds
  lines.push('Bounds');
  for (const variable of snapshot.variables) {
    lines.push(boundsLine(variable, column(columns, variable.id)));
  }

  // Integer variables (General section)
  const integerVars = snapshot.variables.filter((v) => v.type === 'integer');
  if (integerVars.length > 0) {
    lines.push('General');
    for (const v of integerVars) {
      lines.push(`  ${column(columns, v.id)}`);
    }
  }

  // Binary variables
  const binaryVars = snapshot.variables.filter((v) => v.type === 'binary');
  if (binaryVars.length > 0) {
    lines.push('Binary');
    for (const v of binaryVars) {
      lines.push(`  ${column(columns, v.id)}`);
    }
  }

  lines.push('End');

  return {
    lpString: lines.join('\n'),
    varNames: snapshot.variables.map((v) => v.id),
    columns,
    objectiveOffset: objective?.constant ?? 0,
    rows,
  };
}
