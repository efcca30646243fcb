import type { Comparison, ComparisonOp, Node } from '../ast/index.js';
import { formatComparison } from '../ast/index.js';
import type { Polynomial } from '../poly/index.js';
import { polyConstantTerm, polyPrune, polySub, polyWithoutConstant } from '../poly/index.js';
import type { SymbolEnvironment } from '../env/index.js';
import { DslError } from '../error.js';
import { compilePolynomial } from './compile.js';

/**
 * A comparison normalized to `lhs op rhs` with every variable term on the
 * left and every constant folded into `rhs`.
 */
export interface NormalizedComparison {
  readonly lhs: Polynomial;
  readonly op: ComparisonOp;
  readonly rhs: number;
}

/**
 * Compile a constraint body.
 *
 * `a op b` becomes `(a - b) op 0`, then the constant term of `a - b` moves
 * to the right-hand side with its sign flipped.
 *
 * @example
 * ```ts
 * // 2 * x + 3 <= y + 10   =>   2 x - y <= 7
 * compileComparison(le(add(mul(2, sym('x')), 3), add(sym('y'), 10)), env);
 * ```
 */
export function compileComparison(comparison: Comparison, env: SymbolEnvironment): NormalizedComparison {
  try {
    const left = compilePolynomial(comparison.left, env);
    const right = compilePolynomial(comparison.right, env);
    const difference = polyPrune(polySub(left, right));
    // Avoid -0 when the constant term is absent
    const constant = polyConstantTerm(difference);
    return {
      lhs: polyWithoutConstant(difference),
      op: comparison.op,
      rhs: constant === 0 ? 0 : -constant,
    };
  } catch (e) {
    if (e instanceof DslError) throw e.withContext(env.context(formatComparison(comparison)));
    throw e;
  }
}

/**
 * Compile an objective expression. The constant term is kept and reported
 * as an offset by the solver adapter.
 */
export function compileObjective(expression: Node, env: SymbolEnvironment): Polynomial {
  return polyPrune(compilePolynomial(expression, env));
}
