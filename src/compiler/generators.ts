import type { BindingValue } from '../error.js';
import type { GeneratorClause, Node } from '../ast/index.js';
import { isNode } from '../ast/index.js';
import { domainValues } from '../params/index.js';
import type { SymbolEnvironment } from '../env/index.js';

/**
 * Evaluates a domain node to its values under an environment.
 */
export type DomainEvaluator = (domain: Node, env: SymbolEnvironment) => BindingValue[];

/**
 * One point of a generator product.
 */
export interface BindingPoint {
  /** Symbol -> value, in clause order */
  readonly bindings: ReadonlyMap<string, BindingValue>;
  /** Environment with every clause of this point bound */
  readonly env: SymbolEnvironment;
}

function clauseValues(
  clause: GeneratorClause,
  env: SymbolEnvironment,
  evaluate: DomainEvaluator
): BindingValue[] {
  return isNode(clause.domain) ? evaluate(clause.domain, env) : domainValues(clause.domain);
}

function* points(
  clauses: readonly GeneratorClause[],
  position: number,
  env: SymbolEnvironment,
  bindings: ReadonlyMap<string, BindingValue>,
  evaluate: DomainEvaluator
): Generator<BindingPoint> {
  const clause = clauses[position];
  if (!clause) {
    yield { bindings, env };
    return;
  }
  // Evaluated under the earlier clauses' bindings, once per outer point
  const values = clauseValues(clause, env, evaluate);
  for (const value of values) {
    const next = new Map(bindings);
    next.set(clause.symbol, value);
    yield* points(clauses, position + 1, env.child(new Map([[clause.symbol, value]])), next, evaluate);
  }
}

/**
 * Enumerate the Cartesian product of generator clauses. The first clause
 * is outermost (varies slowest). A clause's domain may refer to symbols
 * bound by earlier clauses. An empty domain yields no points.
 */
export function enumerate(
  clauses: readonly GeneratorClause[],
  env: SymbolEnvironment,
  evaluate: DomainEvaluator
): BindingPoint[] {
  return [...points(clauses, 0, env, new Map(), evaluate)];
}

/**
 * Run `body` once per point of the generator product, in order.
 *
 * @example
 * ```ts
 * expand([gen('i', range(1, 2)), gen('j', ['a', 'b'])], env, evaluateDomain, (p) =>
 *   [...p.bindings.values()].join('-')
 * );
 * // ['1-a', '1-b', '2-a', '2-b']
 * ```
 */
export function expand<T>(
  clauses: readonly GeneratorClause[],
  env: SymbolEnvironment,
  evaluate: DomainEvaluator,
  body: (point: BindingPoint) => T
): T[] {
  const results: T[] = [];
  for (const point of points(clauses, 0, env, new Map(), evaluate)) {
    results.push(body(point));
  }
  return results;
}
