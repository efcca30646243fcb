import type { ParamValue } from '../params/index.js';
import type { Comparison, ComparisonOp, Domain, GeneratorClause, Node } from './node.js';

/**
 * Input accepted wherever a node is expected. Numbers, strings and
 * booleans become literals.
 */
export type NodeInput = Node | number | string | boolean;

/** Convert a node input to a node, wrapping plain values as literals. */
export function toNode(input: NodeInput): Node {
  if (typeof input === 'object') {
    return input;
  }
  return { kind: 'literal', value: input };
}

/** Literal value */
export function lit(value: number | string | boolean): Node {
  return { kind: 'literal', value };
}

/**
 * Symbol reference: a generator binding, a model parameter or a scalar
 * variable family.
 */
export function sym(name: string): Node {
  return { kind: 'symbol', name };
}

/** Wildcard index marker */
export function wildcard(): Node {
  return { kind: 'wildcard' };
}

/**
 * Shared wildcard node.
 *
 * @example
 * ```ts
 * sum(v('ship', sym('s'), _))   // sum over every customer of s
 * ```
 */
export const _: Node = wildcard();

/**
 * Variable access `name(i, j, ...)`.
 *
 * @example
 * ```ts
 * v('x', sym('i'), 2)   // x(i, 2)
 * v('y')                // scalar variable y
 * ```
 */
export function v(name: string, ...args: NodeInput[]): Node {
  return { kind: 'call', name, args: args.map(toNode) };
}

/**
 * Nested container access `base[k1][k2]...`.
 *
 * @example
 * ```ts
 * at('supply', sym('s'))           // supply[s]
 * at('cost', sym('s'), sym('c'))   // cost[s][c]
 * ```
 */
export function at(base: Node | string, ...keys: NodeInput[]): Node {
  let node: Node = typeof base === 'string' ? sym(base) : base;
  for (const key of keys) {
    node = { kind: 'access', base: node, key: toNode(key) };
  }
  return node;
}

/** Record field access `base.field` */
export function field(base: Node | string, name: string): Node {
  return { kind: 'field', base: typeof base === 'string' ? sym(base) : base, field: name };
}

function fold(op: '+' | '-' | '*' | '/', operands: readonly NodeInput[]): Node {
  const [first, ...rest] = operands;
  if (first === undefined) {
    throw new Error(`Operator ${op} needs at least one operand`);
  }
  return rest.reduce<Node>(
    (left, right) => ({ kind: 'binary', op, left, right: toNode(right) }),
    toNode(first)
  );
}

/** `a + b + ...` */
export function add(a: NodeInput, b: NodeInput, ...rest: NodeInput[]): Node {
  return fold('+', [a, b, ...rest]);
}

/** `a - b - ...` */
export function sub(a: NodeInput, b: NodeInput, ...rest: NodeInput[]): Node {
  return fold('-', [a, b, ...rest]);
}

/** `a * b * ...` */
export function mul(a: NodeInput, b: NodeInput, ...rest: NodeInput[]): Node {
  return fold('*', [a, b, ...rest]);
}

/** `a / b` */
export function div(a: NodeInput, b: NodeInput): Node {
  return fold('/', [a, b]);
}

/** `-a` */
export function neg(a: NodeInput): Node {
  return { kind: 'neg', arg: toNode(a) };
}

/**
 * Aggregate a body over its wildcards, or over an explicit `forEach`.
 *
 * @example
 * ```ts
 * sum(v('x', sym('i'), _))
 * sum(forEach([gen('j', range(1, 3))], v('x', sym('i'), sym('j'))))
 * ```
 */
export function sum(body: NodeInput): Node {
  return { kind: 'sum', body: toNode(body) };
}

/** Comprehension `for clauses, do: body` */
export function forEach(clauses: readonly GeneratorClause[], body: NodeInput): Node {
  return { kind: 'for', clauses, body: toNode(body) };
}

/** Inclusive integer range domain `from..to` */
export function range(from: NodeInput, to: NodeInput): Node {
  return { kind: 'range', from: toNode(from), to: toNode(to) };
}

/** Literal list domain */
export function list(...items: NodeInput[]): Node {
  return { kind: 'list', items: items.map(toNode) };
}

/**
 * Generator clause `symbol <- domain`. The domain may be a node, the name
 * of a parameter, or literal data.
 *
 * @example
 * ```ts
 * gen('i', range(1, 3))
 * gen('s', 'suppliers')          // parameter named suppliers
 * gen('c', ['C1', 'C2'])
 * ```
 */
export function gen(symbol: string, domain: Node | string | readonly ParamValue[]): GeneratorClause {
  const d: Domain = typeof domain === 'string' ? sym(domain) : domain;
  return { symbol, domain: d };
}

function compare(op: ComparisonOp, left: NodeInput, right: NodeInput): Comparison {
  return { kind: 'compare', op, left: toNode(left), right: toNode(right) };
}

/** `left <= right` */
export function le(left: NodeInput, right: NodeInput): Comparison {
  return compare('<=', left, right);
}

/** `left >= right` */
export function ge(left: NodeInput, right: NodeInput): Comparison {
  return compare('>=', left, right);
}

/** `left == right` */
export function eq(left: NodeInput, right: NodeInput): Comparison {
  return compare('==', left, right);
}
