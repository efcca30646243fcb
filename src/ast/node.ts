import type { ParamValue } from '../params/index.js';

export type ArithmeticOp = '+' | '-' | '*' | '/';

export type ComparisonOp = '<=' | '>=' | '==';

/**
 * Expression node, the tagged union consumed by the compiler.
 *
 * Nodes are plain immutable data. Build them with the helpers in
 * `builders.ts` rather than by hand.
 */
export type Node =
  // === Leaves ===
  | { readonly kind: 'literal'; readonly value: number | string | boolean }
  | { readonly kind: 'symbol'; readonly name: string }
  | { readonly kind: 'wildcard' }

  // === Variable and parameter access ===
  /** Variable access `name(arg1, arg2, ...)` */
  | { readonly kind: 'call'; readonly name: string; readonly args: readonly Node[] }
  /** Container lookup `base[key]` */
  | { readonly kind: 'access'; readonly base: Node; readonly key: Node }
  /** Record field `base.field` */
  | { readonly kind: 'field'; readonly base: Node; readonly field: string }

  // === Arithmetic ===
  | { readonly kind: 'binary'; readonly op: ArithmeticOp; readonly left: Node; readonly right: Node }
  | { readonly kind: 'neg'; readonly arg: Node }

  // === Aggregation ===
  | { readonly kind: 'sum'; readonly body: Node }
  | { readonly kind: 'for'; readonly clauses: readonly GeneratorClause[]; readonly body: Node }

  // === Domains ===
  /** Inclusive integer range `from..to` */
  | { readonly kind: 'range'; readonly from: Node; readonly to: Node }
  | { readonly kind: 'list'; readonly items: readonly Node[] };

export type NodeKind = Node['kind'];

/**
 * A generator domain: a node evaluated to a list or map, or literal data.
 */
export type Domain = Node | readonly ParamValue[];

/**
 * Generator clause `symbol <- domain`.
 */
export interface GeneratorClause {
  readonly symbol: string;
  readonly domain: Domain;
}

/**
 * Comparison `left op right`, the body of a constraint.
 */
export interface Comparison {
  readonly kind: 'compare';
  readonly op: ComparisonOp;
  readonly left: Node;
  readonly right: Node;
}

/** Check whether a domain is a node rather than literal data. */
export function isNode(domain: Domain): domain is Node {
  return !Array.isArray(domain);
}

/**
 * Check if a node contains a wildcard outside nested `sum`/`for` bodies.
 * Those nested bodies own their wildcards.
 */
export function containsWildcard(node: Node): boolean {
  switch (node.kind) {
    case 'wildcard':
      return true;
    case 'literal':
    case 'symbol':
    case 'sum':
      return false;
    case 'call':
      return node.args.some(containsWildcard);
    case 'access':
      return containsWildcard(node.base) || containsWildcard(node.key);
    case 'field':
      return containsWildcard(node.base);
    case 'binary':
      return containsWildcard(node.left) || containsWildcard(node.right);
    case 'neg':
      return containsWildcard(node.arg);
    case 'for':
      return false;
    case 'range':
      return containsWildcard(node.from) || containsWildcard(node.to);
    case 'list':
      return node.items.some(containsWildcard);
  }
}

/**
 * Replace every wildcard (outside nested aggregations) with a literal.
 */
export function substituteWildcard(node: Node, value: number | string | boolean): Node {
  switch (node.kind) {
    case 'wildcard':
      return { kind: 'literal', value };
    case 'literal':
    case 'symbol':
    case 'sum':
    case 'for':
      return node;
    case 'call':
      return { ...node, args: node.args.map((arg) => substituteWildcard(arg, value)) };
    case 'access':
      return {
        ...node,
        base: substituteWildcard(node.base, value),
        key: substituteWildcard(node.key, value),
      };
    case 'field':
      return { ...node, base: substituteWildcard(node.base, value) };
    case 'binary':
      return {
        ...node,
        left: substituteWildcard(node.left, value),
        right: substituteWildcard(node.right, value),
      };
    case 'neg':
      return { ...node, arg: substituteWildcard(node.arg, value) };
    case 'range':
      return {
        ...node,
        from: substituteWildcard(node.from, value),
        to: substituteWildcard(node.to, value),
      };
    case 'list':
      return { ...node, items: node.items.map((item) => substituteWildcard(item, value)) };
  }
}
