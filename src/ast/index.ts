export type {
  ArithmeticOp,
  ComparisonOp,
  Node,
  NodeKind,
  Domain,
  GeneratorClause,
  Comparison,
} from './node.js';
export { isNode, containsWildcard, substituteWildcard } from './node.js';

export type { NodeInput } from './builders.js';
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
} from './builders.js';

export { formatNode, formatClause, formatComparison } from './print.js';
