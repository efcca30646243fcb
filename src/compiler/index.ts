export type { Value } from './compile.js';
export {
  compileNode,
  compileConstant,
  compileNumber,
  compileIndex,
  compilePolynomial,
  evaluateDomain,
  toPolynomial,
} from './compile.js';
export type { NormalizedComparison } from './comparison.js';
export { compileComparison, compileObjective } from './comparison.js';
export type { DomainEvaluator, BindingPoint } from './generators.js';
export { enumerate, expand } from './generators.js';
export type { ConstantEvaluator } from './wildcard.js';
export { accessPattern, inferWildcardDomain } from './wildcard.js';
