export type { VariableId, Term, Polynomial } from './polynomial.js';
export {
  CONSTANT_KEY,
  monomialKey,
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
} from './polynomial.js';
