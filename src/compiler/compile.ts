import { DslError, type BindingValue } from '../error.js';
import type { Node } from '../ast/index.js';
import { containsWildcard, formatNode, substituteWildcard } from '../ast/index.js';
import type { ParamValue } from '../params/index.js';
import {
  describeValue,
  domainValues,
  isBindingValue,
  isParamList,
  isParamMap,
  lookupKey,
  numericIndex,
} from '../params/index.js';
import type { Polynomial } from '../poly/index.js';
import {
  polyAdd,
  polyConst,
  polyConstantTerm,
  polyIsConstant,
  polyNeg,
  polyPrune,
  polyScale,
  polySub,
  polySum,
  polyVariable,
} from '../poly/index.js';
import type { SymbolEnvironment } from '../env/index.js';
import { expand } from './generators.js';
import { accessPattern, inferWildcardDomain, type ConstantEvaluator } from './wildcard.js';

/**
 * Result of compiling a node: a constant (number, string, list, map, ...)
 * or a polynomial over decision variables.
 *
 * Constant arithmetic stays constant, which is what lets index and bound
 * expressions such as `x(i + 1)` or `cap[i] * 2` evaluate to plain values.
 */
export type Value =
  | { readonly kind: 'const'; readonly value: ParamValue }
  | { readonly kind: 'poly'; readonly poly: Polynomial };

function constant(value: ParamValue): Value {
  return { kind: 'const', value };
}

function poly(p: Polynomial): Value {
  return { kind: 'poly', poly: p };
}

/**
 * Convert a compiled value to a polynomial. Only numeric constants
 * convert.
 */
export function toPolynomial(value: Value): Polynomial {
  if (value.kind === 'poly') {
    return value.poly;
  }
  const n = numericIndex(value.value);
  if (n !== null) {
    return polyConst(n);
  }
  throw new DslError('UnsupportedOperation', `${describeValue(value.value)} is not a number`);
}

/** Numeric value of a constant, or null if the value involves variables */
function numericValue(value: Value): number | null {
  if (value.kind === 'const') {
    const n = numericIndex(value.value);
    if (n === null) {
      throw new DslError('UnsupportedOperation', `${describeValue(value.value)} is not a number`);
    }
    return n;
  }
  const pruned = polyPrune(value.poly);
  return polyIsConstant(pruned) ? polyConstantTerm(pruned) : null;
}

function aggregate(values: readonly Value[]): Value {
  if (values.every((v) => v.kind === 'const' && typeof v.value === 'number')) {
    let total = 0;
    for (const v of values) {
      if (v.kind === 'const' && typeof v.value === 'number') total += v.value;
    }
    return constant(total);
  }
  return poly(polySum(values.map(toPolynomial)));
}

// ==================== Constant evaluation ====================

/**
 * Compile a node that must be constant.
 *
 * @throws DslError `UnsupportedOperation` if it references variables.
 */
export function compileConstant(node: Node, env: SymbolEnvironment): ParamValue {
  const value = compileNode(node, env);
  if (value.kind === 'const') {
    return value.value;
  }
  const n = numericValue(value);
  if (n === null) {
    throw new DslError('UnsupportedOperation', `expected a constant but ${formatNode(node)} involves variables`, {
      context: env.context(formatNode(node)),
    });
  }
  return n;
}

/**
 * Compile a node that must be a number (bounds, coefficients).
 */
export function compileNumber(node: Node, env: SymbolEnvironment): number {
  const value = compileConstant(node, env);
  if (typeof value !== 'number') {
    throw new DslError('UnsupportedOperation', `expected a number, got ${describeValue(value)}`, {
      context: env.context(formatNode(node)),
    });
  }
  return value;
}

/**
 * Compile an index expression to a scalar index value.
 */
export function compileIndex(node: Node, env: SymbolEnvironment): BindingValue {
  const value = compileConstant(node, env);
  if (!isBindingValue(value)) {
    throw new DslError(
      'UnsupportedOperation',
      `index must be a number, string or boolean, got ${describeValue(value)}`,
      { context: env.context(formatNode(node)) }
    );
  }
  return value;
}

/**
 * Evaluate a generator domain: ranges, literal lists, or any constant
 * evaluating to a list (items) or a map (keys).
 */
export function evaluateDomain(node: Node, env: SymbolEnvironment): BindingValue[] {
  if (node.kind === 'range') {
    const from = compileNumber(node.from, env);
    const to = compileNumber(node.to, env);
    if (!Number.isInteger(from) || !Number.isInteger(to)) {
      throw new DslError('UnsupportedOperation', `range bounds must be integers, got ${from}..${to}`, {
        context: env.context(formatNode(node)),
      });
    }
    const values: number[] = [];
    for (let i = from; i <= to; i++) {
      values.push(i);
    }
    return values;
  }
  try {
    return domainValues(compileConstant(node, env));
  } catch (e) {
    if (e instanceof DslError) throw e.withContext(env.context(formatNode(node)));
    throw e;
  }
}

const evaluator: ConstantEvaluator = {
  index: compileIndex,
  constant: compileConstant,
};

// ==================== Node dispatch ====================

/**
 * Compile an expression node under an environment.
 *
 * Failures are thrown as `DslError`s carrying the innermost failing
 * sub-expression and the bindings active there.
 */
export function compileNode(node: Node, env: SymbolEnvironment): Value {
  try {
    return dispatch(node, env);
  } catch (e) {
    if (e instanceof DslError) {
      throw e.withContext(env.context(formatNode(node)));
    }
    throw e;
  }
}

function dispatch(node: Node, env: SymbolEnvironment): Value {
  switch (node.kind) {
    case 'literal':
      return constant(node.value);

    case 'symbol':
      return compileSymbol(node.name, env);

    case 'wildcard':
      throw new DslError('WildcardOutsideAggregation', 'wildcard used outside of sum(...)');

    case 'call':
      return compileCall(node.name, node.args, env);

    case 'access':
      return constant(lookupKey(compileContainer(node.base, env), compileIndex(node.key, env)));

    case 'field': {
      const base = compileContainer(node.base, env);
      if (!isParamMap(base)) {
        throw new DslError('UnsupportedOperation', `cannot read field ${node.field} of ${describeValue(base)}`);
      }
      return constant(lookupKey(base, node.field));
    }

    case 'binary':
      return compileBinary(node.op, compileNode(node.left, env), compileNode(node.right, env));

    case 'neg': {
      const arg = compileNode(node.arg, env);
      if (arg.kind === 'const') {
        const n = numericIndex(arg.value);
        if (n === null) {
          throw new DslError('UnsupportedOperation', `cannot negate ${describeValue(arg.value)}`);
        }
        return constant(-n);
      }
      return poly(polyNeg(arg.poly));
    }

    case 'sum':
      return compileSum(node.body, env);

    case 'for':
      return aggregate(expand(node.clauses, env, evaluateDomain, (point) => compileNode(node.body, point.env)));

    case 'range':
      return constant(evaluateDomain(node, env));

    case 'list':
      return constant(node.items.map((item) => compileConstant(item, env)));
  }
}

function compileSymbol(name: string, env: SymbolEnvironment): Value {
  const resolution = env.require(name);
  switch (resolution.kind) {
    case 'binding':
    case 'parameter':
      return constant(resolution.value);
    case 'family': {
      // A bare family name is its scalar variable
      const instance = env.registry.lookup(name, []);
      return poly(polyVariable(instance.id));
    }
  }
}

/**
 * Base of a `[key]`/`.field` access. A bare name must be a model
 * parameter (or a binding holding one).
 */
function compileContainer(base: Node, env: SymbolEnvironment): ParamValue {
  if (base.kind === 'symbol') {
    const resolution = env.resolve(base.name);
    if (resolution.kind === 'undefined') {
      throw new DslError('UndefinedConstant', `${base.name} is not a model parameter`, { symbol: base.name });
    }
    if (resolution.kind === 'family') {
      throw new DslError('UndefinedConstant', `${base.name} is a variable family, not a model parameter`, {
        symbol: base.name,
      });
    }
    return resolution.value;
  }
  return compileConstant(base, env);
}

function requireFamily(name: string, env: SymbolEnvironment): void {
  if (env.registry.hasFamily(name)) {
    return;
  }
  const resolution = env.resolve(name);
  if (resolution.kind === 'undefined') {
    throw new DslError('UndefinedVariable', `variable family ${name} is not declared`, { symbol: name });
  }
  throw new DslError('UnsupportedOperation', `${name} is a ${resolution.kind}, not a variable family`, {
    symbol: name,
  });
}

function compileCall(name: string, args: readonly Node[], env: SymbolEnvironment): Value {
  requireFamily(name, env);
  const index = args.map((arg) => compileIndex(arg, env));
  const instance = env.registry.lookup(name, index);
  return poly(polyVariable(instance.id));
}

function compileBinary(op: '+' | '-' | '*' | '/', left: Value, right: Value): Value {
  if (left.kind === 'const' && right.kind === 'const') {
    return constantArithmetic(op, left.value, right.value);
  }

  switch (op) {
    case '+':
      return poly(polyAdd(toPolynomial(left), toPolynomial(right)));
    case '-':
      return poly(polySub(toPolynomial(left), toPolynomial(right)));
    case '*': {
      const l = numericValue(left);
      const r = numericValue(right);
      if (l !== null) {
        return poly(polyScale(toPolynomial(right), l));
      }
      if (r !== null) {
        return poly(polyScale(toPolynomial(left), r));
      }
      throw new DslError('NonlinearExpression', 'product of two variable expressions is not linear');
    }
    case '/': {
      const r = numericValue(right);
      if (r === null) {
        throw new DslError('UnsupportedOperation', 'division by an expression with variables is not linear');
      }
      if (r === 0) {
        throw new DslError('UnsupportedOperation', 'division by zero');
      }
      return poly(polyScale(toPolynomial(left), 1 / r));
    }
  }
}

function constantArithmetic(op: '+' | '-' | '*' | '/', leftValue: ParamValue, rightValue: ParamValue): Value {
  // Map keys bind as strings; '1' + 1 is index arithmetic, not concatenation
  const left = numericIndex(leftValue);
  const right = numericIndex(rightValue);
  if (left !== null && right !== null) {
    switch (op) {
      case '+':
        return constant(left + right);
      case '-':
        return constant(left - right);
      case '*':
        return constant(left * right);
      case '/':
        if (right === 0) {
          throw new DslError('UnsupportedOperation', 'division by zero');
        }
        return constant(left / right);
    }
  }
  // String concatenation builds index values such as "S" + i
  if (
    op === '+' &&
    (typeof leftValue === 'string' || typeof leftValue === 'number') &&
    (typeof rightValue === 'string' || typeof rightValue === 'number')
  ) {
    return constant(`${leftValue}${rightValue}`);
  }
  throw new DslError(
    'UnsupportedOperation',
    `cannot apply ${op} to ${describeValue(leftValue)} and ${describeValue(rightValue)}`
  );
}

// ==================== Aggregation ====================

function compileSum(body: Node, env: SymbolEnvironment): Value {
  if (body.kind === 'for') {
    return compileNode(body, env);
  }

  if (containsWildcard(body)) {
    if (body.kind === 'call') {
      return sumVariablePattern(body.name, body.args, env);
    }
    const domain = inferWildcardDomain(body, env, evaluator);
    return aggregate(domain.map((value) => compileNode(substituteWildcard(body, value), env)));
  }

  const value = compileNode(body, env);
  if (value.kind === 'const' && isParamList(value.value)) {
    return aggregate(value.value.map((item) => constant(item)));
  }
  return value;
}

/**
 * `sum(x(a, _, b))`: one term per declared instance matching the
 * concrete positions. Wildcard positions vary independently.
 */
function sumVariablePattern(name: string, args: readonly Node[], env: SymbolEnvironment): Value {
  requireFamily(name, env);
  const pattern = accessPattern(args, env, evaluator);
  const matches = env.registry.match(name, pattern);
  return poly(polySum(matches.map((instance) => polyVariable(instance.id))));
}

/** Compile a node to a polynomial (numeric constants included). */
export function compilePolynomial(node: Node, env: SymbolEnvironment): Polynomial {
  const value = compileNode(node, env);
  try {
    return value.kind === 'poly' ? value.poly : toPolynomial(value);
  } catch (e) {
    if (e instanceof DslError) throw e.withContext(env.context(formatNode(node)));
    throw e;
  }
}
