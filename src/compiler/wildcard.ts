import { DslError, type BindingValue } from '../error.js';
import type { Node } from '../ast/index.js';
import { containsWildcard } from '../ast/index.js';
import type { ParamValue } from '../params/index.js';
import { isParamList, isParamMap, renderIndex } from '../params/index.js';
import type { SymbolEnvironment } from '../env/index.js';
import type { IndexPattern } from '../registry/index.js';

/**
 * Constant evaluation hooks the inference needs from the compiler.
 */
export interface ConstantEvaluator {
  index(node: Node, env: SymbolEnvironment): BindingValue;
  constant(node: Node, env: SymbolEnvironment): ParamValue;
}

/**
 * Index pattern of a variable access: wildcard args become `null`, the
 * rest are evaluated.
 */
export function accessPattern(
  args: readonly Node[],
  env: SymbolEnvironment,
  evaluator: ConstantEvaluator
): IndexPattern {
  return args.map((arg) => (arg.kind === 'wildcard' ? null : evaluator.index(arg, env)));
}

function containerKeys(container: ParamValue): BindingValue[] {
  if (isParamMap(container)) {
    return Object.keys(container);
  }
  if (isParamList(container)) {
    return container.map((_item, i) => i);
  }
  return [];
}

function collect(
  node: Node,
  env: SymbolEnvironment,
  evaluator: ConstantEvaluator,
  sets: BindingValue[][]
): void {
  switch (node.kind) {
    case 'literal':
    case 'symbol':
    case 'wildcard':
    case 'sum':
    case 'for':
      return;
    case 'call': {
      const positions = node.args.flatMap((arg, i) => (arg.kind === 'wildcard' ? [i] : []));
      const [position, ...more] = positions;
      if (position !== undefined) {
        if (more.length > 0) {
          throw new DslError(
            'UnresolvedWildcardDomain',
            `${node.name} has ${positions.length} wildcard positions inside a compound expression; ` +
              'use a single wildcard or an explicit for'
          );
        }
        const pattern = accessPattern(node.args, env, evaluator);
        sets.push(env.registry.wildcardValues(node.name, pattern, position));
      }
      for (const arg of node.args) {
        collect(arg, env, evaluator, sets);
      }
      return;
    }
    case 'access':
      if (node.key.kind === 'wildcard' && !containsWildcard(node.base)) {
        sets.push(containerKeys(evaluator.constant(node.base, env)));
      }
      collect(node.base, env, evaluator, sets);
      collect(node.key, env, evaluator, sets);
      return;
    case 'field':
      collect(node.base, env, evaluator, sets);
      return;
    case 'binary':
      collect(node.left, env, evaluator, sets);
      collect(node.right, env, evaluator, sets);
      return;
    case 'neg':
      collect(node.arg, env, evaluator, sets);
      return;
    case 'range':
      collect(node.from, env, evaluator, sets);
      collect(node.to, env, evaluator, sets);
      return;
    case 'list':
      for (const item of node.items) {
        collect(item, env, evaluator, sets);
      }
      return;
  }
}

/**
 * Infer the values a shared wildcard ranges over in a compound body such
 * as `qty(_) * foods[_].cost`: the intersection of the declared index
 * values of every variable access with a wildcard and the keys of every
 * container indexed by a wildcard.
 *
 * @throws DslError `UnresolvedWildcardDomain` when nothing implies a
 * domain or the implied domains do not overlap.
 */
export function inferWildcardDomain(
  body: Node,
  env: SymbolEnvironment,
  evaluator: ConstantEvaluator
): BindingValue[] {
  const sets: BindingValue[][] = [];
  collect(body, env, evaluator, sets);

  const [first, ...rest] = sets;
  if (!first) {
    throw new DslError(
      'UnresolvedWildcardDomain',
      'no domain could be inferred for the wildcard; index a declared variable or a parameter with it'
    );
  }

  const others = rest.map((values) => new Set(values.map(renderIndex)));
  const domain = first.filter((value) => others.every((keys) => keys.has(renderIndex(value))));
  if (domain.length === 0 && sets.some((values) => values.length > 0)) {
    throw new DslError(
      'UnresolvedWildcardDomain',
      'the domains implied for the wildcard do not overlap; check that variable indices and parameter keys align'
    );
  }
  return domain;
}
