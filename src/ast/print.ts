import type { Comparison, Domain, GeneratorClause, Node } from './node.js';
import { isNode } from './node.js';

const PRECEDENCE = { '+': 1, '-': 1, '*': 2, '/': 2 } as const;

function formatDomain(domain: Domain): string {
  return isNode(domain) ? formatNode(domain) : JSON.stringify(domain);
}

export function formatClause(clause: GeneratorClause): string {
  return `${clause.symbol} <- ${formatDomain(clause.domain)}`;
}

function formatOperand(node: Node, parentPrecedence: number, rightSide: boolean): string {
  const text = formatNode(node);
  if (node.kind !== 'binary') {
    return text;
  }
  const precedence = PRECEDENCE[node.op];
  const needsParens = precedence < parentPrecedence || (rightSide && precedence === parentPrecedence);
  return needsParens ? `(${text})` : text;
}

/**
 * Render a node as DSL text, e.g. `sum(ship(s, _)) * cost[s]`.
 */
export function formatNode(node: Node): string {
  switch (node.kind) {
    case 'literal':
      return typeof node.value === 'string' ? JSON.stringify(node.value) : String(node.value);
    case 'symbol':
      return node.name;
    case 'wildcard':
      return '_';
    case 'call':
      return node.args.length === 0 ? node.name : `${node.name}(${node.args.map(formatNode).join(', ')})`;
    case 'access':
      return `${formatNode(node.base)}[${formatNode(node.key)}]`;
    case 'field':
      return `${formatNode(node.base)}.${node.field}`;
    case 'binary': {
      const precedence = PRECEDENCE[node.op];
      return `${formatOperand(node.left, precedence, false)} ${node.op} ${formatOperand(node.right, precedence, true)}`;
    }
    case 'neg':
      return node.arg.kind === 'binary' ? `-(${formatNode(node.arg)})` : `-${formatNode(node.arg)}`;
    case 'sum':
      return `sum(${formatNode(node.body)})`;
    case 'for':
      return `for ${node.clauses.map(formatClause).join(', ')}, do: ${formatNode(node.body)}`;
    case 'range':
      return `${formatNode(node.from)}..${formatNode(node.to)}`;
    case 'list':
      return `[${node.items.map(formatNode).join(', ')}]`;
  }
}

export function formatComparison(comparison: Comparison): string {
  return `${formatNode(comparison.left)} ${comparison.op} ${formatNode(comparison.right)}`;
}
