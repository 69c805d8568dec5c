/**
 * Graph construction
 * Operators take exclusive ownership of their children, so every graph is a tree
 */

import type { GraphNode, LeafNode, SumNode, ProductNode, BinaryKind } from './AST.js';
import { GraphConstructionError } from './Errors.js';

// Nodes already adopted by some operator
const adopted = new WeakSet<GraphNode>();

/**
 * Create a named constant
 */
export function leaf(value: number, name: string): LeafNode {
  if (name.length === 0) {
    throw new GraphConstructionError('leaf name must not be empty');
  }
  if (!Number.isFinite(value)) {
    throw new GraphConstructionError(`leaf '${name}' has non-finite value ${value}`);
  }
  return { kind: 'leaf', name, value };
}

/**
 * Create left + right
 */
export function sum(left: GraphNode, right: GraphNode, label?: string): SumNode {
  adopt('sum', left, right);
  return label === undefined
    ? { kind: 'sum', left, right }
    : { kind: 'sum', left, right, label };
}

/**
 * Create left * right
 */
export function product(left: GraphNode, right: GraphNode, label?: string): ProductNode {
  adopt('product', left, right);
  return label === undefined
    ? { kind: 'product', left, right }
    : { kind: 'product', left, right, label };
}

function adopt(kind: BinaryKind, left: GraphNode, right: GraphNode): void {
  if (left === right) {
    throw new GraphConstructionError(
      `${kind} operands must be distinct nodes`,
      'reuse a value by creating a second leaf'
    );
  }
  for (const child of [left, right]) {
    if (adopted.has(child)) {
      throw new GraphConstructionError(
        `${kind} operand is already owned by another operator`,
        'graphs are trees; build a fresh sub-graph instead of sharing one'
      );
    }
  }
  adopted.add(left);
  adopted.add(right);
}
