/**
 * Shared utility functions for graph inspection and rebuilding
 */

import type { GraphNode, LeafNode } from './AST.js';
import { isLeaf, visitNode } from './AST.js';
import { leaf, sum, product } from './Builder.js';
import { contains } from './Evaluation.js';
import { UnknownVariableError } from './Errors.js';

const operatorSymbols = {
  sum: '+',
  product: '*'
} as const;

/**
 * Leaf names in left-to-right order, duplicates kept
 */
export function leafNames(node: GraphNode): string[] {
  return collectLeaves(node).map(l => l.name);
}

/**
 * All leaves in left-to-right order
 */
export function collectLeaves(node: GraphNode): LeafNode[] {
  const leaves: LeafNode[] = [];
  const stack: GraphNode[] = [node];

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if (isLeaf(current)) {
      leaves.push(current);
    } else {
      stack.push(current.right, current.left);
    }
  }

  return leaves;
}

/**
 * Count nodes in the subtree
 */
export function countNodes(node: GraphNode): number {
  let count = 0;
  const stack: GraphNode[] = [node];

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    count++;
    if (!isLeaf(current)) {
      stack.push(current.right, current.left);
    }
  }

  return count;
}

/**
 * Infix rendering, e.g. "((A + B) * C)"
 */
export function formatGraph(node: GraphNode): string {
  return visitNode<string>({
    visitLeaf: l => l.name,
    visitSum: (_, left, right) => `(${left} ${operatorSymbols.sum} ${right})`,
    visitProduct: (_, left, right) => `(${left} ${operatorSymbols.product} ${right})`
  }, node);
}

/**
 * Structural rendering, e.g. "sum(leaf(A,10),leaf(B,5))"
 */
export function serializeGraph(node: GraphNode): string {
  return visitNode<string>({
    visitLeaf: l => `leaf(${l.name},${l.value})`,
    visitSum: (_, left, right) => `sum(${left},${right})`,
    visitProduct: (_, left, right) => `prod(${left},${right})`
  }, node);
}

/**
 * Short diagnostic name for a node
 */
export function describeNode(node: GraphNode): string {
  if (isLeaf(node)) {
    return node.name;
  }
  return node.label ?? formatGraph(node);
}

/**
 * Rebuild the graph with every leaf called `name` set to `value`.
 * Returns fresh nodes; the input graph is left untouched.
 */
export function withLeafValue(root: GraphNode, name: string, value: number): GraphNode {
  if (!contains(root, name)) {
    throw new UnknownVariableError(name, describeNode(root));
  }
  return mapLeafValues(root, l => (l.name === name ? value : l.value));
}

/**
 * Rebuild the graph with each leaf's value replaced by fn(leaf).
 * Structure, names and labels are kept.
 */
export function mapLeafValues(node: GraphNode, fn: (leaf: LeafNode) => number): GraphNode {
  return visitNode<GraphNode>({
    visitLeaf: l => leaf(fn(l), l.name),
    visitSum: (original, left, right) => sum(left, right, original.label),
    visitProduct: (original, left, right) => product(left, right, original.label)
  }, node);
}
