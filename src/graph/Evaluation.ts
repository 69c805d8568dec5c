/**
 * Forward pass over an expression graph
 * Computes the root value and records every node's value and leaf span in side tables
 */

import type {
  GraphNode,
  GraphVisitor,
  LeafNode,
  SumNode,
  ProductNode
} from './AST.js';
import { visitNode } from './AST.js';

/**
 * Result of evaluating a graph. Required input for derivative queries.
 */
export interface Evaluation {
  readonly root: GraphNode;
  readonly names: readonly string[]; // Leaf names, left to right
  readonly value: number;
  readonly values: ReadonlyMap<GraphNode, number>;
  readonly spans: ReadonlyMap<GraphNode, LeafSpan>;
  readonly positions: ReadonlyMap<string, readonly number[]>; // Ascending indices into names
}

/**
 * Leaves of a subtree occupy names[start..end)
 */
export interface LeafSpan {
  readonly start: number;
  readonly end: number;
}

interface PartialResult {
  value: number;
  span: LeafSpan;
}

class EvaluationVisitor implements GraphVisitor<PartialResult> {
  readonly names: string[] = [];
  readonly values = new Map<GraphNode, number>();
  readonly spans = new Map<GraphNode, LeafSpan>();
  readonly positions = new Map<string, number[]>();

  visitLeaf(node: LeafNode): PartialResult {
    const index = this.names.length;
    this.names.push(node.name);

    const seen = this.positions.get(node.name);
    if (seen) {
      seen.push(index);
    } else {
      this.positions.set(node.name, [index]);
    }

    return this.record(node, node.value, { start: index, end: index + 1 });
  }

  visitSum(node: SumNode, left: PartialResult, right: PartialResult): PartialResult {
    return this.record(node, left.value + right.value, { start: left.span.start, end: right.span.end });
  }

  visitProduct(node: ProductNode, left: PartialResult, right: PartialResult): PartialResult {
    return this.record(node, left.value * right.value, { start: left.span.start, end: right.span.end });
  }

  private record(node: GraphNode, value: number, span: LeafSpan): PartialResult {
    this.values.set(node, value);
    this.spans.set(node, span);
    return { value, span };
  }
}

/**
 * Evaluate a graph
 */
export function evaluate(root: GraphNode): Evaluation {
  const visitor = new EvaluationVisitor();
  const { value } = visitNode(visitor, root);
  return {
    root,
    names: visitor.names,
    value,
    values: visitor.values,
    spans: visitor.spans,
    positions: visitor.positions
  };
}

/**
 * Check if a leaf with the given name occurs in the subtree
 */
export function contains(node: GraphNode, name: string): boolean {
  const stack: GraphNode[] = [node];

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if (current.kind === 'leaf') {
      if (current.name === name) {
        return true;
      }
    } else {
      stack.push(current.right, current.left);
    }
  }

  return false;
}

/**
 * contains() answered from the evaluation's tables in O(log k),
 * k being the number of leaves carrying the name
 */
export function subtreeContains(evaluation: Evaluation, node: GraphNode, name: string): boolean {
  const span = spanOf(evaluation, node);
  const indices = evaluation.positions.get(name);
  if (!indices) {
    return false;
  }

  // First occurrence at or after span.start
  let lo = 0;
  let hi = indices.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (indices[mid] < span.start) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo < indices.length && indices[lo] < span.end;
}

/**
 * Look up a node's value recorded during evaluation
 */
export function valueOf(evaluation: Evaluation, node: GraphNode): number {
  const value = evaluation.values.get(node);
  if (value === undefined) {
    throw new Error('Node does not belong to the evaluated graph');
  }
  return value;
}

function spanOf(evaluation: Evaluation, node: GraphNode): LeafSpan {
  const span = evaluation.spans.get(node);
  if (span === undefined) {
    throw new Error('Node does not belong to the evaluated graph');
  }
  return span;
}
