/**
 * Test helper utilities
 * Builds graphs from plain shape descriptions so fast-check can generate them
 */

import fc from 'fast-check';
import type { Arbitrary } from 'fast-check';
import { leaf, sum, product } from '../src/graph/Builder.js';
import type { GraphNode } from '../src/graph/AST.js';

/**
 * Plain description of a graph. Leaves get unique names when built.
 */
export type TreeShape =
  | { op: 'leaf'; value: number }
  | { op: 'sum' | 'product'; left: TreeShape; right: TreeShape };

/**
 * Build a graph from a shape, naming leaves x0, x1, ... left to right
 *
 * @example
 * const root = buildTree({
 *   op: 'sum',
 *   left: { op: 'leaf', value: 2 },
 *   right: { op: 'leaf', value: 3 }
 * });
 * // (x0 + x1)
 */
export function buildTree(shape: TreeShape, prefix: string = 'x'): GraphNode {
  let counter = 0;

  const build = (s: TreeShape): GraphNode => {
    if (s.op === 'leaf') {
      return leaf(s.value, `${prefix}${counter++}`);
    }
    const left = build(s.left);
    const right = build(s.right);
    return s.op === 'sum' ? sum(left, right) : product(left, right);
  };

  return build(shape);
}

/**
 * Left-deep chain ((x0 op x1) op x2) ... with leaf xi = value(i).
 * Built in a loop, so depth is limited only by memory.
 */
export function buildChain(
  count: number,
  op: 'sum' | 'product' = 'sum',
  value: (i: number) => number = i => i
): GraphNode {
  let root: GraphNode = leaf(value(0), 'x0');
  for (let i = 1; i < count; i++) {
    const next = leaf(value(i), `x${i}`);
    root = op === 'sum' ? sum(root, next) : product(root, next);
  }
  return root;
}

/**
 * Number of leaves in a shape
 */
export function shapeLeafCount(shape: TreeShape): number {
  return shape.op === 'leaf' ? 1 : shapeLeafCount(shape.left) + shapeLeafCount(shape.right);
}

const leafShape: Arbitrary<TreeShape> = fc
  .integer({ min: -9, max: 9 })
  .map(value => ({ op: 'leaf' as const, value }));

/**
 * Arbitrary tree shapes up to the given depth, small integer leaf values
 */
export function treeShape(depth: number = 3): Arbitrary<TreeShape> {
  if (depth === 0) {
    return leafShape;
  }
  const sub = treeShape(depth - 1);
  const binary: Arbitrary<TreeShape> = fc
    .record({
      op: fc.constantFrom<'sum' | 'product'>('sum', 'product'),
      left: sub,
      right: sub
    });
  return fc.oneof(leafShape, binary);
}
