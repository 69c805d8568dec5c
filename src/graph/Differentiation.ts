/**
 * Reverse pass over an evaluated graph
 * Applies the sum and product rules using values recorded by evaluate()
 */

import type { GraphNode, LeafNode, BinaryNode } from './AST.js';
import type { Evaluation } from './Evaluation.js';
import { evaluate, subtreeContains, valueOf } from './Evaluation.js';
import { UnknownVariableError } from './Errors.js';
import { describeNode } from './GraphUtils.js';

/**
 * How to treat a name carried by more than one leaf.
 *   'first': follow the left-most branch containing the name
 *   'all':   sum the contributions of every branch containing it
 */
export type OccurrenceMode = 'first' | 'all';

export interface DerivativeOptions {
  occurrences?: OccurrenceMode;
}

/**
 * A leaf reached from the walk's starting node, with d(start)/d(leaf)
 */
interface LeafAdjoint {
  leaf: LeafNode;
  adjoint: number;
}

interface WalkFrame {
  node: GraphNode;
  adjoint: number;
}

/**
 * Differentiation engine bound to one evaluation
 */
export class Differentiator {
  private evaluation: Evaluation;
  private occurrences: OccurrenceMode;

  constructor(evaluation: Evaluation, options: DerivativeOptions = {}) {
    this.evaluation = evaluation;
    this.occurrences = options.occurrences ?? 'first';
  }

  /**
   * Partial derivative of the node's value with respect to leaf `name`
   */
  differentiate(node: GraphNode, name: string): number {
    if (!subtreeContains(this.evaluation, node, name)) {
      throw new UnknownVariableError(name, describeNode(node));
    }

    let total: number | undefined;
    for (const { adjoint } of this.walk(node, name)) {
      if (this.occurrences === 'first') {
        // The walk reaches the left-most occurrence first
        return adjoint;
      }
      total = total === undefined ? adjoint : total + adjoint;
    }

    if (total === undefined) {
      throw new UnknownVariableError(name, describeNode(node));
    }
    return total;
  }

  /**
   * Derivatives for every distinct leaf name in one sweep
   */
  gradient(): Map<string, number> {
    const gradients = new Map<string, number>();

    for (const { leaf, adjoint } of this.walk(this.evaluation.root)) {
      const existing = gradients.get(leaf.name);
      if (existing === undefined) {
        gradients.set(leaf.name, adjoint);
      } else if (this.occurrences === 'all') {
        gradients.set(leaf.name, existing + adjoint);
      }
    }

    return gradients;
  }

  /**
   * Local derivatives of a composite w.r.t. its left and right operands
   */
  private localDerivatives(node: BinaryNode): [number, number] {
    switch (node.kind) {
      case 'sum':
        // d/dx(u + v) = du/dx + dv/dx
        return [1, 1];
      case 'product':
        // d/dx(u * v) = v * du/dx + u * dv/dx
        return [valueOf(this.evaluation, node.right), valueOf(this.evaluation, node.left)];
    }
  }

  /**
   * Depth-first walk from `start`, yielding leaves left to right with the
   * chain-rule product of local derivatives along their path. With a name,
   * only subtrees containing it are entered.
   */
  private *walk(start: GraphNode, name?: string): Generator<LeafAdjoint> {
    const stack: WalkFrame[] = [{ node: start, adjoint: 1 }];

    for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
      const { node, adjoint } = frame;
      if (node.kind === 'leaf') {
        yield { leaf: node, adjoint };
        continue;
      }

      const [dLeft, dRight] = this.localDerivatives(node);
      if (this.enters(node.right, name)) {
        stack.push({ node: node.right, adjoint: adjoint * dRight });
      }
      if (this.enters(node.left, name)) {
        stack.push({ node: node.left, adjoint: adjoint * dLeft });
      }
    }
  }

  private enters(node: GraphNode, name: string | undefined): boolean {
    return name === undefined || subtreeContains(this.evaluation, node, name);
  }
}

/**
 * Derivative of the evaluated graph's value with respect to leaf `name`
 */
export function derivativeOver(
  evaluation: Evaluation,
  name: string,
  options: DerivativeOptions = {}
): number {
  return new Differentiator(evaluation, options).differentiate(evaluation.root, name);
}

/**
 * Evaluate, then differentiate
 */
export function differentiate(
  root: GraphNode,
  name: string,
  options: DerivativeOptions = {}
): number {
  return derivativeOver(evaluate(root), name, options);
}

/**
 * Derivatives for every distinct leaf name, in first-occurrence order
 */
export function gradient(
  evaluation: Evaluation,
  options: DerivativeOptions = {}
): Map<string, number> {
  return new Differentiator(evaluation, options).gradient();
}
