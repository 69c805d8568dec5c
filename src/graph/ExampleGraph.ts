/**
 * Demo graphs for the CLI and examples
 */

import type { ProductNode } from './AST.js';
import { leaf, sum, product } from './Builder.js';

export interface ExampleValues {
  A: number;
  B: number;
  C: number;
  D: number;
}

export const defaultExampleValues: ExampleValues = { A: 10, B: 5, C: 20, D: 25 };

/**
 * ((A + B) * C) * D, by default with A=10, B=5, C=20, D=25
 */
export function buildExampleGraph(values: ExampleValues = defaultExampleValues): ProductNode {
  const a = leaf(values.A, 'A');
  const b = leaf(values.B, 'B');
  const c = leaf(values.C, 'C');
  const d = leaf(values.D, 'D');

  const f1 = sum(a, b, 'A+B');
  const f2 = product(f1, c, '(A+B)C');
  return product(f2, d, '(A+B)CD');
}

/**
 * (A + B) * (A + C) with A=10, B=5, C=20. A is carried by two leaves.
 */
export function buildRepeatedNameGraph(): ProductNode {
  const left = sum(leaf(10, 'A'), leaf(5, 'B'), 'A+B');
  const right = sum(leaf(10, 'A'), leaf(20, 'C'), 'A+C');
  return product(left, right, '(A+B)(A+C)');
}

export const exampleGraphs = {
  example: () => buildExampleGraph(),
  repeated: () => buildRepeatedNameGraph()
} as const;

export type ExampleGraphName = keyof typeof exampleGraphs;

export function isExampleGraphName(name: string): name is ExampleGraphName {
  return Object.prototype.hasOwnProperty.call(exampleGraphs, name);
}
