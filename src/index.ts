/**
 * leafgrad - Values and partial derivatives of expression graphs
 *
 * Graphs are trees of named leaf constants joined by sums and products.
 * Evaluate a graph once, then query derivatives over any leaf name.
 */

// Core API
export { leaf, sum, product } from './graph/Builder.js';
export {
  evaluate,
  contains,
  subtreeContains,
  valueOf,
  type Evaluation,
  type LeafSpan
} from './graph/Evaluation.js';
export {
  derivativeOver,
  differentiate,
  gradient,
  Differentiator,
  type DerivativeOptions,
  type OccurrenceMode
} from './graph/Differentiation.js';

// Node types
export type {
  GraphNode,
  LeafNode,
  SumNode,
  ProductNode,
  BinaryNode,
  NodeKind,
  GraphVisitor
} from './graph/AST.js';
export { visitNode, isLeaf, isBinary } from './graph/AST.js';

// Errors
export {
  UnknownVariableError,
  GraphConstructionError,
  formatGraphError
} from './graph/Errors.js';

// Inspection
export {
  leafNames,
  collectLeaves,
  countNodes,
  formatGraph,
  serializeGraph,
  describeNode,
  withLeafValue,
  mapLeafValues
} from './graph/GraphUtils.js';
export {
  analyzeNames,
  formatNameWarnings,
  assertUniqueNames,
  type DuplicateName,
  type NameAnalysisResult
} from './graph/NameAnalysis.js';

// Gradient verification utilities
export {
  GradientChecker,
  formatGradCheckResult,
  type GradCheckResult,
  type GradCheckError
} from './graph/GradientChecker.js';

export {
  buildExampleGraph,
  buildRepeatedNameGraph,
  defaultExampleValues,
  type ExampleValues
} from './graph/ExampleGraph.js';
