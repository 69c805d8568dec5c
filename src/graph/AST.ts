/**
 * Node definitions for leafgrad expression graphs
 * Leaves hold named constants, sums and products combine two children
 */

/**
 * Node kinds
 */
export type NodeKind = GraphNode['kind'];

/**
 * Composite node kinds
 */
export type BinaryKind = BinaryNode['kind'];

/**
 * Any node of an expression graph
 */
export type GraphNode =
  | LeafNode
  | SumNode
  | ProductNode;

/**
 * Named constant (e.g., A = 10)
 */
export interface LeafNode {
  readonly kind: 'leaf';
  readonly name: string;
  readonly value: number;
}

/**
 * Addition of two sub-graphs
 */
export interface SumNode {
  readonly kind: 'sum';
  readonly left: GraphNode;
  readonly right: GraphNode;
  readonly label?: string; // Diagnostic name, e.g. "A+B"
}

/**
 * Multiplication of two sub-graphs
 */
export interface ProductNode {
  readonly kind: 'product';
  readonly left: GraphNode;
  readonly right: GraphNode;
  readonly label?: string;
}

export type BinaryNode = SumNode | ProductNode;

/**
 * Visitor pattern for graph traversal.
 * Composite visits receive the results already computed for their children.
 */
export interface GraphVisitor<T> {
  visitLeaf(node: LeafNode): T;
  visitSum(node: SumNode, left: T, right: T): T;
  visitProduct(node: ProductNode, left: T, right: T): T;
}

interface VisitFrame {
  node: GraphNode;
  expanded: boolean; // Children already scheduled
}

/**
 * Post-order traversal on an explicit stack, so graph depth is not bounded
 * by the call stack. Leaves are visited left to right.
 */
export function visitNode<T>(visitor: GraphVisitor<T>, root: GraphNode): T {
  const results: T[] = [];
  const stack: VisitFrame[] = [{ node: root, expanded: false }];

  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { node } = frame;
    switch (node.kind) {
      case 'leaf':
        results.push(visitor.visitLeaf(node));
        break;
      case 'sum':
      case 'product': {
        if (!frame.expanded) {
          stack.push(
            { node, expanded: true },
            { node: node.right, expanded: false },
            { node: node.left, expanded: false }
          );
          break;
        }
        const [left, right] = results.splice(-2, 2);
        results.push(node.kind === 'sum'
          ? visitor.visitSum(node, left, right)
          : visitor.visitProduct(node, left, right));
        break;
      }
    }
  }

  return results[0];
}

export function isLeaf(node: GraphNode): node is LeafNode {
  return node.kind === 'leaf';
}

export function isBinary(node: GraphNode): node is BinaryNode {
  return node.kind === 'sum' || node.kind === 'product';
}
