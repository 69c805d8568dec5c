import { describe, it, expect } from 'vitest';
import { leaf, sum, product } from '../../src/graph/Builder.js';
import {
  analyzeNames,
  formatNameWarnings,
  assertUniqueNames
} from '../../src/graph/NameAnalysis.js';
import { GraphConstructionError } from '../../src/graph/Errors.js';
import { buildExampleGraph } from '../../src/graph/ExampleGraph.js';

describe('Name analysis', () => {
  it('should report no duplicates for the example graph', () => {
    const result = analyzeNames(buildExampleGraph());
    expect(result.names).toEqual(['A', 'B', 'C', 'D']);
    expect(result.duplicates).toEqual([]);
    expect(result.hasDuplicates).toBe(false);
    expect(formatNameWarnings(result)).toBe('');
  });

  it('should count repeated names', () => {
    const root = sum(
      product(leaf(1, 'x'), leaf(2, 'y')),
      sum(leaf(3, 'x'), leaf(4, 'x'))
    );
    const result = analyzeNames(root);
    expect(result.hasDuplicates).toBe(true);
    expect(result.duplicates).toEqual([{ name: 'x', occurrences: 3 }]);
  });

  it('should list duplicates in first-occurrence order', () => {
    const root = sum(
      sum(leaf(1, 'b'), leaf(2, 'a')),
      sum(leaf(3, 'a'), leaf(4, 'b'))
    );
    expect(analyzeNames(root).duplicates).toEqual([
      { name: 'b', occurrences: 2 },
      { name: 'a', occurrences: 2 }
    ]);
  });

  it('should format warnings', () => {
    const result = analyzeNames(sum(leaf(1, 'x'), leaf(2, 'x')));
    expect(formatNameWarnings(result)).toBe(
      [
        "  ⚠️  Leaf name 'x' is used 2 times",
        '',
        '  Derivatives over these names follow the left-most occurrence',
        "  unless computed with occurrences: 'all'."
      ].join('\n')
    );
  });

  it('should accept unique names', () => {
    expect(() => assertUniqueNames(buildExampleGraph())).not.toThrow();
  });

  it('should reject duplicate names on request', () => {
    const root = product(sum(leaf(1, 'p'), leaf(2, 'q')), sum(leaf(3, 'q'), leaf(4, 'p')));
    expect(() => assertUniqueNames(root)).toThrow(GraphConstructionError);
    expect(() => assertUniqueNames(root)).toThrow(
      "Invalid graph: duplicate leaf names 'p', 'q' - leaf names must be unique"
    );
  });
});
