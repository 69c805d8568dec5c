/**
 * Leaf name analysis
 * Detects names carried by more than one leaf, which makes derivative lookup ambiguous
 */

import type { GraphNode } from './AST.js';
import { GraphConstructionError } from './Errors.js';
import { leafNames } from './GraphUtils.js';

export interface DuplicateName {
  name: string;
  occurrences: number;
}

export interface NameAnalysisResult {
  names: string[];
  duplicates: DuplicateName[];
  hasDuplicates: boolean;
}

/**
 * Analyze leaf names of a graph
 */
export function analyzeNames(root: GraphNode): NameAnalysisResult {
  const names = leafNames(root);
  const counts = new Map<string, number>();

  for (const name of names) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const duplicates: DuplicateName[] = [];
  for (const [name, occurrences] of counts) {
    if (occurrences > 1) {
      duplicates.push({ name, occurrences });
    }
  }

  return {
    names,
    duplicates,
    hasDuplicates: duplicates.length > 0
  };
}

/**
 * Format duplicate-name warnings for display
 */
export function formatNameWarnings(result: NameAnalysisResult): string {
  if (!result.hasDuplicates) {
    return '';
  }

  const lines: string[] = [];
  for (const dup of result.duplicates) {
    lines.push(`  ⚠️  Leaf name '${dup.name}' is used ${dup.occurrences} times`);
  }
  lines.push('');
  lines.push('  Derivatives over these names follow the left-most occurrence');
  lines.push("  unless computed with occurrences: 'all'.");

  return lines.join('\n');
}

/**
 * Throw if any leaf name occurs more than once
 */
export function assertUniqueNames(root: GraphNode): void {
  const result = analyzeNames(root);
  if (result.hasDuplicates) {
    const list = result.duplicates.map(d => `'${d.name}'`).join(', ');
    throw new GraphConstructionError(`duplicate leaf names ${list}`, 'leaf names must be unique');
  }
}
