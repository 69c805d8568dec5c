/**
 * Argument parsing and report rendering for the leafgrad CLI
 */

import type { GraphNode } from './graph/AST.js';
import { evaluate } from './graph/Evaluation.js';
import { derivativeOver, gradient } from './graph/Differentiation.js';
import type { OccurrenceMode } from './graph/Differentiation.js';
import { GradientChecker, formatGradCheckResult } from './graph/GradientChecker.js';
import { formatGraph, describeNode, withLeafValue } from './graph/GraphUtils.js';
import { analyzeNames, formatNameWarnings } from './graph/NameAnalysis.js';
import { exampleGraphs, isExampleGraphName } from './graph/ExampleGraph.js';
import type { ExampleGraphName } from './graph/ExampleGraph.js';

export interface CliOptions {
  graph: ExampleGraphName;
  wrt: string[];              // Variables to differentiate over
  all: boolean;               // Differentiate over every leaf
  occurrences: OccurrenceMode;
  check: boolean;             // Append a finite-difference check
  overrides: Map<string, number>;
  verbose: boolean;
}

export type CliParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export function usage(): string {
  return `
leafgrad - Values and derivatives of expression graphs

Usage:
  leafgrad [options]

Evaluates a demo graph and prints its value and partial derivatives.

Graphs:
  example    ((A + B) * C) * D with A=10, B=5, C=20, D=25
  repeated   (A + B) * (A + C) with A=10, B=5, C=20 (A occurs twice)

Options:
  --graph <name>             Demo graph: example (default) or repeated
  --wrt <name>               Leaf to differentiate over (repeatable, default: A)
  --all                      Differentiate over every leaf
  --set <name>=<value>       Override a leaf value
  --occurrences <mode>       Duplicate name handling: first (default) or all
  --check                    Verify derivatives with finite differences
  --verbose                  Show stack traces on errors
  --help, -h                 Show this help message

Examples:
  leafgrad
  leafgrad --wrt A --wrt D
  leafgrad --all --set C=2 --check
  leafgrad --graph repeated --occurrences all
  `.trim();
}

export function parseCliArgs(args: string[]): CliParseResult {
  if (args.includes('--help') || args.includes('-h')) {
    return { kind: 'help' };
  }

  const options: CliOptions = {
    graph: 'example',
    wrt: [],
    all: false,
    occurrences: 'first',
    check: false,
    overrides: new Map(),
    verbose: false
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--wrt') {
      if (i + 1 >= args.length) {
        return { kind: 'error', message: 'Missing value for --wrt' };
      }
      options.wrt.push(args[++i]);
    } else if (arg === '--graph') {
      if (i + 1 >= args.length) {
        return { kind: 'error', message: 'Missing value for --graph' };
      }
      const name = args[++i];
      if (!isExampleGraphName(name)) {
        return { kind: 'error', message: `Invalid graph "${name}". Must be: example or repeated` };
      }
      options.graph = name;
    } else if (arg === '--all') {
      options.all = true;
    } else if (arg === '--check') {
      options.check = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg === '--occurrences') {
      if (i + 1 >= args.length) {
        return { kind: 'error', message: 'Missing value for --occurrences' };
      }
      const mode = args[++i];
      if (mode !== 'first' && mode !== 'all') {
        return { kind: 'error', message: `Invalid occurrences mode "${mode}". Must be: first or all` };
      }
      options.occurrences = mode;
    } else if (arg === '--set') {
      if (i + 1 >= args.length) {
        return { kind: 'error', message: 'Missing value for --set' };
      }
      const assignment = args[++i];
      const eq = assignment.indexOf('=');
      const name = assignment.slice(0, eq);
      const value = parseFloat(assignment.slice(eq + 1));
      if (eq <= 0 || !Number.isFinite(value)) {
        return { kind: 'error', message: `Invalid assignment "${assignment}". Expected <name>=<number>` };
      }
      options.overrides.set(name, value);
    } else {
      return { kind: 'error', message: `Unknown option "${arg}"` };
    }
  }

  if (options.wrt.length === 0) {
    options.wrt.push('A');
  }

  return { kind: 'run', options };
}

export function buildGraph(options: CliOptions): GraphNode {
  return exampleGraphs[options.graph]();
}

/**
 * Warning lines for names carried by several leaves; empty when all are unique
 */
export function nameWarnings(graph: GraphNode): string[] {
  const names = analyzeNames(graph);
  if (!names.hasDuplicates) {
    return [];
  }
  return ['Graph has ambiguous leaf names:', formatNameWarnings(names)];
}

/**
 * Apply overrides, evaluate and differentiate. Returns the lines to print.
 */
export function renderReport(graph: GraphNode, options: CliOptions): string[] {
  let root = graph;
  for (const [name, value] of options.overrides) {
    root = withLeafValue(root, name, value);
  }

  const evaluation = evaluate(root);
  const lines: string[] = [
    `Graph: ${formatGraph(root)}`,
    `Val: ${evaluation.value}`
  ];

  const derivativeOptions = { occurrences: options.occurrences };
  if (options.all) {
    for (const [name, d] of gradient(evaluation, derivativeOptions)) {
      lines.push(`Derive(${name}): ${d}`);
    }
  } else {
    for (const name of options.wrt) {
      lines.push(`Derive(${name}): ${derivativeOver(evaluation, name, derivativeOptions)}`);
    }
  }

  if (options.check) {
    const result = new GradientChecker().check(root, derivativeOptions);
    lines.push(formatGradCheckResult(result, describeNode(root)));
  }

  return lines;
}
