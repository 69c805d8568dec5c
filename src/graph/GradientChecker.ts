/**
 * Numerical gradient checking
 * Validates derivatives from the reverse pass against finite difference approximations
 */

import type { GraphNode } from './AST.js';
import { evaluate } from './Evaluation.js';
import { gradient } from './Differentiation.js';
import type { DerivativeOptions } from './Differentiation.js';
import { mapLeafValues } from './GraphUtils.js';

/**
 * Gradient checking result
 */
export interface GradCheckResult {
  passed: boolean;
  errors: GradCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface GradCheckError {
  variable: string;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

/**
 * Format gradient check results as a human-readable string
 */
export function formatGradCheckResult(result: GradCheckResult, graphName: string): string {
  if (result.passed) {
    return `✓ ${graphName}: ${result.totalChecks} derivatives verified (max error: ${result.maxError.toExponential(2)})`;
  }

  const lines: string[] = [
    `✗ ${graphName}: ${result.errors.length}/${result.totalChecks} derivatives FAILED`
  ];

  for (const e of result.errors) {
    lines.push(`  ${e.variable}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
  }

  return lines.join('\n');
}

/**
 * Gradient checker
 */
export class GradientChecker {
  private epsilon: number;
  private tolerance: number;

  constructor(epsilon: number = 1e-5, tolerance: number = 1e-4) {
    this.epsilon = epsilon;
    this.tolerance = tolerance;
  }

  /**
   * Check every leaf derivative of a graph.
   * Perturbing a name moves every leaf that carries it, so the default
   * differentiation mode here is 'all'.
   */
  check(root: GraphNode, options: DerivativeOptions = { occurrences: 'all' }): GradCheckResult {
    const analyticalGradients = gradient(evaluate(root), options);
    const errors: GradCheckError[] = [];
    const allErrors: number[] = [];

    for (const [variable, analytical] of analyticalGradients) {
      const numerical = this.numericalDerivative(root, variable);

      const error = Math.abs(analytical - numerical);
      const relativeError = Math.abs(error / (numerical + 1e-10));
      allErrors.push(error);

      // Passes when either the absolute or the relative error is small
      if (error > this.tolerance && relativeError > this.tolerance) {
        errors.push({ variable, analytical, numerical, error, relativeError });
      }
    }

    const maxError = allErrors.length > 0 ? Math.max(...allErrors) : 0;
    const meanError = allErrors.length > 0
      ? allErrors.reduce((total, e) => total + e, 0) / allErrors.length
      : 0;

    return {
      passed: errors.length === 0,
      errors,
      maxError,
      meanError,
      totalChecks: allErrors.length
    };
  }

  /**
   * Central difference: (f(v+h) - f(v-h)) / (2h)
   */
  private numericalDerivative(root: GraphNode, variable: string): number {
    const shifted = (h: number) =>
      evaluate(mapLeafValues(root, l => (l.name === variable ? l.value + h : l.value))).value;

    const fPlus = shifted(this.epsilon);
    const fMinus = shifted(-this.epsilon);
    return (fPlus - fMinus) / (2 * this.epsilon);
  }
}
