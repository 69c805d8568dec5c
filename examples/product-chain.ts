/**
 * Example: values and derivatives of ((A + B) * C) * D
 *
 * Run with: npx tsx examples/product-chain.ts
 */

import {
  leaf,
  sum,
  product,
  evaluate,
  derivativeOver,
  gradient,
  formatGraph,
  GradientChecker,
  formatGradCheckResult,
  UnknownVariableError
} from '../src/index.js';

console.log('=== Example 1: Worked example ===\n');

const a = leaf(10, 'A');
const b = leaf(5, 'B');
const c = leaf(20, 'C');
const d = leaf(25, 'D');

const f1 = sum(a, b, 'A+B');
const f2 = product(f1, c, '(A+B)C');
const fEnd = product(f2, d, '(A+B)CD');

const evaluation = evaluate(fEnd);
console.log(`${formatGraph(fEnd)} = ${evaluation.value}`);
console.log(`Leaves visited: ${evaluation.names.join(', ')}`);
console.log(`d/dA = ${derivativeOver(evaluation, 'A')}`);
console.log(`d/dD = ${derivativeOver(evaluation, 'D')}`);

console.log('\n=== Example 2: Full gradient ===\n');

for (const [name, value] of gradient(evaluation)) {
  console.log(`  ∂/∂${name} = ${value}`);
}

console.log('\n=== Example 3: Repeated names ===\n');

// x * x, with both leaves named x
const square = product(leaf(3, 'x'), leaf(3, 'x'));
const squareEval = evaluate(square);
console.log(`first occurrence: ${derivativeOver(squareEval, 'x')}`);
console.log(`all occurrences:  ${derivativeOver(squareEval, 'x', { occurrences: 'all' })}`);
console.log(formatGradCheckResult(new GradientChecker().check(square), 'x * x'));

console.log('\n=== Example 4: Unknown variables ===\n');

try {
  derivativeOver(evaluation, 'Z');
} catch (err) {
  if (err instanceof UnknownVariableError) {
    console.log(err.message);
  } else {
    throw err;
  }
}
