export class UnknownVariableError extends Error {
  constructor(
    public variable: string,
    public scope: string
  ) {
    super(`Unknown variable '${variable}' in '${scope}'`);
    this.name = 'UnknownVariableError';
  }
}

export class GraphConstructionError extends Error {
  constructor(
    message: string,
    public reason?: string
  ) {
    const reasonInfo = reason ? ` - ${reason}` : '';
    super(`Invalid graph: ${message}${reasonInfo}`);
    this.name = 'GraphConstructionError';
  }
}

/**
 * Format a graph error for terminal output
 */
export function formatGraphError(error: Error, verbose: boolean = false): string {
  let output = `Error: ${error.message}\n`;

  if (error instanceof UnknownVariableError) {
    output += `
💡 Tip: Derivatives can only be taken over leaf names that occur in the graph.
        '${error.variable}' was not found under '${error.scope}'.
`;
  } else if (error instanceof GraphConstructionError) {
    output += `
💡 Tip: Every node can be the child of at most one operator,
        and leaves need a non-empty name and a finite value.
`;
  }

  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}
