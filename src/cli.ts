#!/usr/bin/env node

import { buildGraph, nameWarnings, parseCliArgs, renderReport, usage } from './CliRunner.js';
import { formatGraphError } from './graph/Errors.js';

function main() {
  const parsed = parseCliArgs(process.argv.slice(2));

  if (parsed.kind === 'help') {
    console.log(usage());
    process.exit(0);
  }

  if (parsed.kind === 'error') {
    console.error(`Error: ${parsed.message}`);
    console.error(usage());
    process.exit(1);
  }

  const { options } = parsed;

  try {
    const graph = buildGraph(options);

    for (const line of nameWarnings(graph)) {
      console.error(line);
    }

    for (const line of renderReport(graph, options)) {
      console.log(line);
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatGraphError(err, options.verbose));
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(1);
  }
}

main();
