/**
 * Graph Command - modgraph graph <path>
 *
 * Graphviz DOT export of the dependency graph.
 */

import * as path from 'node:path';
import { Command } from 'commander';
import { findCycles } from 'modgraph-core';
import { generateDot } from '../reporters/index.js';
import {
  loadProject,
  runAction,
  saveOutput,
  statusColor,
  withProjectOptions,
  type ProjectOptions,
} from './shared.js';

export interface GraphCommandOptions extends ProjectOptions {
  output?: string | undefined;
  /** false under --no-highlight */
  highlight?: boolean | undefined;
}

async function graphAction(target: string, options: GraphCommandOptions): Promise<void> {
  const { result, config } = await loadProject(target, options);
  const cycles = options.highlight === false ? [] : findCycles(result.graph, { maxCycleLength: config.maxCycleLength });
  const dot = generateDot(result, { cycles });

  if (options.output === undefined) {
    console.log(dot);
    return;
  }

  if (await saveOutput(options.output, dot, 'graph')) {
    console.log(statusColor(`[OK] DOT graph saved to: ${options.output}`));
    console.log(`     Render with: dot -Tpng ${options.output} -o ${path.parse(options.output).name}.png`);
  }
}

export function createGraphCommand(): Command {
  return withProjectOptions(new Command('graph'))
    .description('Generate a Graphviz DOT graph')
    .option('-o, --output <file>', 'Save the DOT graph to a file')
    .option('--no-highlight', 'Do not highlight circular import edges')
    .action(
      runAction(async (target: string, _options: GraphCommandOptions, command: Command) =>
        graphAction(target, command.optsWithGlobals<GraphCommandOptions>())
      )
    );
}
