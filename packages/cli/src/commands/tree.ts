/**
 * Tree Command - modgraph tree <path>
 *
 * Print the local dependency tree from every root module, or from one module.
 */

import { Command } from 'commander';
import {
  ModgraphErrorCode,
  formatTree,
  isModgraphError,
  renderTree,
  type DependencyTree,
} from 'modgraph-core';
import {
  integerAtLeast,
  loadProject,
  printHeading,
  printScanSummary,
  runAction,
  statusColor,
  withProjectOptions,
  type ProjectOptions,
} from './shared.js';

export interface TreeCommandOptions extends ProjectOptions {
  module?: string | undefined;
  depth?: number | undefined;
}

async function treeAction(target: string, options: TreeCommandOptions): Promise<void> {
  const { result, config } = await loadProject(target, options, { maxDepth: options.depth });

  printScanSummary(result);
  console.log();
  printHeading('DEPENDENCY TREE', 50);

  let tree: DependencyTree;
  try {
    tree = renderTree(result.graph, { startModule: options.module, maxDepth: config.maxDepth });
  } catch (error) {
    if (isModgraphError(error, ModgraphErrorCode.MODULE_NOT_FOUND)) {
      console.log(statusColor(`[!] ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const lines = formatTree(tree);
  console.log(lines.length > 0 ? lines.join('\n') : '(no local dependencies found)');
}

export function createTreeCommand(): Command {
  return withProjectOptions(new Command('tree'))
    .description('Show the dependency tree')
    .option('-m, --module <id>', 'Start the tree from this module')
    .option('-d, --depth <n>', 'Maximum tree depth (default: 10)', integerAtLeast(0))
    .action(
      runAction(async (target: string, _options: TreeCommandOptions, command: Command) =>
        treeAction(target, command.optsWithGlobals<TreeCommandOptions>())
      )
    );
}
