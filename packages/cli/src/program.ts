/**
 * modgraph program definition
 *
 * Sets up Commander.js with all available commands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION } from 'modgraph-core';
import {
  createCircularCommand,
  createGraphCommand,
  createMetricsCommand,
  createOrphansCommand,
  createReportCommand,
  createScanCommand,
  createTreeCommand,
  type GlobalOptions,
} from './commands/index.js';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('modgraph')
    .description('Python dependency mapper: dependency trees, circular imports and coupling metrics')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output');

  program.hook('preAction', thisCommand => {
    if (thisCommand.opts<GlobalOptions>().color === false) {
      chalk.level = 0;
    }
  });

  program.addCommand(createScanCommand());
  program.addCommand(createTreeCommand());
  program.addCommand(createCircularCommand());
  program.addCommand(createMetricsCommand());
  program.addCommand(createOrphansCommand());
  program.addCommand(createReportCommand());
  program.addCommand(createGraphCommand());

  program.addHelpText(
    'after',
    `
Examples:
  $ modgraph scan ./my_project             Scan and show a summary
  $ modgraph tree ./my_project             Show the dependency tree
  $ modgraph tree ./src -m app.core -d 3   Tree from one module, three levels deep
  $ modgraph circular ./src                Check for circular imports
  $ modgraph metrics ./src --sort fan-in   Show coupling metrics
  $ modgraph orphans ./src                 Find orphan modules
  $ modgraph report ./src --markdown       Full report in Markdown
  $ modgraph graph ./src -o deps.dot       Generate a Graphviz DOT graph

Configuration:
  Settings are read from .modgraph.json in the scanned directory, or from --config <file>.
`
  );

  return program;
}
