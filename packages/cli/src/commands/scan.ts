/**
 * Scan Command - modgraph scan <path>
 *
 * Scan a project and print the summary, optionally followed by the full
 * report as JSON or Markdown.
 */

import { Command } from 'commander';
import { VERSION } from 'modgraph-core';
import { analyzeProject, formatReport, reportFormatFrom } from '../reporters/index.js';
import { loadProject, printScanSummary, runAction, withProjectOptions, type ProjectOptions } from './shared.js';

export interface ScanCommandOptions extends ProjectOptions {
  json?: boolean | undefined;
  markdown?: boolean | undefined;
}

async function scanAction(target: string, options: ScanCommandOptions): Promise<void> {
  const { result, config } = await loadProject(target, options);

  printScanSummary(result);

  if (options.json || options.markdown) {
    console.log(formatReport(analyzeProject(result, config), reportFormatFrom(options), VERSION));
  }
}

export function createScanCommand(): Command {
  return withProjectOptions(new Command('scan'))
    .description('Scan a project and show a summary')
    .option('--json', 'Also print the full analysis as JSON')
    .option('--markdown', 'Also print the full analysis as Markdown')
    .action(
      runAction(async (target: string, _options: ScanCommandOptions, command: Command) =>
        scanAction(target, command.optsWithGlobals<ScanCommandOptions>())
      )
    );
}
