/**
 * Report Command - modgraph report <path>
 *
 * Full analysis as text, JSON or Markdown, printed or saved to a file.
 */

import { Command } from 'commander';
import { VERSION } from 'modgraph-core';
import { analyzeProject, formatReport, reportFormatFrom } from '../reporters/index.js';
import {
  loadProject,
  runAction,
  saveOutput,
  statusColor,
  withProjectOptions,
  type ProjectOptions,
} from './shared.js';

export interface ReportCommandOptions extends ProjectOptions {
  json?: boolean | undefined;
  markdown?: boolean | undefined;
  output?: string | undefined;
}

async function reportAction(target: string, options: ReportCommandOptions): Promise<void> {
  const { result, config } = await loadProject(target, options);
  const report = formatReport(analyzeProject(result, config), reportFormatFrom(options), VERSION);

  if (options.output === undefined) {
    console.log(report);
    return;
  }

  if (await saveOutput(options.output, report, 'report')) {
    console.log(statusColor(`[OK] Report saved to: ${options.output}`));
  }
}

export function createReportCommand(): Command {
  return withProjectOptions(new Command('report'))
    .description('Generate the full analysis report')
    .option('--json', 'Output as JSON')
    .option('--markdown', 'Output as Markdown')
    .option('-o, --output <file>', 'Save the report to a file')
    .action(
      runAction(async (target: string, _options: ReportCommandOptions, command: Command) =>
        reportAction(target, command.optsWithGlobals<ReportCommandOptions>())
      )
    );
}
