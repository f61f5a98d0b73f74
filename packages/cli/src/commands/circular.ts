/**
 * Circular Command - modgraph circular <path>
 *
 * List circular import chains. Exits with code 2 when any are found so the
 * command can gate a CI job.
 */

import { Command } from 'commander';
import { detectCycles } from 'modgraph-core';
import { formatCycle, TRUNCATED_NOTE } from '../reporters/index.js';
import {
  integerAtLeast,
  loadProject,
  printScanSummary,
  runAction,
  statusColor,
  withProjectOptions,
  type ProjectOptions,
} from './shared.js';

export const CYCLES_FOUND_EXIT_CODE = 2;

export interface CircularCommandOptions extends ProjectOptions {
  maxLength?: number | undefined;
}

async function circularAction(target: string, options: CircularCommandOptions): Promise<void> {
  const { result, config, logger } = await loadProject(target, options, { maxCycleLength: options.maxLength });

  printScanSummary(result);
  console.log();

  const { cycles, truncated } = detectCycles(result.graph, { maxCycleLength: config.maxCycleLength });
  logger.debug(`Cycle search bounded at length ${config.maxCycleLength}`);

  if (cycles.length === 0) {
    console.log(statusColor('[OK] No circular imports detected!'));
    return;
  }

  console.log(statusColor(`[!] Found ${cycles.length} circular import chain(s):`));
  console.log();
  cycles.forEach((cycle, i) => {
    console.log(`  Cycle ${i + 1}: ${formatCycle(cycle)}`);
  });
  if (truncated) {
    console.log();
    console.log(statusColor(TRUNCATED_NOTE));
  }
  process.exitCode = CYCLES_FOUND_EXIT_CODE;
}

export function createCircularCommand(): Command {
  return withProjectOptions(new Command('circular'))
    .description('Find circular imports (exit code 2 when found)')
    .option('--max-length <n>', 'Longest cycle to report (default: 20)', integerAtLeast(1))
    .action(
      runAction(async (target: string, _options: CircularCommandOptions, command: Command) =>
        circularAction(target, command.optsWithGlobals<CircularCommandOptions>())
      )
    );
}
