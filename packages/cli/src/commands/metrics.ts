/**
 * Metrics Command - modgraph metrics <path>
 *
 * Fan-in, fan-out and instability per module, as an aligned table or JSON.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { computeMetrics, isModgraphError, parseSortKey, type MetricSortKey } from 'modgraph-core';
import { METRICS_RULE, formatMetricRow, formatMetricsHeader, metricMarker } from '../reporters/index.js';
import {
  loadProject,
  printHeading,
  printScanSummary,
  runAction,
  withProjectOptions,
  type ProjectOptions,
} from './shared.js';

export interface MetricsCommandOptions extends ProjectOptions {
  sort?: MetricSortKey | undefined;
  json?: boolean | undefined;
}

function parseSortOption(value: string): MetricSortKey {
  try {
    return parseSortKey(value);
  } catch (error) {
    if (isModgraphError(error)) {
      throw new InvalidArgumentError(error.recovery?.suggestion ?? error.message);
    }
    throw error;
  }
}

async function metricsAction(target: string, options: MetricsCommandOptions): Promise<void> {
  const { result } = await loadProject(target, options);

  printScanSummary(result);
  console.log();

  const metrics = computeMetrics(result.graph, options.sort ?? 'instability');

  if (options.json) {
    console.log(JSON.stringify(metrics, null, 2));
    return;
  }

  printHeading('COUPLING METRICS', 70);
  console.log(formatMetricsHeader());
  console.log(chalk.gray(METRICS_RULE));

  for (const metric of metrics) {
    const marker = metricMarker(metric);
    const colored = marker === ' [!]' ? chalk.red(marker) : chalk.green(marker);
    console.log(`${formatMetricRow(metric)}${marker ? colored : ''}`);
  }
}

export function createMetricsCommand(): Command {
  return withProjectOptions(new Command('metrics'))
    .description('Show coupling metrics')
    .option('-s, --sort <key>', 'Sort by instability, fan_in, fan_out or name', parseSortOption, 'instability')
    .option('--json', 'Output as JSON')
    .action(
      runAction(async (target: string, _options: MetricsCommandOptions, command: Command) =>
        metricsAction(target, command.optsWithGlobals<MetricsCommandOptions>())
      )
    );
}
