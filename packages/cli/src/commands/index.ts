/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { createScanCommand, type ScanCommandOptions } from './scan.js';
export { createTreeCommand, type TreeCommandOptions } from './tree.js';
export { createCircularCommand, CYCLES_FOUND_EXIT_CODE, type CircularCommandOptions } from './circular.js';
export { createMetricsCommand, type MetricsCommandOptions } from './metrics.js';
export { createOrphansCommand } from './orphans.js';
export { createReportCommand, type ReportCommandOptions } from './report.js';
export { createGraphCommand, type GraphCommandOptions } from './graph.js';
export { reportCommandError, type GlobalOptions, type ProjectOptions } from './shared.js';
