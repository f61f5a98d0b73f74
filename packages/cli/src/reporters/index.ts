/**
 * Reporters: scan summary, text/JSON/Markdown reports and DOT export
 */

export {
  analyzeProject,
  closeCycle,
  formatCycle,
  formatSeconds,
  scanTimeSeconds,
  TRUNCATED_NOTE,
  type AnalysisSettings,
  type ProjectAnalysis,
} from './analysis.js';
export { formatScanSummary } from './summary.js';
export { METRICS_RULE, formatMetricsHeader, formatMetricRow, metricMarker } from './metrics-table.js';
export { formatTextReport, orphanLabel } from './text-reporter.js';
export { formatMarkdownReport } from './markdown-reporter.js';
export { buildJsonReport, formatJsonReport, type JsonReport, type JsonModuleEntry } from './json-reporter.js';
export { generateDot, dotNodeId, dotLabel, type DotOptions } from './dot-exporter.js';
export { formatReport, reportFormatFrom, type ReportFormat } from './report.js';
