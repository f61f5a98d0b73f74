import type { ProjectAnalysis } from './analysis.js';
import { formatJsonReport } from './json-reporter.js';
import { formatMarkdownReport } from './markdown-reporter.js';
import { formatTextReport } from './text-reporter.js';

export type ReportFormat = 'text' | 'json' | 'markdown';

export function formatReport(analysis: ProjectAnalysis, format: ReportFormat, version: string): string {
  switch (format) {
    case 'json':
      return formatJsonReport(analysis, version);
    case 'markdown':
      return formatMarkdownReport(analysis, version);
    case 'text':
      return formatTextReport(analysis, version);
  }
}

/**
 * `--json` wins over `--markdown`; text otherwise
 */
export function reportFormatFrom(flags: { json?: boolean | undefined; markdown?: boolean | undefined }): ReportFormat {
  if (flags.json) return 'json';
  if (flags.markdown) return 'markdown';
  return 'text';
}
