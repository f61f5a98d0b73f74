/**
 * JSON analysis report
 */

import { compareIds, importsOf, type CouplingMetric, type ModuleId } from 'modgraph-core';
import { closeCycle, scanTimeSeconds, type ProjectAnalysis } from './analysis.js';

export interface JsonModuleEntry {
  filePath: string;
  lineCount: number;
  isPackage: boolean;
  importCount: number;
  parseError: string | null;
}

export interface JsonReport {
  version: string;
  project: string;
  summary: {
    totalFiles: number;
    totalModules: number;
    totalDependencies: number;
    parseErrors: number;
    scanTimeSeconds: number;
    circularImportCount: number;
    orphanCount: number;
  };
  modules: Record<ModuleId, JsonModuleEntry>;
  /** Only modules with at least one local dependency */
  dependencies: Record<ModuleId, ModuleId[]>;
  /** `cycle` repeats its first module at the end; `length` counts distinct modules */
  circularImports: Array<{ cycle: ModuleId[]; length: number }>;
  /** Sorted by module id */
  couplingMetrics: CouplingMetric[];
  orphans: ModuleId[];
}

export function buildJsonReport(analysis: ProjectAnalysis, version: string): JsonReport {
  const { result, cycles, metrics, orphans } = analysis;
  const { graph, stats } = result;

  const modules: Record<ModuleId, JsonModuleEntry> = {};
  const dependencies: Record<ModuleId, ModuleId[]> = {};

  for (const module of result.modules.values()) {
    modules[module.id] = {
      filePath: module.filePath,
      lineCount: module.lineCount,
      isPackage: module.isPackage,
      importCount: module.importCount,
      parseError: module.parseError,
    };
  }

  for (const moduleId of graph.nodes) {
    const targets = importsOf(graph, moduleId);
    if (targets.length > 0) {
      dependencies[moduleId] = [...targets];
    }
  }

  return {
    version,
    project: result.root,
    summary: {
      totalFiles: stats.filesSeen,
      totalModules: result.modules.size,
      totalDependencies: graph.edges.length,
      parseErrors: stats.parseErrors,
      scanTimeSeconds: scanTimeSeconds(stats.elapsedMs),
      circularImportCount: cycles.length,
      orphanCount: orphans.length,
    },
    modules,
    dependencies,
    circularImports: cycles.map(cycle => ({ cycle: closeCycle(cycle), length: cycle.length })),
    couplingMetrics: [...metrics].sort((a, b) => compareIds(a.module, b.module)),
    orphans: orphans.map(orphan => orphan.moduleId),
  };
}

export function formatJsonReport(analysis: ProjectAnalysis, version: string): string {
  return JSON.stringify(buildJsonReport(analysis, version), null, 2);
}
