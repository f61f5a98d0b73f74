/**
 * Import Classifier
 *
 * Groups one module's imports by how they resolved.
 */

import { Errors } from '../errors/index.js';
import { compareIds } from './module-registry.js';
import type { ModuleId, RawImport, ScanResult } from './types.js';

export interface ClassifiedImports {
  /** Local module ids the module depends on */
  local: string[];
  standardLibrary: string[];
  thirdParty: string[];
  /** References as written, including leading dots */
  unresolvable: string[];
}

export function classifyImports(result: ScanResult, moduleId: ModuleId): ClassifiedImports {
  if (!result.modules.has(moduleId)) {
    throw Errors.moduleNotFound(moduleId);
  }

  const local = new Set<string>();
  const standardLibrary = new Set<string>();
  const thirdParty = new Set<string>();
  const unresolvable = new Set<string>();

  for (const { raw, resolution } of result.imports.get(moduleId) ?? []) {
    switch (resolution.kind) {
      case 'local':
        local.add(resolution.moduleId);
        break;
      case 'standard-library':
        standardLibrary.add(writtenModule(raw));
        break;
      case 'third-party':
        thirdParty.add(writtenModule(raw));
        break;
      case 'unresolvable':
        unresolvable.add(writtenModule(raw));
        break;
    }
  }

  return {
    local: sorted(local),
    standardLibrary: sorted(standardLibrary),
    thirdParty: sorted(thirdParty),
    unresolvable: sorted(unresolvable),
  };
}

/**
 * Module part of an import as the source spells it (`..pkg.mod`, `os.path`)
 */
function writtenModule(raw: RawImport): string {
  const dots = raw.kind.type === 'absolute' ? '' : '.'.repeat(raw.kind.depth);
  return `${dots}${raw.target}`;
}

function sorted(values: Set<string>): string[] {
  return [...values].sort(compareIds);
}
