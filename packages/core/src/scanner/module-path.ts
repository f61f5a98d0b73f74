/**
 * Module Paths
 *
 * Maps source file paths to canonical dotted module ids.
 */

import * as path from 'node:path';

import type { ModuleId } from '../module-graph/types.js';

const SOURCE_SUFFIXES = ['.pyi', '.py'];
const PACKAGE_MARKER = '__init__';

export interface ModulePath {
  id: ModuleId;
  /** Is the file a package marker (`__init__.py`)? */
  isPackage: boolean;
}

function stripSuffix(name: string): string {
  const suffix = SOURCE_SUFFIXES.find(candidate => name.endsWith(candidate));
  return suffix ? name.slice(0, -suffix.length) : name;
}

/**
 * Module id for a `/`-separated path relative to the scan root.
 *
 * `pkg/sub/utils.py` -> `pkg.sub.utils`, `pkg/__init__.py` -> `pkg`.
 * The root's own `__init__.py` is named after the root directory.
 */
export function pathToModuleId(relativePath: string, rootName: string): ModulePath {
  const parts = relativePath.split('/').filter(part => part.length > 0);
  const last = parts.pop();
  if (last === undefined) {
    return { id: rootName, isPackage: false };
  }

  const stem = stripSuffix(last);
  if (stem === PACKAGE_MARKER) {
    return { id: parts.length > 0 ? parts.join('.') : rootName, isPackage: true };
  }
  return { id: [...parts, stem].join('.'), isPackage: false };
}

/**
 * Module id of a file scanned on its own: the file stem
 */
export function singleFileModuleId(filePath: string): ModulePath {
  const stem = stripSuffix(path.basename(filePath));
  return { id: stem, isPackage: stem === PACKAGE_MARKER };
}
