/**
 * Module Registry
 *
 * The discovered set of local modules for one scan, keyed by canonical id.
 */

import type { Module, ModuleId } from './types.js';

export class ModuleRegistry {
  private readonly modules: ReadonlyMap<ModuleId, Module>;
  private readonly sortedIds: readonly ModuleId[];
  private readonly topLevel: ReadonlySet<string>;

  constructor(modules: Iterable<Module>) {
    const byId = new Map<ModuleId, Module>();
    for (const module of modules) {
      // First registration wins (a.py and a.pyi map to the same id)
      if (!byId.has(module.id)) {
        byId.set(module.id, Object.freeze({ ...module }));
      }
    }

    const entries = [...byId.entries()].sort(([a], [b]) => compareIds(a, b));
    this.modules = new Map(entries);
    this.sortedIds = Object.freeze(entries.map(([id]) => id));
    this.topLevel = new Set(this.sortedIds.map(id => id.split('.')[0] ?? id));
  }

  get size(): number {
    return this.sortedIds.length;
  }

  has(id: ModuleId): boolean {
    return this.modules.has(id);
  }

  get(id: ModuleId): Module | undefined {
    return this.modules.get(id);
  }

  /**
   * All ids, ascending
   */
  ids(): readonly ModuleId[] {
    return this.sortedIds;
  }

  /**
   * First segments of all registered ids
   */
  topLevelNames(): ReadonlySet<string> {
    return this.topLevel;
  }

  /**
   * Longest registered prefix of a dotted reference, not shorter than `minParts`
   */
  longestPrefix(reference: string, minParts = 1): ModuleId | null {
    const parts = reference.split('.');
    for (let i = parts.length; i >= Math.max(minParts, 1); i--) {
      const candidate = parts.slice(0, i).join('.');
      if (this.modules.has(candidate)) {
        return candidate;
      }
    }
    return null;
  }

  toMap(): ReadonlyMap<ModuleId, Module> {
    return this.modules;
  }
}

/**
 * Binary string order, independent of locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
