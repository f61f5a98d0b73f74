/**
 * Import Resolver
 *
 * Classifies raw imports as local, standard-library, third-party or
 * unresolvable, and maps local ones to a canonical module id.
 * Pure: the registry and the standard-library table are explicit inputs.
 */

import type { ModuleRegistry } from './module-registry.js';
import type { ImportResolution, Module, ModuleId, RawImport } from './types.js';

export interface ResolveContext {
  registry: ModuleRegistry;
  standardLibrary: ReadonlySet<string>;
  /**
   * Id of the scan root's own package marker, when the root directory is a
   * package. Root-level modules then live inside that package.
   */
  rootPackage?: ModuleId | undefined;
}

type Importer = Pick<Module, 'id' | 'isPackage'>;

/**
 * Dotted reference a raw import points at (`from a import b` -> `a.b`)
 */
export function importReference(raw: RawImport): string {
  if (raw.member && raw.member !== '*') {
    return raw.target ? `${raw.target}.${raw.member}` : raw.member;
  }
  return raw.target;
}

/**
 * Package the importer lives in, as id parts relative to the scan root.
 * A package marker is its own package; the root marker is the root itself.
 */
export function packagePartsOf(importer: Importer, rootPackage?: ModuleId): string[] {
  if (rootPackage !== undefined && importer.id === rootPackage) {
    return [];
  }
  const parts = importer.id.split('.');
  return importer.isPackage ? parts : parts.slice(0, -1);
}

/**
 * Resolve one raw import against the registry
 */
export function resolveImport(raw: RawImport, importer: Importer, ctx: ResolveContext): ImportResolution {
  const depth = raw.kind.type === 'absolute' ? 0 : raw.kind.depth;
  const resolution = depth > 0
    ? resolveRelative(raw, depth, importer, ctx)
    : resolveAbsolute(raw, importer, ctx);

  // `from pkg import name` inside pkg itself names a symbol, not a dependency
  if (resolution.kind === 'local' && resolution.moduleId === importer.id && raw.member) {
    return { kind: 'unresolvable', reason: `${importReference(raw)} is defined in the importing module` };
  }
  return resolution;
}

function resolveRelative(raw: RawImport, depth: number, importer: Importer, ctx: ResolveContext): ImportResolution {
  const packageParts = packagePartsOf(importer, ctx.rootPackage);
  const climb = depth - 1;

  // Depth 1 is the importer's own package; each extra dot climbs one level.
  // Reaching the scan root is only valid when the root is itself a package.
  const reachesRoot = climb === packageParts.length;
  if (climb > packageParts.length || (reachesRoot && ctx.rootPackage === undefined)) {
    return {
      kind: 'unresolvable',
      reason: `relative import of depth ${depth} beyond package nesting of ${importer.id}`,
    };
  }

  const baseParts = packageParts.slice(0, packageParts.length - climb);
  const reference = importReference(raw);
  const candidate = [...baseParts, ...(reference ? reference.split('.') : [])].join('.');

  if (candidate) {
    const match = ctx.registry.longestPrefix(candidate, baseParts.length);
    if (match) {
      return { kind: 'local', moduleId: match };
    }
  }

  if (baseParts.length === 0 && ctx.rootPackage !== undefined) {
    return { kind: 'local', moduleId: ctx.rootPackage };
  }
  return { kind: 'unresolvable', reason: `no local module matches ${candidate || '.'.repeat(depth)}` };
}

function resolveAbsolute(raw: RawImport, importer: Importer, ctx: ResolveContext): ImportResolution {
  const reference = importReference(raw);
  if (!reference) {
    return { kind: 'unresolvable', reason: 'empty import' };
  }

  const topLevel = reference.split('.')[0] ?? reference;
  const isStandardLibrary = ctx.standardLibrary.has(topLevel);

  // Same-package sibling takes priority over a root-level match, but never
  // shadows a standard-library name (`import logging` inside pkg/logging.py)
  const packageParts = packagePartsOf(importer, ctx.rootPackage);
  if (packageParts.length > 0 && !isStandardLibrary) {
    const sibling = [...packageParts, reference].join('.');
    const match = ctx.registry.longestPrefix(sibling, packageParts.length + 1);
    if (match) {
      return { kind: 'local', moduleId: match };
    }
  }

  // `import rootpkg.mod` when the scan root is the package `rootpkg`
  const rootPrefix = ctx.rootPackage !== undefined ? `${ctx.rootPackage}.` : null;
  if (rootPrefix && reference.startsWith(rootPrefix)) {
    const match = ctx.registry.longestPrefix(reference.slice(rootPrefix.length));
    if (match && match !== ctx.rootPackage) {
      return { kind: 'local', moduleId: match };
    }
  }

  const rootMatch = ctx.registry.longestPrefix(reference);
  if (rootMatch) {
    return { kind: 'local', moduleId: rootMatch };
  }

  if (isStandardLibrary) {
    return { kind: 'standard-library', name: topLevel };
  }
  if (ctx.registry.topLevelNames().has(topLevel)) {
    return { kind: 'unresolvable', reason: `no local module matches ${reference}` };
  }
  return { kind: 'third-party', name: topLevel };
}
