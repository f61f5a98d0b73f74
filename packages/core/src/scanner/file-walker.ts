/**
 * File Walker
 *
 * Finds the source files under a scan root, skipping excluded directories
 * and files. Output is sorted by relative path.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { compareIds } from '../module-graph/module-registry.js';
import { DEFAULT_IGNORE_DIRECTORIES, isIgnored } from './default-ignores.js';

export interface SourceFile {
  /** `/`-separated path relative to the root */
  relativePath: string;
  absolutePath: string;
}

export interface WalkOptions {
  /** Names or globs to skip; defaults to DEFAULT_IGNORE_DIRECTORIES */
  exclude?: readonly string[] | undefined;
  /** Extensions to collect, with the dot */
  extensions?: readonly string[] | undefined;
}

export async function walkSourceFiles(rootDir: string, options: WalkOptions = {}): Promise<SourceFile[]> {
  const exclude = options.exclude ?? DEFAULT_IGNORE_DIRECTORIES;
  const extensions = options.extensions ?? ['.py'];
  const files: SourceFile[] = [];

  const walk = async (dir: string, relativePath: string = ''): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (isIgnored(relPath, exclude)) continue;

      if (entry.isDirectory()) {
        await walk(fullPath, relPath);
      } else if (entry.isFile() && extensions.some(ext => entry.name.endsWith(ext))) {
        files.push({ relativePath: relPath, absolutePath: fullPath });
      }
    }
  };

  await walk(rootDir);
  return files.sort((a, b) => compareIds(a.relativePath, b.relativePath));
}
